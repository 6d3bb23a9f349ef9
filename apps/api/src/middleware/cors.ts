import { cors } from 'hono/cors';
import { logger as defaultLogger, type Logger } from '@accounts/observability';

/**
 * The web client's origin, plus its www / bare-domain twin
 */
export function computeAllowedOrigins(appUrl: string, logger: Logger = defaultLogger): Set<string> {
  const allowed = new Set<string>();

  try {
    const url = new URL(appUrl);
    allowed.add(url.origin);
    const port = url.port ? `:${url.port}` : '';
    if (url.hostname.startsWith('www.')) {
      allowed.add(`${url.protocol}//${url.hostname.replace(/^www\./, '')}${port}`);
    } else if (url.hostname !== 'localhost') {
      allowed.add(`${url.protocol}//www.${url.hostname}${port}`);
    }
  } catch (error) {
    logger.warn({ err: error }, 'Failed to parse APP_URL for CORS configuration');
  }

  return allowed;
}

export function createCorsMiddleware(appUrl: string, logger?: Logger) {
  const allowedOrigins = computeAllowedOrigins(appUrl, logger);

  return cors({
    origin: (origin) => {
      if (origin && allowedOrigins.has(origin)) {
        return origin;
      }
      // Allow localhost for development
      if (origin && /^http:\/\/localhost:\d+$/.test(origin)) {
        return origin;
      }
      return '';
    },
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposeHeaders: ['X-Request-Id', 'Retry-After', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
    maxAge: 86400, // 24 hours - browser caches preflight response
  });
}
