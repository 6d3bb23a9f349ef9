import type { Context, MiddlewareHandler } from 'hono';
import { getConnInfo } from '@hono/node-server/conninfo';
import { isIP } from 'node:net';
import { logger as defaultLogger, type Logger } from '@accounts/observability';
import type { AppBindings } from '../types/context.js';

function normalizeIp(value?: string | null): string | null {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed && isIP(trimmed) ? trimmed : null;
}

function getRemoteAddress(c: Context<AppBindings>): string | null {
  try {
    return normalizeIp(getConnInfo(c).remote.address);
  } catch {
    // getConnInfo throws outside the node-server runtime (app.request in tests)
    return null;
  }
}

function getHeaderIp(c: Context<AppBindings>): string | null {
  const realIp = normalizeIp(c.req.header('x-real-ip'));
  if (realIp) {
    return realIp;
  }

  // First entry is the client as seen by the outermost trusted proxy
  const firstIp = c.req.header('x-forwarded-for')?.split(',')[0];
  return normalizeIp(firstIp);
}

/**
 * Resolve the client IP in a proxy-aware but safe way.
 *
 * - Uses the immediate connection IP by default (non-spoofable).
 * - If the connection IP is a trusted proxy, trusts X-Real-IP / the first
 *   entry in X-Forwarded-For.
 * - Falls back to "unknown" when no signal is available.
 */
export function resolveClientIp(c: Context<AppBindings>, trustedProxies: ReadonlySet<string>): string {
  const remoteIp = getRemoteAddress(c);
  const headerIp = getHeaderIp(c);

  if (remoteIp && headerIp && trustedProxies.has(remoteIp)) {
    return headerIp;
  }
  if (remoteIp) {
    return remoteIp;
  }
  // No connection info: headers count only when proxies are explicitly configured
  if (headerIp && trustedProxies.size > 0) {
    return headerIp;
  }
  return 'unknown';
}

export function clientIpMiddleware(
  trustedProxyIps: readonly string[],
  logger: Logger = defaultLogger
): MiddlewareHandler<AppBindings> {
  const trustedProxies = new Set(
    trustedProxyIps.map((entry) => normalizeIp(entry)).filter((entry): entry is string => entry !== null)
  );
  if (trustedProxies.size !== trustedProxyIps.length) {
    logger.warn({ trustedProxyIps }, 'Ignoring invalid entries in AUTH_TRUSTED_PROXY_IPS');
  }

  return async (c, next) => {
    c.set('clientIp', resolveClientIp(c, trustedProxies));
    await next();
  };
}
