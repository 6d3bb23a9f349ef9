import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { RateLimitedError, ValidationError, isAuthCoreError } from '@accounts/auth-core';
import { logger as defaultLogger, type Logger } from '@accounts/observability';
import type { AppBindings } from '../types/context.js';

/**
 * Map thrown errors to `{ error: kind, message }` bodies.
 * Unknown errors are logged with the request id and answered with a generic 500.
 */
export function createErrorHandler(logger: Logger = defaultLogger): ErrorHandler<AppBindings> {
  return (error, c) => {
    if (isAuthCoreError(error)) {
      if (error instanceof RateLimitedError) {
        c.header('Retry-After', error.retryAfterSeconds.toString());
      }
      const issues = error instanceof ValidationError && error.issues.length > 0 ? error.issues : undefined;
      return c.json(
        {
          error: error.kind,
          message: error.message,
          ...(issues !== undefined && { issues }),
        },
        error.status
      );
    }

    // Thrown by hono's validator for unreadable bodies (e.g. malformed JSON)
    if (error instanceof HTTPException && error.status === 400) {
      return c.json({ error: 'validation_error', message: error.message || 'Invalid input' }, 400);
    }

    logger.error({ err: error, requestId: c.get('requestId'), path: c.req.path }, 'Unhandled API error');
    return c.json({ error: 'internal_error', message: 'Internal server error' }, 500);
  };
}

export function notFoundHandler(c: Context<AppBindings>) {
  return c.json({ error: 'not_found', message: 'Not found' }, 404);
}
