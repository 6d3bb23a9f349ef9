import type { MiddlewareHandler } from 'hono';
import { RateLimitedError } from '@accounts/auth-core';
import type { RateLimiter } from '@accounts/rate-limit';
import type { AppBindings } from '../types/context.js';

/**
 * Per-client-IP limit for credential endpoints.
 * Sets X-RateLimit-* headers; over the limit the request fails with 429 and Retry-After.
 */
export function ipRateLimit(limiter: RateLimiter, scope: string): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const result = await limiter.checkLimit(`${scope}:${c.get('clientIp')}`);

    c.header('X-RateLimit-Limit', limiter.config.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.allowed) {
      const retryAfter = Math.max(1, result.reset - Math.floor(Date.now() / 1000));
      throw new RateLimitedError(retryAfter);
    }

    await next();
  };
}
