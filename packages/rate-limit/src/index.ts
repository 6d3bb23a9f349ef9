import { logger } from '@accounts/observability';
import type { RateLimitConfig, RateLimitResult, RateLimitStore } from './types.js';

export type {
  HitResult,
  RateLimitConfig,
  RateLimitResult,
  RateLimitStore,
  WindowState,
} from './types.js';
export { MemoryRateLimitStore, type MemoryRateLimitStoreOptions } from './memory-store.js';
export {
  RedisRateLimitStore,
  SLIDING_WINDOW_COUNT_SCRIPT,
  SLIDING_WINDOW_HIT_SCRIPT,
  type RedisScriptClient,
} from './redis-store.js';

export type RateLimiterOptions = {
  /**
   * Admit requests when the store is unreachable (logged). Defaults to true.
   */
  failOpen?: boolean;
  now?: () => number;
};

export type RateLimiter = ReturnType<typeof createRateLimiter>;

/**
 * Create a rate limiter instance
 *
 * @param store - Window storage (MemoryRateLimitStore in-process, RedisRateLimitStore across instances)
 * @param defaults - Limit applied when a call does not pass its own config
 *
 * @example
 * ```ts
 * const limiter = createRateLimiter(new MemoryRateLimitStore(), RateLimitPresets.LOGIN);
 * if (!(await limiter.admit(`login:${email}`))) {
 *   throw new RateLimitedError(60);
 * }
 * ```
 */
export function createRateLimiter(
  store: RateLimitStore,
  defaults: RateLimitConfig,
  options: RateLimiterOptions = {}
) {
  const failOpen = options.failOpen ?? true;
  const now = options.now ?? (() => Date.now());

  /**
   * Record an attempt if the key is under its limit
   *
   * @param key - Unique identifier for the rate limit (e.g., 'ip:127.0.0.1', 'login:a@b.c')
   * @returns Rate limit result; rejected attempts are not recorded
   */
  async function checkLimit(
    key: string,
    config: RateLimitConfig = defaults
  ): Promise<RateLimitResult> {
    const timestamp = now();
    const windowMs = config.window * 1000;

    try {
      const { allowed, count, oldest } = await store.hit(key, timestamp, windowMs, config.limit);
      return {
        allowed,
        remaining: allowed ? Math.max(0, config.limit - count) : 0,
        reset: Math.ceil(((oldest ?? timestamp) + windowMs) / 1000),
      };
    } catch (error) {
      if (!failOpen) {
        throw error;
      }
      logger.error({ err: error, key }, 'Rate limit check failed; allowing request');
      return {
        allowed: true,
        remaining: config.limit - 1,
        reset: Math.ceil((timestamp + windowMs) / 1000),
      };
    }
  }

  async function admit(key: string, config: RateLimitConfig = defaults): Promise<boolean> {
    const result = await checkLimit(key, config);
    return result.allowed;
  }

  /**
   * Remaining attempts in the active window. Read-only.
   */
  async function remaining(key: string, config: RateLimitConfig = defaults): Promise<number> {
    const { count } = await store.count(key, now(), config.window * 1000);
    return Math.max(0, config.limit - count);
  }

  /**
   * Retrieve the current number of requests within the configured window.
   */
  async function getUsage(key: string, config: RateLimitConfig = defaults): Promise<number> {
    const { count } = await store.count(key, now(), config.window * 1000);
    return count;
  }

  async function resetLimit(key: string): Promise<void> {
    await store.clear(key);
  }

  return {
    config: defaults,
    checkLimit,
    admit,
    remaining,
    getUsage,
    resetLimit,
  };
}

/**
 * Common rate limit presets
 */
export const RateLimitPresets = {
  /**
   * Credential endpoints per client IP (10 requests per minute)
   */
  AUTH: { limit: 10, window: 60 },
  /**
   * Login attempts per account (5 per minute)
   */
  LOGIN: { limit: 5, window: 60 },
  /**
   * Password reset / verification emails per address (3 per hour)
   */
  ACCOUNT_RECOVERY: { limit: 3, window: 3600 },
  /**
   * Standard API limit (100 requests per minute)
   */
  API: { limit: 100, window: 60 },
} as const satisfies Record<string, RateLimitConfig>;

export { Redis } from '@upstash/redis';
