import { randomUUID } from 'node:crypto';
import type { HitResult, RateLimitStore, WindowState } from './types.js';

/**
 * Subset of the Upstash Redis client used by the store.
 * `Redis` from @upstash/redis satisfies it.
 */
export interface RedisScriptClient {
  eval(script: string, keys: string[], args: (string | number)[]): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
}

// Prune, count and conditionally append in one round trip so concurrent
// instances cannot both admit the last slot.
export const SLIDING_WINDOW_HIT_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  count = count + 1
  allowed = 1
end
if count > 0 then
  redis.call('PEXPIRE', key, window)
end
local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldestScore = -1
if oldest[2] then
  oldestScore = tonumber(oldest[2])
end
return {allowed, count, oldestScore}
`;

export const SLIDING_WINDOW_COUNT_SCRIPT = `
local key = KEYS[1]
local floor = '(' .. (tonumber(ARGV[1]) - tonumber(ARGV[2]))
local count = redis.call('ZCOUNT', key, floor, '+inf')
local oldest = redis.call('ZRANGEBYSCORE', key, floor, '+inf', 'WITHSCORES', 'LIMIT', 0, 1)
local oldestScore = -1
if oldest[2] then
  oldestScore = tonumber(oldest[2])
end
return {count, oldestScore}
`;

function toNumbers(result: unknown, expectedLength: number): number[] {
  if (!Array.isArray(result) || result.length !== expectedLength) {
    throw new Error('Unexpected rate limit script result');
  }
  return result.map((entry) => {
    const value = Number(entry);
    if (!Number.isFinite(value)) {
      throw new Error('Unexpected rate limit script result');
    }
    return value;
  });
}

function toOldest(score: number | undefined): number | null {
  return score === undefined || score < 0 ? null : score;
}

/**
 * Redis sorted-set store for multi-instance deployments.
 * Score and member are both request timestamps (member is suffixed to stay unique).
 */
export class RedisRateLimitStore implements RateLimitStore {
  constructor(
    private redis: RedisScriptClient,
    private prefix = 'ratelimit'
  ) {}

  async hit(key: string, now: number, windowMs: number, limit: number): Promise<HitResult> {
    const result = await this.redis.eval(
      SLIDING_WINDOW_HIT_SCRIPT,
      [this.keyFor(key)],
      [now, windowMs, limit, `${now}:${randomUUID()}`]
    );
    const [allowed, count, oldest] = toNumbers(result, 3);
    return { allowed: allowed === 1, count: count ?? 0, oldest: toOldest(oldest) };
  }

  async count(key: string, now: number, windowMs: number): Promise<WindowState> {
    const result = await this.redis.eval(
      SLIDING_WINDOW_COUNT_SCRIPT,
      [this.keyFor(key)],
      [now, windowMs]
    );
    const [count, oldest] = toNumbers(result, 2);
    return { count: count ?? 0, oldest: toOldest(oldest) };
  }

  async clear(key: string): Promise<void> {
    await this.redis.del(this.keyFor(key));
  }

  private keyFor(key: string): string {
    return `${this.prefix}:${key}`;
  }
}
