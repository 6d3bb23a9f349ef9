/**
 * Rate limit configuration options
 */
export interface RateLimitConfig {
  /**
   * Maximum number of requests allowed within the window
   */
  limit: number;
  /**
   * Time window in seconds
   */
  window: number;
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  /**
   * Whether the request is allowed
   */
  allowed: boolean;
  /**
   * Number of requests remaining in the current window
   */
  remaining: number;
  /**
   * Unix timestamp (seconds) when the oldest recorded request leaves the window
   */
  reset: number;
}

export interface WindowState {
  count: number;
  oldest: number | null;
}

export interface HitResult extends WindowState {
  allowed: boolean;
}

/**
 * Backing storage for sliding windows.
 *
 * `hit` must prune, check and append as one atomic step per key; rejected
 * attempts are never recorded. `count` never mutates.
 */
export interface RateLimitStore {
  hit(key: string, now: number, windowMs: number, limit: number): Promise<HitResult>;
  count(key: string, now: number, windowMs: number): Promise<WindowState>;
  clear(key: string): Promise<void>;
}
