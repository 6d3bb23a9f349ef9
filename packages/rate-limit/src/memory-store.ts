import type { HitResult, RateLimitStore, WindowState } from './types.js';

type Window = {
  windowMs: number;
  timestamps: number[];
};

/**
 * In-process sliding window store.
 *
 * Every operation runs to completion without awaiting, so prune/check/append
 * cannot interleave between concurrent requests for the same key.
 */
export type MemoryRateLimitStoreOptions = {
  /** How often `hit` drops keys whose window has emptied (default 60s) */
  sweepIntervalMs?: number;
};

export class MemoryRateLimitStore implements RateLimitStore {
  private windows = new Map<string, Window>();
  private readonly sweepIntervalMs: number;
  private lastSweep = Number.NEGATIVE_INFINITY;

  constructor(options: MemoryRateLimitStoreOptions = {}) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
  }

  async hit(key: string, now: number, windowMs: number, limit: number): Promise<HitResult> {
    if (now - this.lastSweep >= this.sweepIntervalMs) {
      this.sweep(now);
      this.lastSweep = now;
    }

    const timestamps = this.prune(key, now, windowMs);
    let allowed = false;

    if (timestamps.length < limit) {
      timestamps.push(now);
      allowed = true;
    }

    if (timestamps.length > 0) {
      this.windows.set(key, { windowMs, timestamps });
    } else {
      this.windows.delete(key);
    }

    return { allowed, ...summarize(timestamps) };
  }

  async count(key: string, now: number, windowMs: number): Promise<WindowState> {
    const window = this.windows.get(key);
    if (!window) {
      return { count: 0, oldest: null };
    }
    return summarize(window.timestamps.filter((timestamp) => timestamp > now - windowMs));
  }

  async clear(key: string): Promise<void> {
    this.windows.delete(key);
  }

  /**
   * Drop keys whose every entry has left its window
   * @returns Number of keys removed
   */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (!window.timestamps.some((timestamp) => timestamp > now - window.windowMs)) {
        this.windows.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }

  private prune(key: string, now: number, windowMs: number): number[] {
    const window = this.windows.get(key);
    if (!window) {
      return [];
    }
    return window.timestamps.filter((timestamp) => timestamp > now - windowMs);
  }
}

function summarize(timestamps: number[]): WindowState {
  return {
    count: timestamps.length,
    oldest: timestamps.length > 0 ? Math.min(...timestamps) : null,
  };
}
