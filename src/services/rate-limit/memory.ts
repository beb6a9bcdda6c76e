/**
 * In-Memory Rate Limit Store (Development / single process)
 *
 * Fixed windows kept in a Map keyed by caller. Admission runs synchronously,
 * so check-and-increment for a key cannot interleave with another caller.
 */

import type { Admission, RateLimitStore, RateWindow } from './types.js';

export interface MemoryRateLimitStoreOptions {
  /** Windows idle for this many window lengths are dropped. */
  idleWindows: number;
  now?: () => number;
}

export class MemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, RateWindow>();
  private readonly idleWindows: number;
  private readonly now: () => number;
  private lastSweep: number;

  constructor(options: MemoryRateLimitStoreOptions) {
    this.idleWindows = options.idleWindows;
    this.now = options.now ?? Date.now;
    this.lastSweep = this.now();
  }

  getType(): string {
    return 'memory';
  }

  async admit(key: string, ceiling: number, windowMs: number): Promise<Admission> {
    return this.admitNow(key, ceiling, windowMs);
  }

  admitNow(key: string, ceiling: number, windowMs: number): Admission {
    const now = this.now();
    this.evictIdle(now, windowMs);

    let window = this.windows.get(key);
    if (!window || now >= window.windowStart + windowMs) {
      window = { windowStart: now, count: 0 };
      this.windows.set(key, window);
    }

    if (window.count < ceiling) {
      window.count += 1;
      return { admitted: true, count: window.count, remaining: ceiling - window.count };
    }

    return {
      admitted: false,
      count: window.count,
      retryAfterMs: window.windowStart + windowMs - now,
    };
  }

  /**
   * Snapshot of the window for `key`, if one is tracked.
   */
  peek(key: string): RateWindow | undefined {
    const window = this.windows.get(key);
    return window ? { ...window } : undefined;
  }

  get size(): number {
    return this.windows.size;
  }

  async close(): Promise<void> {
    this.windows.clear();
  }

  // Sweeps at most once per window length.
  private evictIdle(now: number, windowMs: number): void {
    if (now - this.lastSweep < windowMs) {
      return;
    }
    this.lastSweep = now;

    const maxIdle = this.idleWindows * windowMs;
    for (const [key, window] of this.windows) {
      if (now - window.windowStart >= maxIdle) {
        this.windows.delete(key);
      }
    }
  }
}
