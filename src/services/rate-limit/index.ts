/**
 * Rate limiter and store factory.
 *
 * Uses the Redis store when REDIS_URL is configured, otherwise keeps windows
 * in process memory.
 */

import { config } from '../../config.js';
import { logger } from '../../utils/logger.js';
import { MemoryRateLimitStore } from './memory.js';
import { RedisRateLimitStore } from './redis.js';
import type { Admission, RateLimitStore } from './types.js';

export const RATE_LIMIT_WINDOW_MS = 60_000;

/**
 * Key shared by every caller that does not identify itself.
 */
export const DEFAULT_CALLER_KEY = 'global';

/**
 * Fixed-window limiter keyed by caller identity.
 *
 * The ceiling is taken from each call, so a caller that changes its
 * `rate_limit` mid-window is compared against the new value while its count
 * carries over.
 */
export class RateLimiter {
  constructor(
    private readonly store: RateLimitStore,
    private readonly defaultCeiling: number,
    private readonly windowMs: number = RATE_LIMIT_WINDOW_MS
  ) {}

  async admit(key: string | undefined, rateLimit?: number): Promise<Admission> {
    const ceiling = rateLimit ?? this.defaultCeiling;
    return this.store.admit(key ?? DEFAULT_CALLER_KEY, ceiling, this.windowMs);
  }

  getStoreType(): string {
    return this.store.getType();
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}

export function createRateLimitStore(): RateLimitStore {
  if (config.REDIS_URL) {
    logger.info('REDIS_URL detected. Using Redis rate limit store');
    return new RedisRateLimitStore(config.REDIS_URL, {
      idleWindows: config.RATE_LIMIT_IDLE_WINDOWS,
    });
  }

  logger.info('No REDIS_URL found. Using in-memory rate limit store');
  return new MemoryRateLimitStore({ idleWindows: config.RATE_LIMIT_IDLE_WINDOWS });
}

export function createRateLimiter(): RateLimiter {
  return new RateLimiter(createRateLimitStore(), config.DEFAULT_RATE_LIMIT);
}

export { MemoryRateLimitStore } from './memory.js';
export { RedisRateLimitStore, parseAdmitReply } from './redis.js';
export type { Admission, RateLimitStore, RateWindow } from './types.js';
