/**
 * Redis Rate Limit Store (Production)
 *
 * Windows live in Redis so that every process behind the tool shares one
 * budget per caller. The window key expires with the window, which also
 * evicts idle callers.
 */

import { Redis } from 'ioredis';
import { logger } from '../../utils/logger.js';
import { MemoryRateLimitStore } from './memory.js';
import type { Admission, RateLimitStore } from './types.js';

/**
 * KEYS[1] = window key, ARGV[1] = ceiling, ARGV[2] = window length (ms).
 * Returns { admitted, count, retry_after_ms }.
 */
const ADMIT_SCRIPT = `
local count = tonumber(redis.call('GET', KEYS[1]) or '0')
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  count = 0
end
if count < tonumber(ARGV[1]) then
  if count == 0 then
    redis.call('SET', KEYS[1], 1, 'PX', ARGV[2])
  else
    redis.call('INCR', KEYS[1])
  end
  return {1, count + 1, 0}
end
return {0, count, ttl}
`;

/**
 * Converts the script reply into an admission decision.
 */
export function parseAdmitReply(reply: unknown, ceiling: number): Admission {
  if (
    !Array.isArray(reply) ||
    reply.length !== 3 ||
    !reply.every((value): value is number => typeof value === 'number')
  ) {
    throw new Error(`Unexpected rate limit script reply: ${JSON.stringify(reply)}`);
  }

  const [admitted, count, ttl] = reply;
  if (admitted === 1) {
    return { admitted: true, count, remaining: Math.max(0, ceiling - count) };
  }
  return { admitted: false, count, retryAfterMs: Math.max(1, ttl) };
}

export class RedisRateLimitStore implements RateLimitStore {
  private readonly redis: Redis;
  private readonly fallback: MemoryRateLimitStore;
  private readonly PREFIX = 'sql-agent:ratelimit:';

  constructor(connection: string | Redis, options: { idleWindows: number }) {
    this.fallback = new MemoryRateLimitStore({ idleWindows: options.idleWindows });

    if (typeof connection !== 'string') {
      this.redis = connection;
      return;
    }

    this.redis = new Redis(connection, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        if (times > 5) {
          logger.warn('Redis connection unstable. Retrying...');
          return 5000;
        }
        return Math.min(times * 50, 2000);
      },
    });

    this.redis.on('error', (err: Error) => {
      logger.error(`Redis Error: ${err.message}`);
    });

    this.redis.on('connect', () => {
      logger.info('Redis rate limit store connected');
    });
  }

  getType(): string {
    return 'redis';
  }

  private key(callerKey: string): string {
    return `${this.PREFIX}${callerKey}`;
  }

  async admit(key: string, ceiling: number, windowMs: number): Promise<Admission> {
    let reply: unknown;
    try {
      reply = await this.redis.eval(ADMIT_SCRIPT, 1, this.key(key), ceiling, windowMs);
    } catch (error) {
      // Keep serving with a per-process budget while Redis is unavailable.
      logger.warn({ err: error }, 'Redis rate limit check failed, using in-memory window');
      return this.fallback.admit(key, ceiling, windowMs);
    }
    return parseAdmitReply(reply, ceiling);
  }

  async close(): Promise<void> {
    await this.fallback.close();
    await this.redis.quit();
  }
}
