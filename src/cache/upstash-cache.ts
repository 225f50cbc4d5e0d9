// ============================================
// VOTESHIELD - Upstash Redis Cache
// ============================================

import { Redis } from '@upstash/redis';
import type { VolatileCache } from './volatile-cache.js';

/**
 * Redis-backed cache over the Upstash REST API. Counter and set updates
 * run inside MULTI/EXEC together with their EXPIRE.
 */
export class UpstashCache implements VolatileCache {
  constructor(private redis: Redis) {}

  static fromCredentials(url: string, token: string): UpstashCache {
    return new UpstashCache(new Redis({ url, token }));
  }

  async get(key: string): Promise<unknown> {
    return this.redis.get<unknown>(key);
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, { ex: ttlSeconds });
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const [count] = await this.redis
      .multi()
      .incr(key)
      .expire(key, ttlSeconds)
      .exec<[number, number]>();
    return count;
  }

  async addToSet(key: string, members: string[], ttlSeconds: number): Promise<number> {
    if (members.length === 0) {
      return this.redis.scard(key);
    }
    const [first, ...rest] = members;
    const [, size] = await this.redis
      .multi()
      .sadd(key, first, ...rest)
      .scard(key)
      .expire(key, ttlSeconds)
      .exec<[number, number, number]>();
    return size;
  }

  async members(key: string): Promise<string[]> {
    // Upstash deserializes numeric-looking members into numbers
    const members = await this.redis.smembers<unknown[]>(key);
    return members.map(String);
  }
}
