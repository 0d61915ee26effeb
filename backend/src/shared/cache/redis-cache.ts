/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for rate limiting and token revocation.
 * - SET NX EX gives revocation its single-winner semantics across processes.
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 *
 * LOGGING:
 * - Redis connection errors fire outside any request context (they are client-level events,
 *   not request-level). We use the global logger directly.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async setIfAbsent(key: string, value: string, opts?: CacheSetOptions): Promise<boolean> {
    const reply = opts?.ttlSeconds
      ? await this.client.set(key, value, { NX: true, EX: opts.ttlSeconds })
      : await this.client.set(key, value, { NX: true });

    // SET NX replies "OK" when the key was written and null when it already existed.
    return reply === 'OK';
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const value = await this.client.incr(key);

    if (opts?.ttlSeconds) {
      const ttl = await this.client.ttl(key);
      if (ttl < 0) {
        await this.client.expire(key, opts.ttlSeconds);
      }
    }

    return value;
  }
}
