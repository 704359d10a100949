import { getRedis } from './redis';

/** String key/value store with per-entry expiry. */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

const KEY_PREFIX = 'enrich:';

/**
 * Redis-backed store using native EX expiry. While Redis is not connected,
 * reads and writes go to `fallback`.
 */
export function createRedisCacheStore(fallback: CacheStore): CacheStore {
  return {
    name: 'redis',

    async get(key: string): Promise<string | null> {
      const redis = getRedis();
      if (!redis) return fallback.get(key);
      return redis.get(`${KEY_PREFIX}${key}`);
    },

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
      const redis = getRedis();
      if (!redis) return fallback.set(key, value, ttlSeconds);
      await redis.set(`${KEY_PREFIX}${key}`, value, 'EX', ttlSeconds);
    },
  };
}
