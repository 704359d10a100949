import Redis from 'ioredis';
import { describeError, logger } from '../shared/logger';

let client: Redis | null = null;
let isConnected = false;

/**
 * Initialize the Redis client. Connection failures are not fatal: callers
 * check `getRedis()` and fall back to Postgres while it returns null.
 */
export function initRedis(url: string): Redis {
  if (client) return client;

  client = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 200, 3000),
    lazyConnect: true,
  });

  client.on('connect', () => {
    isConnected = true;
    logger.info('Redis connected');
  });
  client.on('error', (err: unknown) => {
    isConnected = false;
    logger.warn('Redis error', { error: describeError(err) });
  });
  client.on('close', () => {
    isConnected = false;
  });

  // Non-blocking connect
  client.connect().catch((err: unknown) => {
    isConnected = false;
    logger.warn('Redis connection failed, using Postgres cache', { error: describeError(err) });
  });

  return client;
}

export function getRedis(): Redis | null {
  return isConnected ? client : null;
}

export function isRedisConnected(): boolean {
  return isConnected;
}

export async function closeRedis(): Promise<void> {
  if (client) {
    const closing = client;
    client = null;
    isConnected = false;
    await closing.quit().catch((err: unknown) => {
      logger.warn('Redis quit failed', { error: describeError(err) });
    });
  }
}

export async function redisHealthCheck(): Promise<boolean> {
  const redis = getRedis();
  if (!redis) return false;
  try {
    return (await redis.ping()) === 'PONG';
  } catch (err) {
    logger.warn('Redis health check failed', { error: describeError(err) });
    return false;
  }
}
