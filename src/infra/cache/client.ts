import Redis from 'ioredis';
import { logger } from '../logging/logger';

/**
 * Minimal string key-value contract the session cache runs on.
 */
export interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<number>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export class RedisCacheBackend implements CacheBackend {
  constructor(private redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async del(key: string): Promise<number> {
    return this.redis.del(key);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
    logger.info('Redis connection closed');
  }
}

export function createRedisClient(redisUrl: string): Redis {
  const redis = new Redis(redisUrl, {
    lazyConnect: true,
    // Fail commands fast while disconnected; the session cache treats that as a miss
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => {
      if (times > 20) {
        logger.error('Redis connection failed after 20 retries');
        return null; // Stop retrying
      }
      return Math.min(times * 100, 3000);
    },
    reconnectOnError: (err) => {
      const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT'];
      return targetErrors.some((e) => err.message.includes(e));
    },
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  redis.on('error', (err) => {
    logger.error({ error: err.message }, 'Redis error');
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  return redis;
}

/**
 * Connect to Redis, or return null when no URL is configured or the
 * server cannot be reached. Null means the cache runs disabled.
 */
export async function connectCacheBackend(redisUrl: string | undefined): Promise<CacheBackend | null> {
  if (!redisUrl) {
    logger.info('REDIS_URL not set - session cache disabled');
    return null;
  }

  const redis = createRedisClient(redisUrl);

  try {
    await redis.connect();
    await redis.ping();
    logger.info('Redis connection established');
    return new RedisCacheBackend(redis);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({ error: err.message }, 'Failed to connect to Redis - session cache disabled');
    redis.disconnect();
    return null;
  }
}
