/**
 * Redis connection management.
 *
 * The command client backs the Redis rank cache; BullMQ opens its own
 * connections from the same URL (see queue.ts).
 */

import { Redis, type RedisOptions } from 'ioredis';
import { env } from './env';
import { logger } from './logger';

const DEFAULT_OPTIONS: RedisOptions = {
  maxRetriesPerRequest: 3,
  enableReadyCheck: true,
  lazyConnect: true,
  connectTimeout: 10000,
  commandTimeout: 5000,
  retryStrategy: (times: number) => {
    if (times > 10) {
      logger.error('Redis: Max reconnection attempts reached');
      return null;
    }
    return Math.min(times * 100, 3000);
  },
};

let redisClient: Redis | null = null;

export function getRedis(): Redis {
  if (!redisClient) {
    redisClient = new Redis(env.REDIS_URL, DEFAULT_OPTIONS);

    redisClient.on('ready', () => {
      logger.info('Redis: Ready');
    });

    redisClient.on('error', (err) => {
      logger.error({ err }, 'Redis connection error');
    });

    redisClient.on('close', () => {
      logger.debug('Redis: Connection closed');
    });
  }

  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    const client = redisClient;
    redisClient = null;
    await client.quit();
  }
}

/**
 * Check Redis connection health
 */
export async function checkRedisConnection(): Promise<boolean> {
  try {
    const pong = await getRedis().ping();
    return pong === 'PONG';
  } catch (err) {
    logger.warn({ err }, 'Redis health check failed');
    return false;
  }
}
