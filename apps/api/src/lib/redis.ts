/**
 * Redis Client
 *
 * Connection management and the distributed locks that back per-user
 * submission leases.
 *
 * Key Patterns:
 * - lock:{resource} - Distributed locks
 */

import { randomUUID } from 'crypto';
import { Redis, RedisOptions } from 'ioredis';

import { env } from './env';
import { logger } from './logger';

export const LOCK_PREFIX = 'lock:';

// Redis connection options
const DEFAULT_OPTIONS: RedisOptions = {
  maxRetriesPerRequest: 3,
  enableReadyCheck: true,
  lazyConnect: true,
  connectTimeout: 10000,
  commandTimeout: 5000,
  // Reconnection strategy
  retryStrategy: (times: number) => {
    if (times > 10) {
      logger.error('Redis: Max reconnection attempts reached');
      return null; // Stop retrying
    }
    return Math.min(times * 100, 3000);
  },
};

// Singleton Redis client
let redisClient: Redis | null = null;

/**
 * Get the main Redis client (for commands)
 */
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

/**
 * Close the Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}

/**
 * Check Redis connection health
 */
export async function checkRedisConnection(): Promise<boolean> {
  try {
    const pong = await getRedis().ping();
    return pong === 'PONG';
  } catch (error) {
    logger.error({ err: error }, 'Redis health check failed');
    return false;
  }
}

// ============================================================
// Distributed Locks
// ============================================================

/**
 * Acquire a distributed lock. Returns the lock token, or null when held.
 */
export async function acquireLock(
  resource: string,
  ttlSeconds: number = 30,
  redis: Redis = getRedis()
): Promise<string | null> {
  const lockKey = `${LOCK_PREFIX}${resource}`;
  const lockValue = randomUUID();

  // SET NX EX - Only set if not exists with expiry
  const result = await redis.set(lockKey, lockValue, 'EX', ttlSeconds, 'NX');

  return result === 'OK' ? lockValue : null;
}

/**
 * Release a distributed lock
 */
export async function releaseLock(
  resource: string,
  lockValue: string,
  redis: Redis = getRedis()
): Promise<boolean> {
  const lockKey = `${LOCK_PREFIX}${resource}`;

  // Only release if we own the lock (using Lua script for atomicity)
  const script = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
      return redis.call("del", KEYS[1])
    else
      return 0
    end
  `;

  const result = await redis.eval(script, 1, lockKey, lockValue);
  return result === 1;
}
