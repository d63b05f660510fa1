import { Redis } from 'ioredis';
import logger from './logger.js';

let redisClient: Redis | null = null;

/**
 * Returns the singleton Redis client, creating it lazily on first call.
 *
 * Returns null if REDIS_URL is not set or if the client creation fails.
 * Short connectTimeout and maxRetriesPerRequest=1 so a snapshot write against an
 * unreachable Redis fails fast instead of stalling the activation that triggered it.
 */
export function getRedisClient(redisUrl = process.env.REDIS_URL): Redis | null {
  if (redisClient) return redisClient;
  if (!redisUrl) return null;

  try {
    redisClient = new Redis(redisUrl, {
      maxRetriesPerRequest: 1,
      connectTimeout: 3000,
      lazyConnect: true,
    });

    redisClient.on('error', (err: Error) => {
      logger.warn({ err: err.message }, 'Redis connection error');
    });

    return redisClient;
  } catch (err) {
    logger.warn(
      { err: err instanceof Error ? err.message : String(err) },
      'Failed to create Redis client',
    );
    return null;
  }
}

/**
 * Gracefully closes the Redis connection.
 * Safe to call even if Redis was never connected.
 */
export async function shutdownRedis(): Promise<void> {
  if (redisClient) {
    const client = redisClient;
    redisClient = null;
    try {
      await client.quit();
    } catch (err) {
      logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Redis quit failed');
    }
  }
}
