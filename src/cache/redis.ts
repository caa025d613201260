import { Redis } from 'ioredis';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

let redisClient: Redis | null = null;
let isRedisAvailable = false;
let connectionFailed = false; // Suppress repeated error logs after initial failure

/** The commands the cache uses. Tests pass a stand-in. */
export type CacheClient = Pick<Redis, 'get' | 'set' | 'scan' | 'del'>;

export async function initRedis(): Promise<boolean> {
  try {
    redisClient = new Redis(config.REDIS_URL, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        if (times > 3) {
          return null; // Stop retrying - error will be logged in catch block
        }
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });

    redisClient.on('error', (err: Error) => {
      if (!connectionFailed) {
        logger.warn('Redis', 'Connection error', err.message);
      }
      isRedisAvailable = false;
    });

    redisClient.on('connect', () => {
      logger.info('Redis', 'Connected');
      isRedisAvailable = true;
    });

    redisClient.on('close', () => {
      logger.debug('Redis', 'Connection closed');
      isRedisAvailable = false;
    });

    await redisClient.connect();
    await redisClient.ping();
    isRedisAvailable = true;
    logger.info('Redis', `Connected to ${config.REDIS_URL}`);
    return true;
  } catch (error) {
    connectionFailed = true;
    logger.warn('Redis', 'Failed to connect - caching disabled', error instanceof Error ? error.message : 'Unknown error');
    isRedisAvailable = false;
    // Stop ioredis from retrying in the background
    redisClient?.disconnect();
    redisClient = null;
    return false;
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redisClient) {
    try {
      await redisClient.quit();
    } catch (error) {
      logger.debug('Redis', 'Error during quit', error instanceof Error ? error.message : error);
    }
    redisClient = null;
    isRedisAvailable = false;
    logger.info('Redis', 'Disconnected');
  }
}

/**
 * Round-trip time of PING in milliseconds, or null when Redis is not connected
 */
export async function pingRedis(): Promise<number | null> {
  if (!redisClient || !isRedisAvailable) {
    return null;
  }
  const started = Date.now();
  await redisClient.ping();
  return Date.now() - started;
}

function resolveClient(client?: CacheClient): CacheClient | null {
  if (client) {
    return client;
  }
  return isRedisAvailable ? redisClient : null;
}

// Values are URI-encoded so `:` and `,` inside them cannot forge another key
function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((item) => encodeURIComponent(String(item))).join(',');
  }
  if (value instanceof Date) {
    return encodeURIComponent(value.toISOString());
  }
  return encodeURIComponent(String(value));
}

/**
 * `prefix:key:value:...` over the non-null params, sorted by key. `prefix:all` when there are none.
 */
export function buildCacheKey(prefix: string, params: Record<string, unknown>): string {
  const parts = Object.keys(params)
    .filter((key) => params[key] !== null && params[key] !== undefined)
    .sort()
    .map((key) => `${key}:${formatValue(params[key])}`);

  return parts.length > 0 ? `${prefix}:${parts.join(':')}` : `${prefix}:all`;
}

export async function getCached(key: string, client?: CacheClient): Promise<unknown> {
  const redis = resolveClient(client);
  if (!redis) {
    return null;
  }
  try {
    const raw = await redis.get(key);
    return raw === null ? null : JSON.parse(raw);
  } catch (error) {
    logger.warn('Cache', `Read failed for ${key}`, error instanceof Error ? error.message : error);
    return null;
  }
}

export async function setCached(
  key: string,
  value: unknown,
  ttlSeconds: number = config.CACHE_TTL_SECONDS,
  client?: CacheClient
): Promise<void> {
  const redis = resolveClient(client);
  if (!redis) {
    return;
  }
  try {
    await redis.set(key, JSON.stringify(value), 'EX', ttlSeconds);
  } catch (error) {
    logger.warn('Cache', `Write failed for ${key}`, error instanceof Error ? error.message : error);
  }
}

/**
 * Delete every key under `prefix:`. Returns the number of keys removed.
 */
export async function invalidatePrefix(prefix: string, client?: CacheClient): Promise<number> {
  const redis = resolveClient(client);
  if (!redis) {
    return 0;
  }

  let removed = 0;
  try {
    let cursor = '0';
    do {
      const [next, keys] = await redis.scan(cursor, 'MATCH', `${prefix}:*`, 'COUNT', 100);
      if (keys.length > 0) {
        removed += await redis.del(...keys);
      }
      cursor = next;
    } while (cursor !== '0');

    logger.debug('Cache', `Invalidated ${removed} keys under ${prefix}`);
  } catch (error) {
    logger.warn('Cache', `Invalidation failed for ${prefix}`, error instanceof Error ? error.message : error);
  }
  return removed;
}

/**
 * Serve from cache when possible, otherwise build and store
 */
export async function cachedJson(key: string, build: () => Promise<unknown>, client?: CacheClient): Promise<unknown> {
  const hit = await getCached(key, client);
  if (hit !== null) {
    logger.debug('Cache', `Hit ${key}`);
    return hit;
  }

  const value = await build();
  await setCached(key, value, config.CACHE_TTL_SECONDS, client);
  return value;
}
