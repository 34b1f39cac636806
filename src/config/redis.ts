import { createClient } from 'redis';
import { config } from './env';
import logger from './logger';
import { ConfigError, ExternalServiceError } from '../utils/errors';

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis client singleton backing the session store
 * While the client is (re)connecting callers get an error straight away
 * instead of queueing commands, so the session store can fall back
 */
let redisClient: RedisClient | null = null;
let connecting: Promise<boolean> | null = null;

function startConnecting(): RedisClient {
  const client: RedisClient = createClient({
    url: config.REDIS_URL,
    password: config.REDIS_PASSWORD || undefined,
    database: config.REDIS_DB,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: 2000,
      reconnectStrategy: (retries) => {
        // Exponential backoff capped at 3s; keeps retrying while the service runs degraded
        const delay = Math.min(50 * Math.pow(2, retries), 3000);
        logger.warn({ retries, delay }, 'Reconnecting to Redis');
        return delay;
      },
    },
  });

  client.on('error', (err) => {
    logger.error({ err }, 'Redis client error');
  });

  client.on('ready', () => {
    logger.info('Redis client ready');
  });

  client.on('reconnecting', () => {
    logger.warn('Redis client reconnecting');
  });

  redisClient = client;
  connecting = client
    .connect()
    .then(() => true)
    .catch((error: unknown) => {
      logger.error({ err: error }, 'Failed to initialize Redis client');
      return false;
    });

  return client;
}

/**
 * Get the connected Redis client
 * @throws {ConfigError} If Redis is disabled
 * @throws {ExternalServiceError} If the client is not ready yet or lost its connection
 */
export async function getRedisClient(): Promise<RedisClient> {
  if (!config.REDIS_ENABLED) {
    throw new ConfigError('Redis is disabled in configuration');
  }

  const client = redisClient ?? startConnecting();
  if (!client.isReady) {
    throw new ExternalServiceError('Redis', 'client is not ready');
  }
  return client;
}

/**
 * Open the connection at startup and wait a bounded time for it
 * @param timeoutMs - How long to wait before starting in degraded mode
 */
export async function connectRedis(timeoutMs: number = 3000): Promise<boolean> {
  if (!redisClient) {
    startConnecting();
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([connecting ?? Promise.resolve(false), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Close Redis connection gracefully
 */
export async function closeRedis(): Promise<void> {
  const client = redisClient;
  redisClient = null;
  connecting = null;

  if (!client) {
    return;
  }

  try {
    if (client.isOpen) {
      await client.quit();
    }
    logger.info('Redis client disconnected');
  } catch (error) {
    logger.error({ err: error }, 'Error closing Redis connection');
    await client.disconnect();
  }
}

/**
 * Check if Redis is connected and operational
 */
export async function checkRedisHealth(): Promise<boolean> {
  try {
    const client = await getRedisClient();
    await client.ping();
    return true;
  } catch (error) {
    logger.error({ err: error }, 'Redis health check failed');
    return false;
  }
}
