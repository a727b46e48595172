import { Redis } from 'ioredis';
import { ok, err, type Result } from 'neverthrow';
import type { CacheError } from '../cache/types.js';
import type { Logger } from '../logging/types.js';
import type { RedisCommands, RedisConnection, RedisConnectionConfig } from './types.js';
import { createConnectionError, describeCause } from '../cache/errors.js';

/**
 * Wraps an ioredis client in the narrow command set the cache uses.
 */
const toCommands = (redis: Redis): RedisCommands => ({
  get: (key) => redis.get(key),
  setWithTtl: async (key, value, ttlMs) => {
    // PX takes whole milliseconds
    await redis.set(key, value, 'PX', Math.max(1, Math.round(ttlMs)));
  },
  del: (key) => redis.del(key),
  flushdb: async () => {
    await redis.flushdb();
  },
});

/**
 * Formats a connection config as `host:port/db`.
 */
export const formatRedisAddress = (config: RedisConnectionConfig): string =>
  `${config.host}:${String(config.port)}/${String(config.db)}`;

/**
 * Opens the shared Redis connection and verifies it with PING.
 *
 * Fails fast: there is no retry and no offline queue, so an unreachable
 * server yields a CONNECTION_ERROR immediately. Callers treat that as fatal.
 *
 * @param config - Redis host, port and database index
 * @param logger - Logger for connection lifecycle events
 * @returns Result with the open connection or a CONNECTION_ERROR
 *
 * @example
 * ```typescript
 * const connection = await connectRedis({ host: 'localhost', port: 6379, db: 0 }, logger);
 * if (connection.isErr()) {
 *   process.exitCode = 1;
 *   return;
 * }
 * const cache = createRedisCache({ client: connection.value.commands, defaultTtlMs, logger });
 * ```
 */
export const connectRedis = async (
  config: RedisConnectionConfig,
  logger: Logger
): Promise<Result<RedisConnection, CacheError>> => {
  const address = formatRedisAddress(config);
  const redis = new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    retryStrategy: () => null,
    ...(config.commandTimeoutMs !== undefined ? { commandTimeout: config.commandTimeoutMs } : {}),
  });

  // Without a listener ioredis reports socket errors as unhandled 'error' events
  redis.on('error', (error: unknown) => {
    logger.debug(`Redis client error (${address}): ${describeCause(error)}`);
  });

  try {
    await redis.connect();
    await redis.ping();
  } catch (error) {
    redis.disconnect();
    return err(
      createConnectionError(`Could not connect to Redis at ${address}: ${describeCause(error)}`, error)
    );
  }

  logger.info(`Successfully connected to Redis at ${address}`);

  const close = async (): Promise<void> => {
    await redis.quit();
    logger.info(`Closed Redis connection to ${address}`);
  };

  return ok({ commands: toCommands(redis), address, close });
};
