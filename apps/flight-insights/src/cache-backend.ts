import { ok, type Result } from 'neverthrow';
import {
  connectRedis,
  createMemoryCache,
  createRedisCache,
  minutesToMs,
} from '@flight-insights/result-cache';
import type { Cache, CacheError, Logger } from '@flight-insights/result-cache';
import type { AppConfig } from './config.js';

/**
 * An open cache and the way to release it.
 */
export interface CacheBackend {
  readonly cache: Cache;
  readonly close: () => Promise<void>;
}

/**
 * Opens the configured cache backend.
 *
 * The Redis backend connects and verifies the server before returning;
 * a CONNECTION_ERROR here is fatal for the caller. The memory backend
 * cannot fail.
 */
export const openCacheBackend = async (
  config: Pick<AppConfig, 'redis' | 'cache'>,
  logger: Logger
): Promise<Result<CacheBackend, CacheError>> => {
  const defaultTtlMs = minutesToMs(config.cache.expInMins);

  if (config.cache.backend === 'memory') {
    logger.info('Using in-memory cache');
    return ok({
      cache: createMemoryCache({ defaultTtlMs, logger }),
      close: () => Promise.resolve(),
    });
  }

  const connection = await connectRedis(config.redis, logger);
  return connection.map((open) => ({
    cache: createRedisCache({ client: open.commands, defaultTtlMs, logger }),
    close: open.close,
  }));
};
