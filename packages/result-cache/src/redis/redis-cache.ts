import { ok, err, type Result } from 'neverthrow';
import type { Cache, CacheError, CacheValue } from '../cache/types.js';
import type { RedisCacheOptions } from './types.js';
import { serializeValue, deserializeValue } from '../cache/codec.js';
import { createReadError, createWriteError } from '../cache/errors.js';
import { formatTtlMinutes } from '../cache/ttl.js';

/**
 * Creates a cache backed by Redis with native per-key expiration.
 *
 * Every operation returns a Result; Redis failures become READ_ERROR or
 * WRITE_ERROR values and never escape as exceptions.
 *
 * @param options - Redis commands, default TTL and logger
 * @returns A Cache instance
 *
 * @example
 * ```typescript
 * const cache = createRedisCache({
 *   client: connection.commands,
 *   defaultTtlMs: minutesToMs(config.cacheExpInMins),
 *   logger,
 * });
 * ```
 */
export const createRedisCache = (options: RedisCacheOptions): Cache => {
  const { client, defaultTtlMs, logger } = options;

  const get = async (key: string): Promise<Result<CacheValue | undefined, CacheError>> => {
    let payload: string | null;
    try {
      payload = await client.get(key);
    } catch (error) {
      return err(createReadError(key, error));
    }

    if (payload === null) {
      logger.info(`No entry found for key [${key}]`);
      return ok(undefined);
    }

    const decoded = deserializeValue(payload);
    if (decoded.isErr()) {
      return err(decoded.error);
    }

    logger.info(`Cache hit for key [${key}]`);
    return ok(decoded.value);
  };

  const set = async (
    key: string,
    value: CacheValue,
    ttlMs?: number
  ): Promise<Result<void, CacheError>> => {
    const payload = serializeValue(value);
    if (payload.isErr()) {
      return err(payload.error);
    }

    const effectiveTtlMs = ttlMs ?? defaultTtlMs;
    try {
      await client.setWithTtl(key, payload.value, effectiveTtlMs);
    } catch (error) {
      return err(createWriteError(key, error));
    }

    logger.info(`Stored key [${key}] with expiration of ${formatTtlMinutes(effectiveTtlMs)} minutes`);
    return ok(undefined);
  };

  const deleteKey = async (key: string): Promise<Result<boolean, CacheError>> => {
    try {
      const removed = await client.del(key);
      return ok(removed > 0);
    } catch (error) {
      return err(createWriteError(key, error));
    }
  };

  const clear = async (): Promise<Result<void, CacheError>> => {
    try {
      await client.flushdb();
    } catch (error) {
      return err(createWriteError('*', error));
    }
    logger.info('Cleared all keys from Redis');
    return ok(undefined);
  };

  return {
    get,
    set,
    delete: deleteKey,
    clear,
  };
};
