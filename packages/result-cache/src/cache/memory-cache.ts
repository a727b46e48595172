import { ok, err, type Result } from 'neverthrow';
import type { Cache, CacheEntry, CacheError, CacheValue } from './types.js';
import type { Logger } from '../logging/types.js';
import { serializeValue, deserializeValue } from './codec.js';
import { formatTtlMinutes } from './ttl.js';
import { createSilentLogger } from '../logging/logger.js';

/** Default TTL: 1 minute */
const DEFAULT_TTL_MS = 60 * 1000;

/**
 * Options for creating an in-memory cache.
 */
export interface MemoryCacheOptions {
  /** Default TTL in milliseconds (default: 1 minute) */
  readonly defaultTtlMs?: number;
  /** Logger for hits, misses and stores (default: silent) */
  readonly logger?: Logger;
}

/**
 * Creates an in-process cache with TTL support.
 *
 * Values go through the same codec as the Redis backend, so a value read
 * back is a fresh copy and never aliases the stored one.
 *
 * @param options - Optional cache configuration
 * @returns A Cache instance
 *
 * @example
 * ```typescript
 * const cache = createMemoryCache({ defaultTtlMs: 60_000 });
 * await cache.set('key', 42);
 * const result = await cache.get('key'); // ok(42)
 * ```
 */
export const createMemoryCache = (options: MemoryCacheOptions = {}): Cache => {
  const { defaultTtlMs = DEFAULT_TTL_MS, logger = createSilentLogger() } = options;
  const store = new Map<string, CacheEntry>();

  const get = (key: string): Promise<Result<CacheValue | undefined, CacheError>> => {
    const entry = store.get(key);
    if (entry !== undefined && Date.now() > entry.expiresAt) {
      store.delete(key);
    }

    const live = store.get(key);
    if (live === undefined) {
      logger.info(`No entry found for key [${key}]`);
      return Promise.resolve(ok(undefined));
    }

    const decoded = deserializeValue(live.payload);
    if (decoded.isErr()) {
      return Promise.resolve(err(decoded.error));
    }

    logger.info(`Cache hit for key [${key}]`);
    return Promise.resolve(ok(decoded.value));
  };

  const set = (key: string, value: CacheValue, ttlMs?: number): Promise<Result<void, CacheError>> => {
    const payload = serializeValue(value);
    if (payload.isErr()) {
      return Promise.resolve(err(payload.error));
    }

    const now = Date.now();

    // Prune expired entries
    for (const [k, entry] of store.entries()) {
      if (now > entry.expiresAt) {
        store.delete(k);
      }
    }

    const effectiveTtlMs = ttlMs ?? defaultTtlMs;
    store.set(key, { payload: payload.value, expiresAt: now + effectiveTtlMs });
    logger.info(`Stored key [${key}] with expiration of ${formatTtlMinutes(effectiveTtlMs)} minutes`);
    return Promise.resolve(ok(undefined));
  };

  const deleteKey = (key: string): Promise<Result<boolean, CacheError>> => {
    const entry = store.get(key);
    const existed = entry !== undefined && Date.now() <= entry.expiresAt;
    store.delete(key);
    return Promise.resolve(ok(existed));
  };

  const clear = (): Promise<Result<void, CacheError>> => {
    store.clear();
    logger.info('Cleared all keys from memory cache');
    return Promise.resolve(ok(undefined));
  };

  return {
    get,
    set,
    delete: deleteKey,
    clear,
  };
};
