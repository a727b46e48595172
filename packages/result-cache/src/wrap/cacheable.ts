import type { CacheValue } from '../cache/types.js';
import type { KeyArg } from '../key/derive-key.js';
import type {
  CacheableFn,
  CacheableOptions,
  Computation,
  CreateCacheableConfig,
  WrappedComputation,
} from './types.js';
import { deriveCacheKey } from '../key/derive-key.js';
import { timed } from './timed.js';

/**
 * Creates a cacheable wrapper bound to a specific cache.
 *
 * Wrapped functions derive a key from their name and arguments, return the
 * cached result on a hit without running, and compute then store on a miss.
 * Cache faults never reach the caller: a failed read counts as a miss and a
 * failed write is logged. Errors thrown by the wrapped function propagate
 * and nothing is stored for that call. Every call is timed.
 *
 * Only wrap pure functions: a hit skips execution entirely.
 *
 * @param config - Cache, logger and optional TTL/clock
 * @returns A cacheable function for wrapping computations
 *
 * @example
 * ```typescript
 * const cacheable = createCacheable({ cache, logger });
 *
 * const avgDelay = cacheable(
 *   { name: 'FlightInsights.avgDepDelayPerAirline', schema: z.number() },
 *   (airline: string, months?: readonly number[]) => computeAverage(airline, months)
 * );
 *
 * await avgDelay('VX'); // computes and stores
 * await avgDelay('VX'); // served from the cache
 * ```
 */
export const createCacheable = (config: CreateCacheableConfig): CacheableFn => {
  const { cache, logger, ttlMs: defaultTtlMs, clock } = config;

  const cacheable = <TArgs extends readonly KeyArg[], TResult extends CacheValue>(
    options: CacheableOptions<TResult>,
    fn: Computation<TArgs, TResult>
  ): WrappedComputation<TArgs, TResult> => {
    const { name, schema, ttlMs = defaultTtlMs } = options;

    const lookup = async (...args: TArgs): Promise<TResult> => {
      const key = deriveCacheKey(name, args);

      const cached = await cache.get(key);
      if (cached.isErr()) {
        logger.warn(`Cache read failed for key [${key}], computing instead: ${cached.error.message}`);
      } else if (cached.value !== undefined) {
        const parsed = schema.safeParse(cached.value);
        if (parsed.success) {
          logger.debug(`Returning cached result for key [${key}]`);
          return parsed.data;
        }
        logger.warn(`Cached value for key [${key}] has an unexpected shape, recomputing`);
      }

      const result = await fn(...args);

      const stored = await cache.set(key, result, ttlMs);
      if (stored.isErr()) {
        logger.warn(`Could not cache result for key [${key}]: ${stored.error.message}`);
      }

      return result;
    };

    return timed(name, lookup, { logger, ...(clock !== undefined ? { clock } : {}) });
  };

  return cacheable;
};
