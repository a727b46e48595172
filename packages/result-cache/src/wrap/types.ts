import type { z } from 'zod';
import type { Cache, CacheValue } from '../cache/types.js';
import type { KeyArg } from '../key/derive-key.js';
import type { Logger } from '../logging/types.js';

/**
 * Monotonic clock in milliseconds.
 */
export type Clock = () => number;

/**
 * A computation that may be sync or async.
 */
export type Computation<TArgs extends readonly unknown[], TResult> = (
  ...args: TArgs
) => TResult | Promise<TResult>;

/**
 * The async function a wrapper returns.
 */
export type WrappedComputation<TArgs extends readonly unknown[], TResult> = (
  ...args: TArgs
) => Promise<TResult>;

/**
 * Options for the timing wrapper.
 */
export interface TimedOptions {
  readonly logger: Logger;
  /** Clock for elapsed time (default: performance.now) */
  readonly clock?: Clock;
}

/**
 * Configuration for creating a caching wrapper.
 */
export interface CreateCacheableConfig {
  /** Cache consulted by every wrapped function */
  readonly cache: Cache;
  readonly logger: Logger;
  /**
   * TTL for stored results in milliseconds.
   * Omit to use the cache backend's global default.
   */
  readonly ttlMs?: number;
  /** Clock for elapsed time (default: performance.now) */
  readonly clock?: Clock;
}

/**
 * Per-function caching options.
 */
export interface CacheableOptions<TResult extends CacheValue> {
  /** Stable identifier used as the key prefix, e.g. "FlightInsights.avgDepDelayPerAirline" */
  readonly name: string;
  /**
   * Shape of the function's result.
   * Cached values that fail validation are treated as a miss.
   */
  readonly schema: z.ZodType<TResult, z.ZodTypeDef, unknown>;
  /** TTL override for this function in milliseconds */
  readonly ttlMs?: number;
}

/**
 * Type for the cacheable function returned by createCacheable.
 */
export type CacheableFn = <TArgs extends readonly KeyArg[], TResult extends CacheValue>(
  options: CacheableOptions<TResult>,
  fn: Computation<TArgs, TResult>
) => WrappedComputation<TArgs, TResult>;
