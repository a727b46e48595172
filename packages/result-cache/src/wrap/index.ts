/**
 * Function wrappers: result caching and timing.
 *
 * @packageDocumentation
 */

export { createCacheable } from './cacheable.js';
export { timed, formatElapsedSeconds } from './timed.js';
export type {
  CacheableFn,
  CacheableOptions,
  Clock,
  Computation,
  CreateCacheableConfig,
  TimedOptions,
  WrappedComputation,
} from './types.js';
