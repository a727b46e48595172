/**
 * Result cache - function-result caching over an expiring key-value store
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Caching Wrapper
// ============================================================================

export { createCacheable, timed, formatElapsedSeconds } from './wrap/index.js';
export type {
  CacheableFn,
  CacheableOptions,
  Clock,
  Computation,
  CreateCacheableConfig,
  TimedOptions,
  WrappedComputation,
} from './wrap/index.js';

// ============================================================================
// CORE: Key Derivation
// ============================================================================

export { deriveCacheKey, KeyDerivationError } from './key/index.js';
export type { KeyArg } from './key/index.js';

// ============================================================================
// CORE: Cache Interface and Backends
// ============================================================================

export {
  createMemoryCache,
  serializeValue,
  deserializeValue,
  minutesToMs,
  formatTtlMinutes,
  ONE_MINUTE_MS,
} from './cache/index.js';
export type {
  Cache,
  CacheEntry,
  CacheError,
  CacheErrorCode,
  CacheValue,
  MemoryCacheOptions,
} from './cache/index.js';

export { connectRedis, createRedisCache, formatRedisAddress } from './redis/index.js';
export type {
  RedisCommands,
  RedisConnection,
  RedisConnectionConfig,
  RedisCacheOptions,
} from './redis/index.js';

// ============================================================================
// ADVANCED: Logging
// ============================================================================

export { createConsoleLogger, createSilentLogger, isLogLevel } from './logging/index.js';
export type { ConsoleLoggerOptions, LogLevel, Logger } from './logging/index.js';
