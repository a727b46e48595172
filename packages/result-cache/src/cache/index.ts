/**
 * Cache interface, value codec and in-memory backend.
 *
 * @packageDocumentation
 */

export { createMemoryCache } from './memory-cache.js';
export type { MemoryCacheOptions } from './memory-cache.js';
export { serializeValue, deserializeValue } from './codec.js';
export {
  createConnectionError,
  createReadError,
  createWriteError,
  createSerializationError,
  createDeserializationError,
} from './errors.js';
export { minutesToMs, formatTtlMinutes, ONE_MINUTE_MS } from './ttl.js';
export type { Cache, CacheEntry, CacheError, CacheErrorCode, CacheValue } from './types.js';
