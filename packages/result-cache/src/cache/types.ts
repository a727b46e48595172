import type { Result } from 'neverthrow';

/**
 * Values a cache can hold: JSON-compatible data.
 * Numbers may be non-finite; the codec preserves them.
 * `undefined` is never stored, it marks an absent entry.
 */
export type CacheValue =
  | string
  | number
  | boolean
  | null
  | readonly CacheValue[]
  | { readonly [key: string]: CacheValue };

/**
 * Error codes reported by cache backends.
 */
export type CacheErrorCode =
  | 'CONNECTION_ERROR'
  | 'READ_ERROR'
  | 'WRITE_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'DESERIALIZATION_ERROR';

/**
 * Error returned (never thrown) by cache operations.
 */
export interface CacheError {
  readonly code: CacheErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Backend-agnostic cache with per-entry expiration.
 */
export interface Cache {
  /**
   * Gets a value from the cache.
   * @param key - The cache key
   * @returns The cached value, or undefined if not found/expired
   */
  readonly get: (key: string) => Promise<Result<CacheValue | undefined, CacheError>>;

  /**
   * Sets a value in the cache, overwriting any existing entry.
   * @param key - The cache key
   * @param value - The value to cache
   * @param ttlMs - Optional TTL in milliseconds (overrides the backend default)
   */
  readonly set: (key: string, value: CacheValue, ttlMs?: number) => Promise<Result<void, CacheError>>;

  /**
   * Deletes a value from the cache.
   * @param key - The cache key
   * @returns true if the key existed, false otherwise
   */
  readonly delete: (key: string) => Promise<Result<boolean, CacheError>>;

  /**
   * Clears all values from the cache.
   */
  readonly clear: () => Promise<Result<void, CacheError>>;
}

/**
 * Internal cache entry with expiration timestamp.
 */
export interface CacheEntry {
  readonly payload: string;
  readonly expiresAt: number;
}
