import type { CacheError } from './types.js';

/**
 * Extracts a readable message from an unknown thrown value.
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === 'string' ? cause : 'Unknown error';
};

/**
 * Creates a CacheError for a backend that could not be reached.
 *
 * @param message - Error message
 * @param cause - Original error
 * @returns A CacheError object
 */
export const createConnectionError = (message: string, cause?: unknown): CacheError => ({
  code: 'CONNECTION_ERROR',
  message,
  cause,
});

/**
 * Creates a CacheError for a failed read.
 *
 * @param key - The key being read
 * @param cause - Original error
 * @returns A CacheError object
 */
export const createReadError = (key: string, cause?: unknown): CacheError => ({
  code: 'READ_ERROR',
  message: `Failed to read key [${key}]: ${describeCause(cause)}`,
  cause,
});

/**
 * Creates a CacheError for a failed write or delete.
 *
 * @param key - The key being written
 * @param cause - Original error
 * @returns A CacheError object
 */
export const createWriteError = (key: string, cause?: unknown): CacheError => ({
  code: 'WRITE_ERROR',
  message: `Failed to write key [${key}]: ${describeCause(cause)}`,
  cause,
});

/**
 * Creates a CacheError for a value the codec cannot encode.
 */
export const createSerializationError = (message: string, cause?: unknown): CacheError => ({
  code: 'SERIALIZATION_ERROR',
  message,
  cause,
});

/**
 * Creates a CacheError for stored data the codec cannot decode.
 */
export const createDeserializationError = (message: string, cause?: unknown): CacheError => ({
  code: 'DESERIALIZATION_ERROR',
  message,
  cause,
});
