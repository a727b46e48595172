/**
 * Redis backend and shared connection lifecycle.
 *
 * @packageDocumentation
 */

export { connectRedis, formatRedisAddress } from './connection.js';
export { createRedisCache } from './redis-cache.js';
export type {
  RedisCommands,
  RedisConnection,
  RedisConnectionConfig,
  RedisCacheOptions,
} from './types.js';
