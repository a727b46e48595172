import type { Logger } from '../logging/types.js';

/**
 * The Redis commands the cache backend needs.
 * A seam over the ioredis client so tests can run against an in-process fake.
 */
export interface RedisCommands {
  /** GET: the stored string, or null when the key is absent or expired */
  readonly get: (key: string) => Promise<string | null>;
  /** SET key value PX ttlMs */
  readonly setWithTtl: (key: string, value: string, ttlMs: number) => Promise<void>;
  /** DEL: number of keys removed */
  readonly del: (key: string) => Promise<number>;
  /** FLUSHDB on the selected database */
  readonly flushdb: () => Promise<void>;
}

/**
 * Where to find the Redis server.
 */
export interface RedisConnectionConfig {
  readonly host: string;
  readonly port: number;
  /** Database index */
  readonly db: number;
  /** Per-command timeout in milliseconds (default: none) */
  readonly commandTimeoutMs?: number | undefined;
}

/**
 * The process-wide Redis connection.
 * Created once at startup, shared by every cache user, closed at shutdown.
 */
export interface RedisConnection {
  readonly commands: RedisCommands;
  /** Human-readable address, e.g. "localhost:6379/0" */
  readonly address: string;
  /** Sends QUIT and waits for the server to close the connection */
  readonly close: () => Promise<void>;
}

/**
 * Options for creating a Redis-backed cache.
 */
export interface RedisCacheOptions {
  /** Redis commands, usually `connection.commands` */
  readonly client: RedisCommands;
  /** TTL applied to every set without an explicit override */
  readonly defaultTtlMs: number;
  /** Logger for hits, misses and stores */
  readonly logger: Logger;
}
