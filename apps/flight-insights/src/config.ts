/**
 * Flight Insights Configuration Module
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { isLogLevel, ONE_MINUTE_MS } from '@flight-insights/result-cache';
import type { LogLevel, RedisConnectionConfig } from '@flight-insights/result-cache';

/**
 * Which cache backend the demo runs against.
 */
export type CacheBackendKind = 'redis' | 'memory';

/**
 * Application configuration, read once at startup.
 */
export interface AppConfig {
  readonly redis: RedisConnectionConfig;
  readonly cache: {
    readonly backend: CacheBackendKind;
    /** Global TTL applied to every cached result */
    readonly expInMins: number;
  };
  /** Path of the flights CSV file */
  readonly flightsCsvPath: string;
  readonly logLevel: LogLevel;
}

/**
 * Thrown when environment variables hold malformed values.
 */
export class ConfigError extends Error {
  /**
   * One entry per invalid variable, e.g. "REDIS_PORT: Expected number, received nan".
   */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const envSchema = z.object({
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  // TTLs are sent to Redis as whole milliseconds (PX)
  CACHE_EXP_IN_MINS: z.coerce
    .number()
    .positive()
    .finite()
    .max(Number.MAX_SAFE_INTEGER / ONE_MINUTE_MS)
    .default(1),
  CACHE_BACKEND: z.enum(['redis', 'memory']).default('redis'),
  FLIGHTS_CSV_PATH: z.string().default('data/flights.csv'),
  LOG_LEVEL: z
    .string()
    .refine(isLogLevel, { message: 'Expected debug, info, warn or error' })
    .default('info'),
});

type EnvKey = keyof z.input<typeof envSchema>;

const ENV_KEYS = Object.keys(envSchema.shape).filter(
  (key): key is EnvKey => key in envSchema.shape
);

/**
 * Creates the application configuration from environment variables.
 *
 * Optional env vars (defaults in parentheses):
 * - REDIS_HOST (localhost), REDIS_PORT (6379), REDIS_DB (0)
 * - REDIS_COMMAND_TIMEOUT_MS (none)
 * - CACHE_EXP_IN_MINS (1): TTL for every cached result
 * - CACHE_BACKEND (redis): "redis" or "memory"
 * - FLIGHTS_CSV_PATH (data/flights.csv)
 * - LOG_LEVEL (info): debug, info, warn or error
 *
 * Empty values count as unset.
 *
 * @param env - Environment to read (default: process.env)
 * @returns The validated configuration
 * @throws ConfigError listing every malformed variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim().length > 0) {
      raw[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      db: vars.REDIS_DB,
      commandTimeoutMs: vars.REDIS_COMMAND_TIMEOUT_MS,
    },
    cache: {
      backend: vars.CACHE_BACKEND,
      expInMins: vars.CACHE_EXP_IN_MINS,
    },
    flightsCsvPath: vars.FLIGHTS_CSV_PATH,
    logLevel: vars.LOG_LEVEL,
  };
}
