/** Milliseconds in one minute */
export const ONE_MINUTE_MS = 60 * 1000;

/**
 * Converts a TTL in minutes to milliseconds.
 */
export const minutesToMs = (minutes: number): number => minutes * ONE_MINUTE_MS;

/**
 * Formats a TTL for log lines, in minutes with at most two decimals.
 *
 * @example
 * ```typescript
 * formatTtlMinutes(60_000); // '1'
 * formatTtlMinutes(90_000); // '1.5'
 * ```
 */
export const formatTtlMinutes = (ttlMs: number): string =>
  String(Math.round((ttlMs / ONE_MINUTE_MS) * 100) / 100);
