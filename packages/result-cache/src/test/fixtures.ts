/**
 * Shared test fixtures and constants.
 */

import type { CacheError } from '../cache/types.js';
import { ONE_MINUTE_MS } from '../cache/ttl.js';

// ============================================================================
// Time Constants
// ============================================================================

/** Default TTL used by the backends under test */
export const TEST_TTL_MS = 5 * ONE_MINUTE_MS;

/** Fixed wall-clock start for fake timers */
export const FIXED_NOW = new Date('2026-01-15T09:30:00.000Z');

// ============================================================================
// Keys and Values
// ============================================================================

export const TEST_FUNCTION_NAME = 'FlightInsights.avgDepDelayPerAirline';
export const TEST_KEY = `${TEST_FUNCTION_NAME}("VX")`;
export const TEST_SUMMER_KEY = `${TEST_FUNCTION_NAME}("VX",[6,7,8])`;

/** A floating-point aggregate with a long decimal expansion */
export const TEST_AVERAGE_DELAY = 30.123456789012345;

/** An integer count */
export const TEST_FLIGHT_COUNT = 1234;

// ============================================================================
// Errors
// ============================================================================

export const TEST_READ_ERROR: CacheError = {
  code: 'READ_ERROR',
  message: 'Failed to read key [x]: Connection reset',
};

export const TEST_WRITE_ERROR: CacheError = {
  code: 'WRITE_ERROR',
  message: 'Failed to write key [x]: OOM command not allowed',
};
