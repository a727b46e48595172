#!/usr/bin/env node
/**
 * Flight Insights CLI
 *
 * Prints delay and volume statistics for the sample flights dataset,
 * caching each query result in Redis (or memory, with CACHE_BACKEND=memory).
 *
 * Run twice within CACHE_EXP_IN_MINS to see the second run served from the cache.
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { runFlightInsights } from './app.js';

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  process.exitCode = await runFlightInsights();
}

main().catch((error: unknown) => {
  console.error('[flight-insights] Fatal error:', error);
  process.exit(1);
});
