import { createCacheable, createConsoleLogger } from '@flight-insights/result-cache';
import type { Logger } from '@flight-insights/result-cache';
import { loadConfig, ConfigError, type AppConfig } from './config.js';
import { openCacheBackend } from './cache-backend.js';
import { loadFlightsCsv } from './csv-data-source.js';
import { createFlightInsights } from './flight-insights.js';

// ============================================================================
// Types
// ============================================================================

export interface RunOptions {
  /** Environment to configure from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** Logger override; by default a console logger at LOG_LEVEL */
  readonly logger?: Logger;
  /** Where result lines go (default: stdout) */
  readonly print?: (line: string) => void;
  /** Backend opener override */
  readonly openBackend?: typeof openCacheBackend;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Formats minutes as a whole number, truncating toward zero.
 * Non-finite values (no late departures) print as "n/a".
 */
export const formatWholeMinutes = (value: number): string =>
  Number.isFinite(value) ? String(Math.trunc(value)) : 'n/a';

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// ============================================================================
// Run
// ============================================================================

/**
 * Runs the demo queries against the configured cache backend.
 *
 * @returns Process exit code: 0 on success, 1 on any fatal error
 */
export async function runFlightInsights(options: RunOptions = {}): Promise<number> {
  const {
    env = process.env,
    print = (line: string) => {
      process.stdout.write(`${line}\n`);
    },
    openBackend = openCacheBackend,
  } = options;

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    const logger = options.logger ?? createConsoleLogger();
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const logger = options.logger ?? createConsoleLogger({ level: config.logLevel });

  const backend = await openBackend(config, logger);
  if (backend.isErr()) {
    logger.error(backend.error.message);
    return 1;
  }

  try {
    const dataSource = await loadFlightsCsv(config.flightsCsvPath, logger);
    const insights = createFlightInsights({
      dataSource,
      logger,
      cacheable: createCacheable({ cache: backend.value.cache, logger }),
    });

    const average = await insights.avgDepDelayPerAirline('VX');
    print(`Average departure delay for VX airline: ${formatWholeMinutes(average)} minutes`);

    const summerAverage = await insights.avgDepDelayPerAirline('VX', [6, 7, 8]);
    print(
      `Average departure delay for VX airline in summer months (Jun, Jul, Aug): ${formatWholeMinutes(summerAverage)} minutes`
    );

    const max = await insights.maxDepDelayPerAirline('VX');
    print(`Max departure delay for VX airline: ${formatWholeMinutes(max)} minutes`);

    const decemberMax = await insights.maxDepDelayPerAirline('VX', [12]);
    print(`Max departure delay for VX airline in December: ${formatWholeMinutes(decemberMax)} minutes`);

    const sfoFlights = await insights.totalFlightsPerOriginAirport('SFO');
    print(`Total flights for SFO airport: ${String(sfoFlights)}`);

    return 0;
  } catch (error) {
    logger.error(`An error occurred: ${describeError(error)}`);
    return 1;
  } finally {
    await backend.value.close();
  }
}
