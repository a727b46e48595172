import { z } from 'zod';
import { timed } from '@flight-insights/result-cache';
import type {
  CacheableFn,
  CacheValue,
  Clock,
  Computation,
  KeyArg,
  Logger,
  WrappedComputation,
} from '@flight-insights/result-cache';
import type { FlightDataSource } from './data-source.js';

/**
 * Thrown for an invalid query or a query that matches no flights.
 */
export class InsightsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InsightsError';
  }
}

/**
 * Flight delay and volume queries.
 * Every query is async because it may be served from the cache.
 */
export interface FlightInsights {
  /**
   * Mean of the positive departure delays, in minutes.
   * NaN when the airline has flights but none departed late.
   */
  readonly avgDepDelayPerAirline: (airline: string, months?: readonly number[]) => Promise<number>;
  /** Largest positive departure delay, in minutes; NaN when none departed late */
  readonly maxDepDelayPerAirline: (airline: string, months?: readonly number[]) => Promise<number>;
  /** Number of distinct flight numbers departing from the airport */
  readonly totalFlightsPerOriginAirport: (airport: string) => Promise<number>;
}

export interface FlightInsightsConfig {
  readonly dataSource: FlightDataSource;
  readonly logger: Logger;
  /** Caching wrapper; omit to compute every call */
  readonly cacheable?: CacheableFn;
  /** Clock for the timing log lines when no cacheable is given */
  readonly clock?: Clock;
}

export const QUERY_NAMES = {
  avgDepDelayPerAirline: 'FlightInsights.avgDepDelayPerAirline',
  maxDepDelayPerAirline: 'FlightInsights.maxDepDelayPerAirline',
  totalFlightsPerOriginAirport: 'FlightInsights.totalFlightsPerOriginAirport',
} as const;

const delaySchema = z.number().or(z.nan());
const countSchema = z.number().int().nonnegative();

/**
 * Validates months and removes duplicates, keeping first occurrences.
 */
const normalizeMonths = (months: readonly number[]): number[] => {
  if (!months.every((month) => Number.isInteger(month) && month >= 1 && month <= 12)) {
    throw new InsightsError('Months must be integers between 1 and 12');
  }
  return [...new Set(months)];
};

const requireName = (value: string, label: string): void => {
  if (value.trim().length === 0) {
    throw new InsightsError(`${label} name cannot be empty`);
  }
};

/**
 * Creates the flight insights queries over a data source.
 *
 * With a cacheable, each query is cached under its `FlightInsights.<query>`
 * name and the caller's arguments. Without one, each query is only timed.
 *
 * @example
 * ```typescript
 * const insights = createFlightInsights({
 *   dataSource: await loadFlightsCsv('data/flights.csv', logger),
 *   cacheable: createCacheable({ cache, logger }),
 *   logger,
 * });
 *
 * await insights.avgDepDelayPerAirline('VX', [6, 7, 8]);
 * ```
 */
export const createFlightInsights = (config: FlightInsightsConfig): FlightInsights => {
  const { dataSource, logger, cacheable, clock } = config;

  const wrap = <TArgs extends readonly KeyArg[], TResult extends CacheValue>(
    name: string,
    schema: z.ZodType<TResult, z.ZodTypeDef, unknown>,
    fn: Computation<TArgs, TResult>
  ): WrappedComputation<TArgs, TResult> =>
    cacheable !== undefined
      ? cacheable({ name, schema }, fn)
      : timed(name, fn, { logger, ...(clock !== undefined ? { clock } : {}) });

  const airlineFlights = (airline: string, months: readonly number[] | undefined): FlightDataSource => {
    requireName(airline, 'Airline');
    const wanted = months !== undefined && months.length > 0 ? normalizeMonths(months) : [];

    let flights = dataSource.filterByAirline(airline);
    if (wanted.length > 0) {
      flights = flights.filterByMonths(wanted);
    }

    if (flights.isEmpty()) {
      const suffix = wanted.length > 0 ? ` with months: [${wanted.join(', ')}]` : '';
      throw new InsightsError(`No data found for airline: ${airline}${suffix}`);
    }
    return flights.filterPositiveDelays();
  };

  return {
    avgDepDelayPerAirline: wrap(
      QUERY_NAMES.avgDepDelayPerAirline,
      delaySchema,
      (airline: string, months?: readonly number[]) =>
        airlineFlights(airline, months).mean('departureDelay')
    ),

    maxDepDelayPerAirline: wrap(
      QUERY_NAMES.maxDepDelayPerAirline,
      delaySchema,
      (airline: string, months?: readonly number[]) =>
        airlineFlights(airline, months).max('departureDelay')
    ),

    totalFlightsPerOriginAirport: wrap(
      QUERY_NAMES.totalFlightsPerOriginAirport,
      countSchema,
      (airport: string) => {
        requireName(airport, 'Airport');
        const flights = dataSource.filterByOriginAirport(airport);
        if (flights.isEmpty()) {
          throw new InsightsError(`No data found for airport: ${airport}`);
        }
        return flights.countUnique('flightNumber');
      }
    ),
  };
};
