import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { Logger } from '@flight-insights/result-cache';
import type { FlightAttribute, FlightDataSource, FlightRecord } from './data-source.js';
import { createRecordDataSource } from './data-source.js';

/**
 * Physical CSV column for each logical attribute.
 */
export const COLUMN_MAPPING = {
  airline: 'AIRLINE',
  departureDelay: 'DEPARTURE_DELAY',
  month: 'MONTH',
  originAirport: 'ORIGIN_AIRPORT',
  flightNumber: 'FLIGHT_NUMBER',
} as const satisfies Record<FlightAttribute, string>;

/**
 * Thrown when the CSV is missing a column or holds a malformed row.
 */
export class FlightDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FlightDataError';
  }
}

const emptyToNull = (value: unknown): unknown =>
  typeof value === 'string' && value.length === 0 ? null : value;

const flightRowSchema = z.object({
  [COLUMN_MAPPING.airline]: z.string().min(1),
  [COLUMN_MAPPING.departureDelay]: z.preprocess(emptyToNull, z.coerce.number().finite().nullable()),
  [COLUMN_MAPPING.month]: z.coerce.number().int().min(1).max(12),
  [COLUMN_MAPPING.originAirport]: z.string().min(1),
  [COLUMN_MAPPING.flightNumber]: z.coerce.number().int().nonnegative(),
});

const csvRowsSchema = z.array(z.record(z.string(), z.string()));

/**
 * Parses flight CSV text into a data source.
 *
 * Columns other than the five mapped ones are ignored. An empty
 * DEPARTURE_DELAY is kept as a missing value.
 *
 * @param text - CSV text with a header row
 * @returns Data source over every row
 * @throws FlightDataError on the first malformed row
 */
export const parseFlightsCsv = (text: string): FlightDataSource => {
  const parsed: unknown = parse(text, { columns: true, skip_empty_lines: true, trim: true });
  const rows = csvRowsSchema.parse(parsed);

  const records = rows.map((row, index): FlightRecord => {
    const result = flightRowSchema.safeParse(row);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new FlightDataError(`Invalid flight row ${String(index + 1)}: ${details}`, {
        cause: result.error,
      });
    }
    const data = result.data;
    return {
      airline: data[COLUMN_MAPPING.airline],
      departureDelay: data[COLUMN_MAPPING.departureDelay],
      month: data[COLUMN_MAPPING.month],
      originAirport: data[COLUMN_MAPPING.originAirport],
      flightNumber: data[COLUMN_MAPPING.flightNumber],
    };
  });

  return createRecordDataSource(records);
};

/**
 * Reads and parses the flights CSV file.
 *
 * @param path - CSV path, relative to the working directory or absolute
 * @param logger - Logger for load progress
 */
export const loadFlightsCsv = async (path: string, logger: Logger): Promise<FlightDataSource> => {
  logger.info('Loading flights data...');
  const text = await readFile(path, 'utf8');
  const source = parseFlightsCsv(text);
  logger.info(`Finished loading flights data (${String(source.size())} rows)`);
  return source;
};
