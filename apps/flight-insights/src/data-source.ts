/**
 * One flight, in logical attributes.
 * Physical column names live only in the CSV loader.
 */
export interface FlightRecord {
  readonly airline: string;
  /** Minutes; negative for early departures, null when not recorded */
  readonly departureDelay: number | null;
  /** 1-12 */
  readonly month: number;
  readonly originAirport: string;
  readonly flightNumber: number;
}

export type FlightAttribute = keyof FlightRecord;

/**
 * Attributes whose values are numbers (or missing).
 */
export type NumericFlightAttribute = {
  [K in FlightAttribute]: FlightRecord[K] extends number | null ? K : never;
}[FlightAttribute];

/**
 * Immutable, chainable view over flight records.
 * Every filter returns a new data source and leaves the receiver untouched.
 */
export interface FlightDataSource {
  readonly filterByAirline: (airline: string) => FlightDataSource;
  readonly filterByMonths: (months: readonly number[]) => FlightDataSource;
  /** Keeps flights whose departure delay is recorded and greater than zero */
  readonly filterPositiveDelays: () => FlightDataSource;
  readonly filterByOriginAirport: (airport: string) => FlightDataSource;
  /** Mean of the recorded values; NaN when there are none */
  readonly mean: (attribute: NumericFlightAttribute) => number;
  /** Largest recorded value; NaN when there are none */
  readonly max: (attribute: NumericFlightAttribute) => number;
  /** Number of distinct values, missing values excluded */
  readonly countUnique: (attribute: FlightAttribute) => number;
  readonly isEmpty: () => boolean;
  readonly size: () => number;
}

const recordedValues = (
  records: readonly FlightRecord[],
  attribute: NumericFlightAttribute
): number[] => {
  const values: number[] = [];
  for (const record of records) {
    const value = record[attribute];
    if (value !== null) {
      values.push(value);
    }
  }
  return values;
};

/**
 * Creates a data source over records already in memory.
 *
 * @example
 * ```typescript
 * const source = createRecordDataSource(records);
 * const summer = source.filterByAirline('VX').filterByMonths([6, 7, 8]);
 * summer.filterPositiveDelays().mean('departureDelay');
 * ```
 */
export const createRecordDataSource = (records: readonly FlightRecord[]): FlightDataSource => {
  const where = (predicate: (record: FlightRecord) => boolean): FlightDataSource =>
    createRecordDataSource(records.filter(predicate));

  return {
    filterByAirline: (airline) => where((record) => record.airline === airline),

    filterByMonths: (months) => {
      const wanted = new Set(months);
      return where((record) => wanted.has(record.month));
    },

    filterPositiveDelays: () =>
      where((record) => record.departureDelay !== null && record.departureDelay > 0),

    filterByOriginAirport: (airport) => where((record) => record.originAirport === airport),

    mean: (attribute) => {
      const values = recordedValues(records, attribute);
      if (values.length === 0) {
        return Number.NaN;
      }
      return values.reduce((sum, value) => sum + value, 0) / values.length;
    },

    max: (attribute) => {
      const values = recordedValues(records, attribute);
      if (values.length === 0) {
        return Number.NaN;
      }
      // reduce rather than spread: datasets can exceed the argument limit
      return values.reduce((largest, value) => (value > largest ? value : largest), -Infinity);
    },

    countUnique: (attribute) => {
      const distinct = new Set<string | number>();
      for (const record of records) {
        const value = record[attribute];
        if (value !== null) {
          distinct.add(value);
        }
      }
      return distinct.size;
    },

    isEmpty: () => records.length === 0,

    size: () => records.length,
  };
};
