import { describe, it, expect } from 'vitest';
import { createRecordDataSource, type FlightRecord } from './data-source.js';

const flight = (overrides: Partial<FlightRecord>): FlightRecord => ({
  airline: 'VX',
  departureDelay: 10,
  month: 1,
  originAirport: 'SFO',
  flightNumber: 100,
  ...overrides,
});

const RECORDS: readonly FlightRecord[] = [
  flight({ departureDelay: 20, month: 1, flightNumber: 101 }),
  flight({ departureDelay: -5, month: 6, flightNumber: 102 }),
  flight({ departureDelay: null, month: 7, flightNumber: 101 }),
  flight({ departureDelay: 60, month: 7, originAirport: 'LAX', flightNumber: 103 }),
  flight({ airline: 'AA', departureDelay: 0, month: 6, flightNumber: 201 }),
];

describe('createRecordDataSource', () => {
  const source = createRecordDataSource(RECORDS);

  describe('filters', () => {
    it('filters by airline', () => {
      expect(source.filterByAirline('AA').size()).toBe(1);
      expect(source.filterByAirline('ZZ').isEmpty()).toBe(true);
    });

    it('filters by months', () => {
      expect(source.filterByMonths([6, 7]).size()).toBe(4);
    });

    it('keeps only recorded positive delays', () => {
      expect(source.filterPositiveDelays().size()).toBe(2);
    });

    it('filters by origin airport', () => {
      expect(source.filterByOriginAirport('LAX').size()).toBe(1);
    });

    it('leaves the receiver untouched', () => {
      source.filterByAirline('AA').filterByMonths([6]);

      expect(source.size()).toBe(RECORDS.length);
    });
  });

  describe('aggregations', () => {
    it('averages recorded values, ignoring missing ones', () => {
      // (20 + -5 + 60 + 0) / 4
      expect(source.mean('departureDelay')).toBe(18.75);
    });

    it('returns the largest recorded value', () => {
      expect(source.max('departureDelay')).toBe(60);
    });

    it('counts distinct values', () => {
      expect(source.countUnique('flightNumber')).toBe(4);
      expect(source.countUnique('airline')).toBe(2);
    });

    it('returns NaN for mean and max of no values', () => {
      const none = source.filterByAirline('ZZ');

      expect(none.mean('departureDelay')).toBeNaN();
      expect(none.max('departureDelay')).toBeNaN();
    });

    it('returns NaN when every value is missing', () => {
      const missing = createRecordDataSource([flight({ departureDelay: null })]);

      expect(missing.mean('departureDelay')).toBeNaN();
      expect(missing.max('departureDelay')).toBeNaN();
    });
  });
});
