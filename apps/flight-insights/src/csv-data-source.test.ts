import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { createRecordingLogger } from '@flight-insights/result-cache/testing';
import { parseFlightsCsv, loadFlightsCsv, FlightDataError } from './csv-data-source.js';

const FIXTURE_PATH = fileURLToPath(new URL('./test/flights.csv', import.meta.url));

const HEADER = 'AIRLINE,DEPARTURE_DELAY,MONTH,ORIGIN_AIRPORT,FLIGHT_NUMBER';

describe('parseFlightsCsv', () => {
  describe('given valid rows', () => {
    it('maps columns to logical attributes', () => {
      const source = parseFlightsCsv(`${HEADER}\nVX,15,6,SFO,820\nVX,-3,6,SFO,821\n`);

      expect(source.size()).toBe(2);
      expect(source.filterPositiveDelays().mean('departureDelay')).toBe(15);
      expect(source.filterByMonths([6]).filterByOriginAirport('SFO').size()).toBe(2);
    });

    it('reads an empty delay as missing', () => {
      const source = parseFlightsCsv(`${HEADER}\nVX,,6,SFO,820\nVX,30,6,SFO,821\n`);

      expect(source.size()).toBe(2);
      expect(source.mean('departureDelay')).toBe(30);
    });

    it('ignores extra columns and blank lines', () => {
      const source = parseFlightsCsv(`YEAR,${HEADER},TAIL_NUMBER\n2015,VX,5,1,SFO,1,N361VA\n\n`);

      expect(source.size()).toBe(1);
      expect(source.countUnique('flightNumber')).toBe(1);
    });
  });

  describe('given malformed rows', () => {
    it('throws FlightDataError naming the row and column', () => {
      expect(() => parseFlightsCsv(`${HEADER}\nVX,5,1,SFO,1\nVX,5,13,SFO,2\n`)).toThrow(
        /^Invalid flight row 2: MONTH: /
      );
    });

    it('throws when a required column is missing', () => {
      expect(() => parseFlightsCsv('AIRLINE,MONTH\nVX,1\n')).toThrow(FlightDataError);
    });
  });
});

describe('loadFlightsCsv', () => {
  it('reads the file and logs progress', async () => {
    const logger = createRecordingLogger();

    const source = await loadFlightsCsv(FIXTURE_PATH, logger);

    expect(source.size()).toBe(9);
    expect(logger.messages('info')).toEqual([
      'Loading flights data...',
      'Finished loading flights data (9 rows)',
    ]);
  });

  it('rejects when the file does not exist', async () => {
    const logger = createRecordingLogger();

    await expect(loadFlightsCsv('/nonexistent/flights.csv', logger)).rejects.toThrow(/ENOENT/);
  });
});
