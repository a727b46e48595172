import { describe, it, expect } from 'vitest';
import { deriveCacheKey, KeyDerivationError } from './derive-key.js';
import { TEST_FUNCTION_NAME, TEST_KEY, TEST_SUMMER_KEY } from '../test/fixtures.js';

describe('deriveCacheKey', () => {
  describe('given scalar arguments', () => {
    it('quotes strings and renders numbers and booleans directly', () => {
      expect(deriveCacheKey('f', ['SFO', 12, true, null])).toBe('f("SFO",12,true,null)');
    });

    it('matches the documented key format', () => {
      expect(deriveCacheKey(TEST_FUNCTION_NAME, ['VX'])).toBe(TEST_KEY);
    });
  });

  describe('given sequence arguments', () => {
    it('renders them bracketed in their given order', () => {
      expect(deriveCacheKey(TEST_FUNCTION_NAME, ['VX', [6, 7, 8]])).toBe(TEST_SUMMER_KEY);
    });

    it('renders nested sequences recursively', () => {
      expect(deriveCacheKey('f', [[['AA', 1], []]])).toBe('f([["AA",1],[]])');
    });
  });

  describe('given identical inputs', () => {
    it('returns identical keys', () => {
      const first = deriveCacheKey(TEST_FUNCTION_NAME, ['VX', [12]]);
      const second = deriveCacheKey(TEST_FUNCTION_NAME, ['VX', [12]]);

      expect(first).toBe(second);
    });
  });

  describe('given distinct argument lists', () => {
    it('returns distinct keys', () => {
      const keys = [
        deriveCacheKey(TEST_FUNCTION_NAME, ['VX', []]),
        deriveCacheKey(TEST_FUNCTION_NAME, ['VX', [6, 7, 8]]),
        deriveCacheKey(TEST_FUNCTION_NAME, ['VX', [8, 6, 7]]),
        deriveCacheKey(TEST_FUNCTION_NAME, ['VX']),
      ];

      expect(new Set(keys).size).toBe(keys.length);
    });

    it('keeps a string apart from the number it spells', () => {
      expect(deriveCacheKey('f', ['12'])).not.toBe(deriveCacheKey('f', [12]));
    });

    it('does not let separators inside strings cross argument boundaries', () => {
      const joined = deriveCacheKey('f', ['a","b']);
      const split = deriveCacheKey('f', ['a', 'b']);

      expect(joined).toBe('f("a\\",\\"b")');
      expect(split).toBe('f("a","b")');
    });

    it('does not let a name ending in a parenthesis collide with its arguments', () => {
      expect(deriveCacheKey('f(', ['x'])).not.toBe(deriveCacheKey('f', ['(x']));
    });
  });

  describe('given trailing undefined arguments', () => {
    it('drops them so omitted optional arguments share a key', () => {
      expect(deriveCacheKey('f', ['VX', undefined])).toBe('f("VX")');
    });

    it('keeps undefined before a defined argument', () => {
      expect(deriveCacheKey('f', [undefined, 1])).toBe('f(undefined,1)');
    });
  });

  describe('given negative zero', () => {
    it('renders it as zero', () => {
      expect(deriveCacheKey('f', [-0])).toBe('f(0)');
    });
  });

  describe('given unsupported arguments', () => {
    it('throws KeyDerivationError for objects', () => {
      expect(() => deriveCacheKey('f', ['VX', { month: 6 }])).toThrow(KeyDerivationError);
    });

    it('reports the path of a nested offender', () => {
      try {
        deriveCacheKey('f', ['VX', [6, () => 7]]);
        expect.fail('expected KeyDerivationError');
      } catch (error) {
        expect(error).toBeInstanceOf(KeyDerivationError);
        if (error instanceof KeyDerivationError) {
          expect(error.argumentPath).toBe('1[1]');
          expect(error.message).toBe(
            'Cannot derive a cache key from a value of type function at argument 1[1]'
          );
        }
      }
    });

    it('throws for non-finite numbers', () => {
      expect(() => deriveCacheKey('f', [Number.NaN])).toThrow(
        'Cannot derive a cache key from non-finite number NaN at argument 0'
      );
    });

    it('throws for an empty name', () => {
      expect(() => deriveCacheKey('  ', [])).toThrow('Cache key name cannot be empty');
    });
  });
});
