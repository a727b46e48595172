/**
 * Argument shapes a cache key can be derived from.
 */
export type KeyArg = string | number | boolean | null | undefined | readonly KeyArg[];

/**
 * Thrown when a key is requested for an argument that has no stable
 * textual form. Indicates a wrapped function with an unsupported signature.
 */
export class KeyDerivationError extends Error {
  /**
   * Position of the offending argument, e.g. "1" or "1[2]".
   */
  readonly argumentPath: string;

  constructor(message: string, argumentPath: string) {
    super(message);
    this.name = 'KeyDerivationError';
    this.argumentPath = argumentPath;
  }
}

const renderArg = (value: unknown, path: string): string => {
  if (value === undefined) {
    return 'undefined';
  }
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new KeyDerivationError(
          `Cannot derive a cache key from non-finite number ${String(value)} at argument ${path}`,
          path
        );
      }
      return String(value);
    default:
      break;
  }

  if (Array.isArray(value)) {
    return `[${value.map((item, index) => renderArg(item, `${path}[${String(index)}]`)).join(',')}]`;
  }

  throw new KeyDerivationError(
    `Cannot derive a cache key from a value of type ${typeof value} at argument ${path}`,
    path
  );
};

/**
 * Derives a deterministic cache key from a function name and its arguments.
 *
 * The key reads `name(arg1,arg2,...)`. Strings are JSON-quoted so that
 * separators inside values never cross an argument boundary, and arrays keep
 * their order. Trailing undefined arguments are dropped, so an omitted
 * optional argument and an explicit undefined share a key.
 *
 * @param name - Stable identifier of the wrapped function
 * @param args - The call's arguments, in order
 * @returns The cache key
 * @throws KeyDerivationError for objects, functions, symbols, bigints and non-finite numbers
 *
 * @example
 * ```typescript
 * deriveCacheKey('FlightInsights.avgDepDelayPerAirline', ['VX', [6, 7, 8]]);
 * // 'FlightInsights.avgDepDelayPerAirline("VX",[6,7,8])'
 * ```
 */
export const deriveCacheKey = (name: string, args: readonly unknown[]): string => {
  if (name.trim().length === 0) {
    throw new KeyDerivationError('Cache key name cannot be empty', 'name');
  }

  let end = args.length;
  while (end > 0 && args[end - 1] === undefined) {
    end -= 1;
  }

  const rendered = args.slice(0, end).map((arg, index) => renderArg(arg, String(index)));
  return `${name}(${rendered.join(',')})`;
};
