import { ok, err, type Result } from 'neverthrow';
import type { CacheError, CacheValue } from './types.js';
import { createDeserializationError, createSerializationError, describeCause } from './errors.js';

/** Tag property for values JSON cannot carry natively */
const TAG = '$t';

/** Tag value for a plain object that itself owns the tag property */
const ESCAPED_OBJECT = 'object';

const NON_FINITE_TAGS: Readonly<Record<string, number>> = {
  NaN: Number.NaN,
  Infinity: Number.POSITIVE_INFINITY,
  '-Infinity': Number.NEGATIVE_INFINITY,
};

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const describeType = (value: unknown): string => {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (typeof proto === 'object' && proto !== null && 'constructor' in proto) {
      const ctor: unknown = proto.constructor;
      if (typeof ctor === 'function' && ctor.name !== '') {
        return ctor.name;
      }
    }
  }
  return typeof value;
};

const encodeNumber = (value: number): Json => {
  if (Number.isFinite(value)) {
    return value;
  }
  return { [TAG]: Number.isNaN(value) ? 'NaN' : value > 0 ? 'Infinity' : '-Infinity' };
};

const circularReference = (path: string): CacheError =>
  createSerializationError(`Cannot cache a value with a circular reference at ${path}`);

// `ancestors` holds the arrays and objects on the path from the root to `value`
const encode = (
  value: unknown,
  path: string,
  ancestors: Set<object>
): Result<Json, CacheError> => {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return ok(value);
    case 'number':
      return ok(encodeNumber(value));
    default:
      break;
  }

  if (value === null) {
    return ok(null);
  }

  if (Array.isArray(value)) {
    if (ancestors.has(value)) {
      return err(circularReference(path));
    }
    ancestors.add(value);
    const items: Json[] = [];
    for (const [index, item] of value.entries()) {
      const encoded = encode(item, `${path}[${String(index)}]`, ancestors);
      if (encoded.isErr()) {
        return err(encoded.error);
      }
      items.push(encoded.value);
    }
    ancestors.delete(value);
    return ok(items);
  }

  if (isPlainObject(value)) {
    if (ancestors.has(value)) {
      return err(circularReference(path));
    }
    ancestors.add(value);
    const entries: Record<string, Json> = {};
    for (const [key, item] of Object.entries(value)) {
      const encoded = encode(item, `${path}.${key}`, ancestors);
      if (encoded.isErr()) {
        return err(encoded.error);
      }
      entries[key] = encoded.value;
    }
    ancestors.delete(value);
    return ok(Object.hasOwn(entries, TAG) ? { [TAG]: ESCAPED_OBJECT, v: entries } : entries);
  }

  return err(createSerializationError(`Cannot cache a value of type ${describeType(value)} at ${path}`));
};

const decode = (value: unknown, path: string): Result<CacheValue, CacheError> => {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return ok(value);
  }

  if (Array.isArray(value)) {
    const items: CacheValue[] = [];
    for (const [index, item] of value.entries()) {
      const decoded = decode(item, `${path}[${String(index)}]`);
      if (decoded.isErr()) {
        return err(decoded.error);
      }
      items.push(decoded.value);
    }
    return ok(items);
  }

  if (!isPlainObject(value)) {
    return err(createDeserializationError(`Unexpected ${describeType(value)} at ${path}`));
  }

  const tag = value[TAG];
  if (tag === undefined) {
    return decodeEntries(value, path);
  }

  if (tag === ESCAPED_OBJECT && isPlainObject(value['v'])) {
    return decodeEntries(value['v'], path);
  }

  if (typeof tag === 'string') {
    const number = NON_FINITE_TAGS[tag];
    if (number !== undefined) {
      return ok(number);
    }
  }

  return err(createDeserializationError(`Unknown value tag at ${path}`));
};

const decodeEntries = (
  value: Record<string, unknown>,
  path: string
): Result<CacheValue, CacheError> => {
  const entries: Record<string, CacheValue> = {};
  for (const [key, item] of Object.entries(value)) {
    const decoded = decode(item, `${path}.${key}`);
    if (decoded.isErr()) {
      return err(decoded.error);
    }
    entries[key] = decoded.value;
  }
  return ok(entries);
};

/**
 * Serializes a value into the string stored by a cache backend.
 *
 * Plain JSON except for non-finite numbers, which are tagged so that
 * `NaN` and `Infinity` aggregates come back as numbers.
 *
 * @example
 * ```typescript
 * serializeValue(30.5); // ok('30.5')
 * serializeValue(Number.NaN); // ok('{"$t":"NaN"}')
 * serializeValue(new Date()); // err(SERIALIZATION_ERROR)
 * ```
 */
export const serializeValue = (value: unknown): Result<string, CacheError> =>
  encode(value, '$', new Set()).map((json) => JSON.stringify(json));

/**
 * Restores a value written by {@link serializeValue}.
 */
export const deserializeValue = (payload: string): Result<CacheValue, CacheError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    return err(
      createDeserializationError(`Stored payload is not valid JSON: ${describeCause(error)}`, error)
    );
  }
  return decode(parsed, '$');
};
