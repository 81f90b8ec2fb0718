/**
 * JSON serialization for cache values that keeps Decimal.js and Date
 * instances intact across the store boundary.
 */

import { Decimal } from 'decimal.js';

import { CacheError } from './ports.js';

const DECIMAL_MARKER = '__decimal__';
const DATE_MARKER = '__date__';

/** User keys that could be read back as markers; escaped with a leading `~`. */
const ESCAPABLE_KEY = /^~*__(?:decimal|date)__$/;
const ESCAPED_KEY = /^~+__(?:decimal|date)__$/;

const isDecimal = (val: unknown): val is Decimal => {
  return val !== null && typeof val === 'object' && val instanceof Decimal;
};

/**
 * Recursively replace Decimal and Date instances with marked objects.
 * Must run before JSON.stringify, which would call their toJSON() first.
 */
const encodeSpecialValues = (value: unknown): unknown => {
  if (isDecimal(value)) {
    return { [DECIMAL_MARKER]: value.toString() };
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : { [DATE_MARKER]: value.toISOString() };
  }

  if (Array.isArray(value)) {
    return value.map(encodeSpecialValues);
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[ESCAPABLE_KEY.test(key) ? `~${key}` : key] = encodeSpecialValues(val);
    }
    return result;
  }

  return value;
};

const unescapeKeys = (val: object): object => {
  const keys = Object.keys(val);
  if (Array.isArray(val) || !keys.some((key) => ESCAPED_KEY.test(key))) {
    return val;
  }
  const result: Record<string, unknown> = {};
  for (const key of keys) {
    result[ESCAPED_KEY.test(key) ? key.slice(1) : key] = Reflect.get(val, key);
  }
  return result;
};

/**
 * Only single-key objects are markers; anything else stays a plain object.
 */
const reviveSpecialValue = (_key: string, val: unknown): unknown => {
  if (val === null || typeof val !== 'object') {
    return val;
  }
  if (Object.keys(val).length === 1) {
    if (DECIMAL_MARKER in val) {
      const marked: unknown = Reflect.get(val, DECIMAL_MARKER);
      if (typeof marked === 'string') return new Decimal(marked);
    }
    if (DATE_MARKER in val) {
      const marked: unknown = Reflect.get(val, DATE_MARKER);
      if (typeof marked === 'string') return new Date(marked);
    }
  }
  return unescapeKeys(val);
};

export type SerializationResult<T> = { ok: true; value: T } | { ok: false; error: CacheError };

/**
 * Serialize a value to a JSON string.
 * `undefined` and invalid dates are encoded as JSON null. Values JSON cannot
 * encode (bigint, circular references) yield a SerializationError.
 */
export const serialize = (value: unknown): SerializationResult<string> => {
  try {
    return { ok: true, value: JSON.stringify(encodeSpecialValues(value)) ?? 'null' };
  } catch (cause) {
    return {
      ok: false,
      error: CacheError.serialization('Failed to serialize value for caching', cause),
    };
  }
};

/**
 * Deserialize a JSON string, restoring Decimal and Date instances.
 */
export const deserialize = (json: string): SerializationResult<unknown> => {
  try {
    // eslint-disable-next-line no-restricted-syntax -- JSON.parse is wrapped in try-catch with proper error handling
    const value: unknown = JSON.parse(json, reviveSpecialValue);
    return { ok: true, value };
  } catch (cause) {
    return {
      ok: false,
      error: CacheError.serialization('Failed to deserialize cached value', cause),
    };
  }
};
