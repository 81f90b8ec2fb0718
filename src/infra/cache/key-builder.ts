/**
 * Cache key generation: namespacing and keys derived from call sites.
 */

import { createHash } from 'node:crypto';

import type { KeyPart } from './ports.js';

/** Characters reserved by cache backends (PSR-6 style) in key names. */
const RESERVED_CHARACTERS = /[{}()/\\@:]/g;

// ─────────────────────────────────────────────────────────────────────────────
// Key Builder Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilder {
  /**
   * Prefix a key with the namespace and strip reserved characters.
   * Format: `{prefix}.{key}`
   */
  standardise(key: string): string;

  /**
   * Build a key from a class name, a function name and the values that
   * make the call unique. Format: `{className}.{functionName}.{value}...`
   */
  fromCall(className: string, functionName: string, ...uniqueValues: KeyPart[]): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Recursively sorts all keys in an object for deterministic serialization.
 * Handles nested objects and arrays.
 */
const sortObjectKeys = (obj: unknown): unknown => {
  if (obj === null || typeof obj !== 'object' || obj instanceof Date) {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(sortObjectKeys);
  }

  const result: Record<string, unknown> = {};
  for (const key of Object.keys(obj).sort()) {
    result[key] = sortObjectKeys(Reflect.get(obj, key));
  }
  return result;
};

/**
 * Hash a structured value into a deterministic identifier.
 * Uses SHA-256, truncated to 16 characters.
 */
const hashValue = (value: unknown): string => {
  const normalized = JSON.stringify(sortObjectKeys(value));
  return createHash('sha256').update(normalized).digest('hex').substring(0, 16);
};

const keyPartToString = (part: KeyPart): string => {
  if (part === null) return 'null';
  if (part === undefined) return 'undefined';
  if (part instanceof Date) return String(part.getTime());
  if (typeof part === 'object') return hashValue(part);
  return String(part);
};

const stripReserved = (key: string): string => key.replace(RESERVED_CHARACTERS, '_');

export interface KeyBuilderOptions {
  /** Namespace prepended to every key. */
  prefix: string;
}

/**
 * Create a key builder instance.
 */
export const createKeyBuilder = (options: KeyBuilderOptions): KeyBuilder => {
  const prefix = stripReserved(options.prefix);

  return {
    standardise(key: string): string {
      return `${prefix}.${stripReserved(key)}`;
    },

    fromCall(className: string, functionName: string, ...uniqueValues: KeyPart[]): string {
      const parts = [className, functionName, ...uniqueValues.map(keyPartToString)];
      return stripReserved(parts.join('.'));
    },
  };
};
