/**
 * Cache port interfaces using Result pattern for explicit error handling.
 */

import type { CacheTtlSpec } from './ttl.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheError =
  | { type: 'ConnectionError'; message: string; cause?: unknown }
  | { type: 'SerializationError'; message: string; cause?: unknown }
  | { type: 'TimeoutError'; message: string; cause?: unknown };

export const CacheError = {
  connection: (message: string, cause?: unknown): CacheError => ({
    type: 'ConnectionError',
    message,
    cause,
  }),
  serialization: (message: string, cause?: unknown): CacheError => ({
    type: 'SerializationError',
    message,
    cause,
  }),
  timeout: (message: string, cause?: unknown): CacheError => ({
    type: 'TimeoutError',
    message,
    cause,
  }),
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheSetOptions {
  /** TTL in milliseconds. If undefined, uses adapter default. */
  ttlMs?: number;
  /** Keep the entry until it is deleted. Takes precedence over `ttlMs`. */
  indefinite?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache Statistics
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// CachePort (Backing Store Interface)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Low-level key/value store the resilient cache sits in front of.
 * The store owns physical expiry; it knows nothing about logical expiry.
 */
export interface CachePort<T = unknown> {
  /**
   * Retrieve a value by key.
   * @returns Ok(value) if found, Ok(undefined) if not found, Err on failure
   */
  get(key: string): Promise<Result<T | undefined, CacheError>>;

  /**
   * Store a value with optional TTL.
   */
  set(key: string, value: T, options?: CacheSetOptions): Promise<Result<void, CacheError>>;

  /**
   * Delete a specific key.
   * @returns Ok(true) if deleted, Ok(false) if key didn't exist
   */
  delete(key: string): Promise<Result<boolean, CacheError>>;

  /**
   * Get cache statistics for monitoring.
   */
  stats(): Promise<CacheStats>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Stored Entry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Payload written to the backing store under one key.
 * `logicalExpiresAt` is epoch milliseconds, `null` when the entry never goes stale.
 */
export interface StoredEntry<T> {
  value: T;
  logicalExpiresAt: number | null;
}

/** Outcome of a lookup through the resilient cache. */
export type CacheItem<T> =
  | { readonly key: string; readonly isHit: true; readonly value: T }
  | { readonly key: string; readonly isHit: false };

export interface ResilientCacheStats extends CacheStats {
  /** Number of times a stale value was served instead of a fresh one. */
  staleServed: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// ResilientCachePort (Application Interface)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Application-level cache with stale-if-error semantics.
 * Store failures are logged and degrade to misses; producer failures
 * surface unchanged unless a stale value can stand in for them.
 */
export interface ResilientCachePort<T = unknown> {
  /** Look up a key. Logically expired entries are misses unless `allowStale` is set. */
  getItem(key: string, allowStale?: boolean): Promise<CacheItem<T>>;

  /** Store a value. Returns false when the store write fails. */
  setItem(key: string, value: T, ttl: CacheTtlSpec): Promise<boolean>;

  /** Delete a key. Returns false when the store delete fails. */
  deleteItem(key: string): Promise<boolean>;

  /**
   * Read-through lookup. On a miss the producer runs; if it throws a
   * whitelisted failure kind the stale value is served instead.
   */
  getOrSet<TArgs extends unknown[]>(
    key: string,
    ttl: CacheTtlSpec,
    producer: (...args: TArgs) => T | Promise<T>,
    args: TArgs,
    nullTtl?: CacheTtlSpec
  ): Promise<T>;

  /**
   * Read-through lookup for producers returning a Result.
   * Only Ok values are cached; a whitelisted Err falls back to the stale value.
   */
  getOrSetResult<TArgs extends unknown[], E extends { type: string; message: string }>(
    key: string,
    ttl: CacheTtlSpec,
    producer: (...args: TArgs) => Promise<Result<T, E>>,
    args: TArgs,
    nullTtl?: CacheTtlSpec
  ): Promise<Result<T, E>>;

  /** When enabled, every lookup deletes the key first (forced cold reads). */
  setFlushCacheItems(flushCacheItems: boolean): void;

  /** Build a key from a class name, a function name and distinguishing values. */
  keyHelper(className: string, functionName: string, ...uniqueValues: KeyPart[]): string;

  getStaleServedCount(): number;

  stats(): Promise<ResilientCacheStats>;
}

/** Values accepted by `keyHelper`. */
export type KeyPart =
  | string
  | number
  | boolean
  | null
  | undefined
  | Date
  | readonly unknown[]
  | Record<string, unknown>;
