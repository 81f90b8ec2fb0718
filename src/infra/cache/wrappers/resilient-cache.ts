/**
 * Stale-if-error wrapper for cache ports.
 *
 * Every entry carries two lifetimes. The logical expiry is stored inside the
 * payload and decides whether a normal lookup hits. The physical retention is
 * the TTL handed to the backing store; for regular lifetimes it is the
 * resilience window, so the bytes outlive their logical expiry and can stand
 * in for a producer that fails with a whitelisted failure kind.
 *
 * Timeline of a regular entry:
 * `|--- fresh (ttl) ---|--- stale, served on whitelisted failure ---|--- gone ---|`
 * `0                  ttl                                 resilienceTtlSeconds`
 */

import { ok, type Result } from 'neverthrow';

import { failureKindOf, failureMessageOf, isWhitelistedFailure } from '../failures.js';
import { createKeyBuilder } from '../key-builder.js';
import {
  CacheTtl,
  createCacheTimes,
  isShortLivedTtl,
  longestBucketSeconds,
  resolveTtlSeconds,
  type CacheTimes,
  type CacheTtlSpec,
} from '../ttl.js';

import type {
  CacheItem,
  CachePort,
  CacheSetOptions,
  KeyPart,
  ResilientCachePort,
  ResilientCacheStats,
  StoredEntry,
} from '../ports.js';
import type { Logger } from 'pino';

export interface ResilientCacheOptions<T> {
  /** Backing store holding the wrapped entries */
  store: CachePort<StoredEntry<T>>;
  logger: Logger;
  /** Namespace for all keys; `.resilient` is appended to it */
  prefix: string;
  /** How long entries stay in the store, i.e. how long stale values can be served */
  resilienceTtlSeconds: number;
  /** Overrides for the bucket-to-seconds table */
  cacheTimes?: Partial<CacheTimes>;
  /** Failure kinds (`type` tags) for which a stale value may be served */
  whitelistedFailureKinds?: Iterable<string>;
  /** Start in flush mode. Default: false */
  flushCacheItems?: boolean;
}

type WritePlan =
  | { action: 'discard' }
  | { action: 'store'; logicalExpiresAt: number | null; setOptions: CacheSetOptions };

/**
 * Values that are not cached unless a `nullTtl` other than `none` is given.
 */
export const isEmptyValue = (value: unknown): boolean =>
  value === undefined ||
  value === null ||
  value === false ||
  value === 0 ||
  value === '' ||
  Number.isNaN(value) ||
  (Array.isArray(value) && value.length === 0);

const isValidTtl = (ttl: CacheTtlSpec): boolean => {
  if (ttl instanceof Date) return !Number.isNaN(ttl.getTime());
  if (typeof ttl === 'number') return Number.isFinite(ttl);
  return true;
};

/**
 * Create a cache with stale-if-error semantics on top of a backing store.
 *
 * @example
 * ```typescript
 * const cache = createResilientCache<Programme>({
 *   store: createMemoryCache(),
 *   logger,
 *   prefix: 'catalogue',
 *   resilienceTtlSeconds: 86400,
 *   whitelistedFailureKinds: ['DatabaseError'],
 * });
 *
 * const programme = await cache.getOrSet(
 *   cache.keyHelper('ProgrammeRepo', 'findByPid', pid),
 *   CacheTtl.NORMAL,
 *   (id: string) => repo.findByPid(id),
 *   [pid]
 * );
 * ```
 */
export const createResilientCache = <T>(
  options: ResilientCacheOptions<T>
): ResilientCachePort<T> => {
  const { store, resilienceTtlSeconds } = options;

  if (!Number.isInteger(resilienceTtlSeconds) || resilienceTtlSeconds <= 0) {
    throw new RangeError(
      `resilienceTtlSeconds must be a positive integer, got ${String(resilienceTtlSeconds)}`
    );
  }

  const logger = options.logger.child({ component: 'ResilientCache' });
  const cacheTimes = createCacheTimes(options.cacheTimes);
  const whitelistedKinds: ReadonlySet<string> = new Set(options.whitelistedFailureKinds ?? []);
  const keyBuilder = createKeyBuilder({ prefix: `${options.prefix}.resilient` });
  const resilienceTtlMs = resilienceTtlSeconds * 1000;

  let flushCacheItems = options.flushCacheItems ?? false;
  let staleServedCount = 0;

  if (resilienceTtlSeconds < longestBucketSeconds(cacheTimes)) {
    logger.warn(
      { resilienceTtlSeconds, longestBucketSeconds: longestBucketSeconds(cacheTimes) },
      '[Cache] Resilience window is shorter than the longest cache bucket'
    );
  }

  const miss = (key: string): CacheItem<T> => ({ key, isHit: false });

  const planWrite = (ttl: CacheTtlSpec, now: number): WritePlan => {
    if (ttl instanceof Date) {
      return {
        action: 'store',
        logicalExpiresAt: ttl.getTime(),
        setOptions: { ttlMs: resilienceTtlMs },
      };
    }

    const seconds = resolveTtlSeconds(ttl, cacheTimes);

    if (!isShortLivedTtl(ttl) && seconds > 0) {
      return {
        action: 'store',
        logicalExpiresAt: now + seconds * 1000,
        setOptions: { ttlMs: resilienceTtlMs },
      };
    }

    // Short-lived: the store TTL is the lifetime itself, no stale window.
    if (seconds < 0) {
      return { action: 'discard' };
    }
    if (seconds === 0) {
      return { action: 'store', logicalExpiresAt: null, setOptions: { indefinite: true } };
    }
    return {
      action: 'store',
      logicalExpiresAt: now + seconds * 1000,
      setOptions: { ttlMs: seconds * 1000 },
    };
  };

  const lookup = async (key: string, allowStale: boolean): Promise<CacheItem<T>> => {
    const storeKey = keyBuilder.standardise(key);

    if (flushCacheItems) {
      const deleted = await store.delete(storeKey);
      if (deleted.isErr()) {
        logger.warn({ err: deleted.error, key }, `[Cache] Flush failed: ${deleted.error.message}`);
      }
    }

    const result = await store.get(storeKey);
    if (result.isErr()) {
      logger.warn({ err: result.error, key }, `[Cache] Get failed: ${result.error.message}`);
      return miss(key);
    }

    const entry = result.value;
    if (entry === undefined) {
      return miss(key);
    }

    if (!allowStale && entry.logicalExpiresAt !== null && Date.now() > entry.logicalExpiresAt) {
      return miss(key);
    }

    return { key, isHit: true, value: entry.value };
  };

  const deleteItem = async (key: string): Promise<boolean> => {
    const result = await store.delete(keyBuilder.standardise(key));
    if (result.isErr()) {
      logger.warn({ err: result.error, key }, `[Cache] Delete failed: ${result.error.message}`);
      return false;
    }
    return true;
  };

  const setItem = async (key: string, value: T, ttl: CacheTtlSpec): Promise<boolean> => {
    if (!isValidTtl(ttl)) {
      logger.error({ key, ttl: String(ttl) }, '[Cache] Set skipped: invalid TTL');
      return false;
    }

    const now = Date.now();
    const plan = planWrite(ttl, now);

    if (plan.action === 'discard') {
      return deleteItem(key);
    }

    if (plan.logicalExpiresAt !== null && plan.logicalExpiresAt > now + resilienceTtlMs) {
      logger.debug(
        { key, logicalExpiresAt: plan.logicalExpiresAt, resilienceTtlSeconds },
        '[Cache] Entry will be evicted before it goes stale'
      );
    }

    const entry: StoredEntry<T> = { value, logicalExpiresAt: plan.logicalExpiresAt };
    const result = await store.set(keyBuilder.standardise(key), entry, plan.setOptions);
    if (result.isErr()) {
      logger.warn({ err: result.error, key }, `[Cache] Set failed: ${result.error.message}`);
      return false;
    }
    return true;
  };

  /**
   * Look for a stale value to stand in for a failed producer.
   */
  const serveStale = async (key: string, failure: unknown): Promise<CacheItem<T>> => {
    if (!isWhitelistedFailure(failure, whitelistedKinds)) {
      return miss(key);
    }

    const stale = await lookup(key, true);
    if (stale.isHit) {
      staleServedCount++;
      const message = failureMessageOf(failure);
      logger.error(
        { key, staleServedCount, failureKind: failureKindOf(failure), failureMessage: message },
        `[Cache] Stale value #${String(staleServedCount)} served for ${key}: ${message}`
      );
    }
    return stale;
  };

  const storeProduced = async (
    key: string,
    value: T,
    ttl: CacheTtlSpec,
    nullTtl: CacheTtlSpec
  ): Promise<void> => {
    if (!isEmptyValue(value)) {
      await setItem(key, value, ttl);
    } else if (nullTtl !== CacheTtl.NONE) {
      await setItem(key, value, nullTtl);
    }
  };

  return {
    getItem(key: string, allowStale = false): Promise<CacheItem<T>> {
      return lookup(key, allowStale);
    },

    setItem,

    deleteItem,

    async getOrSet<TArgs extends unknown[]>(
      key: string,
      ttl: CacheTtlSpec,
      producer: (...args: TArgs) => T | Promise<T>,
      args: TArgs,
      nullTtl: CacheTtlSpec = CacheTtl.NONE
    ): Promise<T> {
      const cached = await lookup(key, false);
      if (cached.isHit) {
        return cached.value;
      }

      let value: T;
      try {
        value = await producer(...args);
      } catch (failure) {
        const stale = await serveStale(key, failure);
        if (stale.isHit) {
          return stale.value;
        }
        throw failure;
      }

      await storeProduced(key, value, ttl, nullTtl);
      return value;
    },

    async getOrSetResult<TArgs extends unknown[], E extends { type: string; message: string }>(
      key: string,
      ttl: CacheTtlSpec,
      producer: (...args: TArgs) => Promise<Result<T, E>>,
      args: TArgs,
      nullTtl: CacheTtlSpec = CacheTtl.NONE
    ): Promise<Result<T, E>> {
      const cached = await lookup(key, false);
      if (cached.isHit) {
        return ok(cached.value);
      }

      const result = await producer(...args);
      if (result.isErr()) {
        const stale = await serveStale(key, result.error);
        return stale.isHit ? ok(stale.value) : result;
      }

      await storeProduced(key, result.value, ttl, nullTtl);
      return result;
    },

    setFlushCacheItems(flag: boolean): void {
      flushCacheItems = flag;
    },

    keyHelper(className: string, functionName: string, ...uniqueValues: KeyPart[]): string {
      return keyBuilder.fromCall(className, functionName, ...uniqueValues);
    },

    getStaleServedCount(): number {
      return staleServedCount;
    },

    async stats(): Promise<ResilientCacheStats> {
      const storeStats = await store.stats();
      return { ...storeStats, staleServed: staleServedCount };
    },
  };
};
