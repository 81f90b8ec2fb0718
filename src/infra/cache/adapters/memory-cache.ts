/**
 * In-memory backing store with per-entry TTL and an entry cap.
 */

import { err, ok } from 'neverthrow';

import { deserialize, serialize } from '../serialization.js';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

interface MemoryEntry {
  /** Serialized value */
  value: string;
  /** Expiration timestamp (ms since epoch), null for entries that never expire */
  expiresAt: number | null;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Default TTL in milliseconds. Default: 3600000 (1 hour) */
  defaultTtlMs?: number;
}

/**
 * Create an in-memory store. When full, the least recently used entry goes.
 */
export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): CachePort<T> => {
  const maxEntries = options.maxEntries ?? 1000;
  const defaultTtlMs = options.defaultTtlMs ?? 3600000;

  // Map maintains insertion order, enabling LRU eviction
  const store = new Map<string, MemoryEntry>();

  let hits = 0;
  let misses = 0;

  const isExpired = (entry: MemoryEntry): boolean => {
    return entry.expiresAt !== null && Date.now() >= entry.expiresAt;
  };

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
    }
  };

  const refreshLru = (key: string, entry: MemoryEntry): void => {
    store.delete(key);
    store.set(key, entry);
  };

  const computeExpiresAt = (setOptions?: CacheSetOptions): number | null => {
    if (setOptions?.indefinite === true) {
      return null;
    }
    return Date.now() + (setOptions?.ttlMs ?? defaultTtlMs);
  };

  return {
    get(key: string) {
      const entry = store.get(key);

      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      if (isExpired(entry)) {
        store.delete(key);
        misses++;
        return Promise.resolve(ok(undefined));
      }

      refreshLru(key, entry);

      const result = deserialize(entry.value);
      if (!result.ok) {
        // Corrupted entry, remove it
        store.delete(key);
        misses++;
        return Promise.resolve(err(result.error));
      }

      hits++;
      return Promise.resolve(ok(result.value as T));
    },

    set(key: string, value: T, setOptions?: CacheSetOptions) {
      const serialized = serialize(value);
      if (!serialized.ok) {
        return Promise.resolve(err(serialized.error));
      }

      // Remove existing entry if present (for LRU refresh)
      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        evictLru();
      }

      store.set(key, {
        value: serialized.value,
        expiresAt: computeExpiresAt(setOptions),
      });

      return Promise.resolve(ok(undefined));
    },

    delete(key: string) {
      const existed = store.delete(key);
      return Promise.resolve(ok(existed));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, size: store.size });
    },
  };
};
