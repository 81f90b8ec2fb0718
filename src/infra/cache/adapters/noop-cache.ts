/**
 * No-op backing store for when caching is disabled.
 * Writes succeed but nothing is kept, so every lookup misses.
 */

import { ok } from 'neverthrow';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

export const createNoopCache = <T>(): CachePort<T> => {
  let misses = 0;

  return {
    get(_key: string) {
      misses++;
      return Promise.resolve(ok(undefined));
    },

    set(_key: string, _value: T, _options?: CacheSetOptions) {
      return Promise.resolve(ok(undefined));
    },

    delete(_key: string) {
      return Promise.resolve(ok(false));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits: 0, misses, size: 0 });
    },
  };
};
