/**
 * Decorator functions for adding resilient caching to repository methods.
 */

import type { ResilientCachePort } from './ports.js';
import type { CacheTtlSpec } from './ttl.js';
import type { Result } from 'neverthrow';

export interface WithResilientCacheOptions<TArgs extends unknown[]> {
  /** Logical lifetime of a cached result */
  ttl: CacheTtlSpec;
  /** Lifetime for empty results. Default: `none` (empty results are not cached) */
  nullTtl?: CacheTtlSpec;
  /** Function to generate cache key from method arguments */
  keyGenerator: (args: TArgs) => string;
}

/**
 * Wrap a function with resilient caching.
 * Fresh hits skip the function; whitelisted failures fall back to the last value.
 *
 * @example
 * ```typescript
 * const findProgramme = withResilientCache(
 *   repo.findByPid.bind(repo),
 *   cache,
 *   {
 *     ttl: CacheTtl.NORMAL,
 *     keyGenerator: ([pid]) => cache.keyHelper('ProgrammeRepo', 'findByPid', pid),
 *   }
 * );
 * ```
 */
export const withResilientCache = <TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  cache: ResilientCachePort<TResult>,
  options: WithResilientCacheOptions<TArgs>
): ((...args: TArgs) => Promise<TResult>) => {
  const { ttl, nullTtl, keyGenerator } = options;

  return async (...args: TArgs): Promise<TResult> => {
    return cache.getOrSet(keyGenerator(args), ttl, fn, args, nullTtl);
  };
};

/**
 * Wrap a function that returns a Result with resilient caching.
 * Only successful results are cached.
 */
export const withResilientCacheResult = <
  TArgs extends unknown[],
  TValue,
  E extends { type: string; message: string },
>(
  fn: (...args: TArgs) => Promise<Result<TValue, E>>,
  cache: ResilientCachePort<TValue>,
  options: WithResilientCacheOptions<TArgs>
): ((...args: TArgs) => Promise<Result<TValue, E>>) => {
  const { ttl, nullTtl, keyGenerator } = options;

  return async (...args: TArgs): Promise<Result<TValue, E>> => {
    return cache.getOrSetResult(keyGenerator(args), ttl, fn, args, nullTtl);
  };
};
