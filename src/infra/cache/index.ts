/**
 * Cache Infrastructure
 *
 * A stale-if-error cache layered over a pluggable backing store.
 * Store failures degrade to misses; producer failures of a whitelisted
 * kind are answered with the last known value while it is retained.
 *
 * @example
 * ```typescript
 * import { initCache, createConfig, parseEnv, CacheTtl, withResilientCache } from 'resilient-cache';
 *
 * const config = createConfig(parseEnv(process.env));
 * const { cache } = initCache<Programme>({ config: config.cache, logger });
 *
 * const findProgramme = withResilientCache(repo.findByPid.bind(repo), cache, {
 *   ttl: CacheTtl.NORMAL,
 *   keyGenerator: ([pid]) => cache.keyHelper('ProgrammeRepo', 'findByPid', pid),
 * });
 * ```
 */

// Ports (interfaces)
export type {
  CacheItem,
  CachePort,
  CacheError,
  CacheSetOptions,
  CacheStats,
  KeyPart,
  ResilientCachePort,
  ResilientCacheStats,
  StoredEntry,
} from './ports.js';
export { CacheError as CacheErrorFactory } from './ports.js';

// Lifetimes
export {
  CacheTtl,
  DEFAULT_CACHE_TIMES,
  createCacheTimes,
  isShortLivedTtl,
  resolveTtlSeconds,
  type CacheTimes,
  type CacheTtlBucket,
  type CacheTtlSpec,
} from './ttl.js';

// Failure kinds
export { TaggedError, failureKindOf, failureMessageOf, isWhitelistedFailure } from './failures.js';

// Key generation
export { createKeyBuilder, type KeyBuilder, type KeyBuilderOptions } from './key-builder.js';

// Serialization
export { serialize, deserialize } from './serialization.js';
export type { SerializationResult } from './serialization.js';

// Adapters
export {
  createNoopCache,
  createMemoryCache,
  createRedisCacheWithClient,
  createRedisCacheFromClient,
  type MemoryCacheOptions,
  type RedisCacheOptions,
} from './adapters/index.js';

// Wrappers
export { createResilientCache, isEmptyValue, type ResilientCacheOptions } from './wrappers/index.js';

// Decorators
export {
  withResilientCache,
  withResilientCacheResult,
  type WithResilientCacheOptions,
} from './with-cache.js';

// Client factory
export {
  initCache,
  createCacheConfig,
  detectBackend,
  type CacheBackend,
  type CacheConfig,
  type CacheClient,
  type CacheEnv,
  type InitCacheOptions,
} from './client.js';
