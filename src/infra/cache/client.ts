/**
 * Cache client factory - creates and configures cache instances.
 */

import { createMemoryCache, createNoopCache, createRedisCacheWithClient } from './adapters/index.js';
import { createResilientCache } from './wrappers/index.js';

import type { CachePort, ResilientCachePort, StoredEntry } from './ports.js';
import type { CacheTimes } from './ttl.js';
import type { Env } from '../config/env.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheBackend = 'disabled' | 'memory' | 'redis';

export interface CacheConfig {
  /** Cache backend to use */
  backend: CacheBackend;
  /** Namespace prefix for all keys */
  keyPrefix: string;
  /** How long entries are retained, and so how long stale values can be served */
  resilienceTtlSeconds: number;
  /** Failure kinds that may be answered with a stale value */
  whitelistedFailureKinds: string[];
  /** Max entries for memory cache */
  memoryMaxEntries: number;
  /** Redis connection URL (required if backend is 'redis') */
  redisUrl: string | undefined;
  /** Redis password for authentication */
  redisPassword: string | undefined;
  /** Redis connection timeout in milliseconds */
  redisConnectTimeoutMs: number;
  /** Redis command timeout in milliseconds */
  redisCommandTimeoutMs: number;
}

export interface CacheClient<T = unknown> {
  /** Resilient cache for application use */
  cache: ResilientCachePort<T>;
  /** Backing store (for testing/advanced use) */
  store: CachePort<StoredEntry<T>>;
  /** Release connections held by the backing store */
  close(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Detection
// ─────────────────────────────────────────────────────────────────────────────

export type CacheEnv = Pick<Env, 'CACHE_BACKEND' | 'REDIS_URL'>;

/**
 * Detect cache backend from environment.
 * - Explicit CACHE_BACKEND takes precedence
 * - If REDIS_URL is set, use Redis
 * - Otherwise, use memory
 */
export const detectBackend = (env: CacheEnv): CacheBackend => {
  if (env.CACHE_BACKEND !== undefined) {
    return env.CACHE_BACKEND;
  }

  if (env.REDIS_URL !== undefined && env.REDIS_URL !== '') {
    return 'redis';
  }

  return 'memory';
};

const parseFailureKinds = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((kind) => kind.trim())
    .filter((kind) => kind !== '');

/**
 * Create cache configuration from validated environment variables.
 */
export const createCacheConfig = (env: Env): CacheConfig => ({
  backend: detectBackend(env),
  keyPrefix: env.CACHE_PREFIX,
  resilienceTtlSeconds: env.CACHE_RESILIENCE_TTL_SECONDS,
  whitelistedFailureKinds: parseFailureKinds(env.CACHE_STALE_FAILURE_KINDS),
  memoryMaxEntries: env.CACHE_MEMORY_MAX_ENTRIES,
  redisUrl: env.REDIS_URL,
  redisPassword: env.REDIS_PASSWORD,
  redisConnectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
  redisCommandTimeoutMs: env.REDIS_COMMAND_TIMEOUT_MS,
});

// ─────────────────────────────────────────────────────────────────────────────
// Cache Initialization
// ─────────────────────────────────────────────────────────────────────────────

export interface InitCacheOptions {
  config: CacheConfig;
  logger: Logger;
  /** Overrides for the bucket-to-seconds table */
  cacheTimes?: Partial<CacheTimes>;
}

/**
 * Initialize the cache infrastructure.
 * The memory store keeps entries for the whole resilience window by default.
 */
export const initCache = <T = unknown>(options: InitCacheOptions): CacheClient<T> => {
  const { config, logger } = options;
  const defaultTtlMs = config.resilienceTtlSeconds * 1000;

  let store: CachePort<StoredEntry<T>>;
  let close = (): Promise<void> => Promise.resolve();

  switch (config.backend) {
    case 'disabled':
      logger.info('[Cache] Using NoOp cache (disabled)');
      store = createNoopCache<StoredEntry<T>>();
      break;

    case 'redis':
      if (config.redisUrl === undefined || config.redisUrl === '') {
        logger.warn('[Cache] Redis URL not configured, falling back to memory cache');
        store = createMemoryCache<StoredEntry<T>>({
          maxEntries: config.memoryMaxEntries,
          defaultTtlMs,
        });
      } else {
        logger.info(
          { redisUrl: config.redisUrl.replace(/\/\/.*@/, '//<redacted>@') },
          '[Cache] Using Redis cache'
        );
        const redis = createRedisCacheWithClient<StoredEntry<T>>({
          url: config.redisUrl,
          ...(config.redisPassword !== undefined && { password: config.redisPassword }),
          defaultTtlMs,
          connectTimeoutMs: config.redisConnectTimeoutMs,
          commandTimeoutMs: config.redisCommandTimeoutMs,
        });
        store = redis.cache;
        close = async () => {
          await redis.client.quit();
        };
      }
      break;

    case 'memory':
    default:
      logger.info(
        { maxEntries: config.memoryMaxEntries, defaultTtlMs },
        '[Cache] Using in-memory cache'
      );
      store = createMemoryCache<StoredEntry<T>>({
        maxEntries: config.memoryMaxEntries,
        defaultTtlMs,
      });
      break;
  }

  const cache = createResilientCache<T>({
    store,
    logger,
    prefix: config.keyPrefix,
    resilienceTtlSeconds: config.resilienceTtlSeconds,
    whitelistedFailureKinds: config.whitelistedFailureKinds,
    ...(options.cacheTimes !== undefined && { cacheTimes: options.cacheTimes }),
  });

  return { cache, store, close };
};
