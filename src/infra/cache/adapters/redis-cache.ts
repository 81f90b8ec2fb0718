/**
 * Redis backing store using ioredis.
 */

import { Redis } from 'ioredis';
import { err, ok, type Result } from 'neverthrow';

import {
  CacheError as CacheErrorFactory,
  type CacheError,
  type CachePort,
  type CacheSetOptions,
  type CacheStats,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

export interface RedisCacheOptions {
  /** Redis connection URL */
  url: string;
  /** Password, when not part of the URL */
  password?: string;
  /** Default TTL in milliseconds. Default: 3600000 (1 hour) */
  defaultTtlMs?: number;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
}

/**
 * Map a thrown ioredis error onto a CacheError.
 */
const toCacheError = (cause: unknown, errorMessage: string): CacheError => {
  if (cause instanceof Error) {
    if (cause.message.includes('ETIMEDOUT') || /time(d )?out/i.test(cause.message)) {
      return CacheErrorFactory.timeout(errorMessage, cause);
    }
  }
  return CacheErrorFactory.connection(errorMessage, cause);
};

const wrapRedisOp = async <T>(
  op: () => Promise<T>,
  errorMessage: string
): Promise<Result<T, CacheError>> => {
  try {
    const result = await op();
    return ok(result);
  } catch (cause) {
    return err(toCacheError(cause, errorMessage));
  }
};

/**
 * Create a Redis store together with its client, for lifecycle management.
 */
export const createRedisCacheWithClient = <T>(
  options: RedisCacheOptions
): { cache: CachePort<T>; client: Redis } => {
  const client = new Redis(options.url, {
    ...(options.password !== undefined && { password: options.password }),
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
  });

  const cache = createRedisCacheFromClient<T>(
    client,
    options.defaultTtlMs !== undefined ? { defaultTtlMs: options.defaultTtlMs } : {}
  );

  return { cache, client };
};

/**
 * Create a Redis store from an existing client.
 * Keys are used as given; namespacing belongs to the caller.
 */
export const createRedisCacheFromClient = <T>(
  client: Redis,
  options: { defaultTtlMs?: number } = {}
): CachePort<T> => {
  const defaultTtlMs = options.defaultTtlMs ?? 3600000;

  let hits = 0;
  let misses = 0;

  return {
    async get(key: string) {
      const result = await wrapRedisOp(() => client.get(key), `Failed to get key: ${key}`);

      if (result.isErr()) {
        return err(result.error);
      }

      if (result.value === null) {
        misses++;
        return ok(undefined);
      }

      const deserialized = deserialize(result.value);
      if (!deserialized.ok) {
        misses++;
        return err(deserialized.error);
      }

      hits++;
      return ok(deserialized.value as T);
    },

    async set(key: string, value: T, setOptions?: CacheSetOptions) {
      const serialized = serialize(value);
      if (!serialized.ok) {
        return err(serialized.error);
      }
      const payload = serialized.value;

      const result =
        setOptions?.indefinite === true
          ? await wrapRedisOp(() => client.set(key, payload), `Failed to set key: ${key}`)
          : await wrapRedisOp(
              () => client.set(key, payload, 'PX', setOptions?.ttlMs ?? defaultTtlMs),
              `Failed to set key: ${key}`
            );

      if (result.isErr()) {
        return err(result.error);
      }

      return ok(undefined);
    },

    async delete(key: string) {
      const result = await wrapRedisOp(() => client.del(key), `Failed to delete key: ${key}`);

      if (result.isErr()) {
        return err(result.error);
      }

      return ok(result.value > 0);
    },

    stats(): Promise<CacheStats> {
      // Key counting via SCAN is too expensive for monitoring calls.
      return Promise.resolve({ hits, misses, size: 0 });
    },
  };
};
