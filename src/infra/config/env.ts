/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { createCacheConfig } from '../cache/client.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Cache
  CACHE_BACKEND: Type.Optional(
    Type.Union([Type.Literal('disabled'), Type.Literal('memory'), Type.Literal('redis')])
  ),
  CACHE_PREFIX: Type.String({ minLength: 1, default: 'app' }),
  CACHE_RESILIENCE_TTL_SECONDS: Type.Integer({ minimum: 1, default: 86400 }),
  CACHE_MEMORY_MAX_ENTRIES: Type.Integer({ minimum: 1, default: 1000 }),
  /** Comma-separated failure kinds for which stale values may be served */
  CACHE_STALE_FAILURE_KINDS: Type.Optional(Type.String()),
  REDIS_URL: Type.Optional(Type.String()),
  REDIS_PASSWORD: Type.Optional(Type.String()),
  REDIS_CONNECT_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 5000 }),
  /** Commands slower than this fail with a TimeoutError */
  REDIS_COMMAND_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 1000 }),
});

export type Env = Static<typeof EnvSchema>;

const parseOptionalInt = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined || value === '') return defaultValue;
  return Number(value);
};

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    CACHE_BACKEND: emptyToUndefined(env['CACHE_BACKEND']?.toLowerCase()),
    CACHE_PREFIX: env['CACHE_PREFIX'] ?? 'app',
    CACHE_RESILIENCE_TTL_SECONDS: parseOptionalInt(env['CACHE_RESILIENCE_TTL_SECONDS'], 86400),
    CACHE_MEMORY_MAX_ENTRIES: parseOptionalInt(env['CACHE_MEMORY_MAX_ENTRIES'], 1000),
    CACHE_STALE_FAILURE_KINDS: emptyToUndefined(env['CACHE_STALE_FAILURE_KINDS']),
    REDIS_URL: emptyToUndefined(env['REDIS_URL']),
    REDIS_PASSWORD: emptyToUndefined(env['REDIS_PASSWORD']),
    REDIS_CONNECT_TIMEOUT_MS: parseOptionalInt(env['REDIS_CONNECT_TIMEOUT_MS'], 5000),
    REDIS_COMMAND_TIMEOUT_MS: parseOptionalInt(env['REDIS_COMMAND_TIMEOUT_MS'], 1000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  environment: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  cache: createCacheConfig(env),
});

export type AppConfig = ReturnType<typeof createConfig>;
