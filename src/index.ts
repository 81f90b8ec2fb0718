/**
 * Resilient cache: stale-if-error caching over a pluggable key/value store.
 */

export * from './infra/cache/index.js';
export { createLogger, type Logger, type LoggerConfig, type LogLevel } from './infra/logger/index.js';
export { EnvSchema, parseEnv, createConfig, type Env, type AppConfig } from './infra/config/index.js';
