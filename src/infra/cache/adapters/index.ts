/**
 * Backing store adapters.
 */

export { createNoopCache } from './noop-cache.js';
export { createMemoryCache, type MemoryCacheOptions } from './memory-cache.js';
export {
  createRedisCacheWithClient,
  createRedisCacheFromClient,
  type RedisCacheOptions,
} from './redis-cache.js';
