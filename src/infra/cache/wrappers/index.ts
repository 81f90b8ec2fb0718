/**
 * Cache wrappers layered over backing stores.
 */

export {
  createResilientCache,
  isEmptyValue,
  type ResilientCacheOptions,
} from './resilient-cache.js';
