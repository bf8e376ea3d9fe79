/**
 * Cache module: L1 memory tier, L2 durable tier, and their composition
 */

export { TTLCache, type TTLCacheOptions, type TTLCacheStats } from './TTLCache.js'
export {
  DurableCache,
  type DurableCacheStore,
  type DurableCacheStats,
  type MethodStats,
} from './DurableCache.js'
export {
  TieredCache,
  createTieredCache,
  type TieredCacheOptions,
  type TieredCacheStats,
  type TierCounts,
  type CreateTieredCacheOptions,
} from './TieredCache.js'
export { CodecRegistry, jsonCodec, type CacheCodec } from './codecs.js'
export {
  type CacheEntry,
  type CacheEntryRow,
  rowToCacheEntry,
  createCacheEntry,
  isExpired,
  isValidCacheKey,
  methodFromKey,
  stableStringify,
  generateCacheKey,
  utf8Size,
} from './CacheEntry.js'
