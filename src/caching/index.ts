/**
 * Cache Module
 *
 * Disk-backed cache shared by all resolvers.
 */

export { decodeEntry, encodeEntry } from './entry'
export { DEFAULT_CACHE_FILE, JsonFileCache, MemoryCache } from './filesystem'
export {
  generateNearbyCacheKey,
  generateSiteCacheKey,
  generateStateCacheKey,
  STATE_INDEX_KEY
} from './key'
export type {
  CacheEntry,
  CacheEntryKind,
  CacheEntryOf,
  CacheMapping,
  CacheStore
} from './types'
