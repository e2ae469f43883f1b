/**
 * nps-sites Core Library
 *
 * Cached lookups of National Park Service sites and places near them.
 *
 * The library does no terminal I/O. Its only side effects are HTTP requests
 * and reads/writes of the cache store it is given.
 */

export const VERSION = '1.0.0'

// Cache module
export type {
  CacheEntry,
  CacheEntryKind,
  CacheEntryOf,
  CacheMapping,
  CacheStore
} from './caching/index'
export {
  DEFAULT_CACHE_FILE,
  decodeEntry,
  encodeEntry,
  generateNearbyCacheKey,
  generateSiteCacheKey,
  generateStateCacheKey,
  JsonFileCache,
  MemoryCache,
  STATE_INDEX_KEY
} from './caching/index'
// Directory module
export {
  fetchDirectoryPage,
  fetchSiteFields,
  fetchSiteUrls,
  fetchStateIndex,
  parseSiteFields,
  parseSiteUrls,
  parseStateIndex
} from './directory/index'
// HTTP
export { type FetchFn, guardedFetch, UncachedHttpRequestError } from './http'
// Nearby places module
export {
  buildSearchUrl,
  formatNearbyPlace,
  readNearbyPlaces,
  searchNearbyPlaces
} from './nearby/index'
// Resolvers
export {
  type CacheEvent,
  findStateUrl,
  type ResolverContext,
  resolveNearbyPlaces,
  resolveSite,
  resolveSitesForState,
  resolveSiteUrls,
  resolveStateIndex
} from './resolvers/index'
// Site module
export {
  composeAddress,
  formatSiteInfo,
  fromStoredFields,
  normalizeSite,
  toStoredFields
} from './site/index'
// Types
export * from './types'
