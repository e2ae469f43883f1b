/**
 * Response Caching Types
 *
 * One flat JSON mapping persisted on disk. Every resolver call loads the whole
 * mapping, and every live fetch saves the whole mapping back.
 */

import type { JsonValue, NearbyPlacesResult, StateIndex, StoredSiteFields } from '../types'

/**
 * The persisted mapping: cache key -> stored value.
 * Keys are the state index sentinel, state/site URLs, and postal codes.
 */
export type CacheMapping = Record<string, JsonValue>

/**
 * Pluggable cache store interface.
 *
 * Implementations:
 * - CLI: JsonFileCache (single JSON file)
 * - Tests: MemoryCache
 *
 * Entries are kept forever - no TTL, no eviction.
 */
export interface CacheStore {
  /**
   * Read the full mapping. Returns an empty mapping if nothing usable is stored.
   */
  load(): Promise<CacheMapping>

  /**
   * Overwrite the stored mapping with `mapping`.
   */
  save(mapping: CacheMapping): Promise<void>
}

/**
 * Stored value, tagged by the request class its key belongs to.
 */
export type CacheEntry =
  | { readonly kind: 'state-index'; readonly value: StateIndex }
  | { readonly kind: 'site-urls'; readonly value: readonly string[] }
  | { readonly kind: 'site'; readonly value: StoredSiteFields }
  | { readonly kind: 'nearby-places'; readonly value: NearbyPlacesResult }

export type CacheEntryKind = CacheEntry['kind']

/** The entry variant for a given kind */
export type CacheEntryOf<K extends CacheEntryKind> = Extract<CacheEntry, { kind: K }>
