/**
 * Cache Entry Codec
 *
 * Converts between tagged cache entries and the untagged JSON values kept in
 * the cache file. The tag is never written; the resolver that owns a key knows
 * which kind to decode.
 */

import { isJsonObject, type JsonValue, type StoredSiteFields } from '../types'
import type { CacheEntry, CacheEntryKind, CacheEntryOf } from './types'

function isString(value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Convert an entry to the value stored under its key.
 */
export function encodeEntry(entry: CacheEntry): JsonValue {
  switch (entry.kind) {
    case 'state-index':
      return { ...entry.value }
    case 'site-urls':
      return [...entry.value]
    case 'site': {
      const { category, name, address, zipcode, phone } = entry.value
      return { category, name, address, zipcode, phone }
    }
    case 'nearby-places':
      return entry.value
  }
}

type Decoders = {
  [K in CacheEntryKind]: (raw: JsonValue) => CacheEntryOf<K> | null
}

const DECODERS: Decoders = {
  'state-index': (raw) => {
    if (!isJsonObject(raw)) return null
    const index: Record<string, string> = {}
    for (const [state, url] of Object.entries(raw)) {
      if (!isString(url)) return null
      index[state] = url
    }
    return { kind: 'state-index', value: index }
  },

  'site-urls': (raw) => {
    if (!Array.isArray(raw) || !raw.every(isString)) return null
    return { kind: 'site-urls', value: raw }
  },

  site: (raw) => {
    if (!isJsonObject(raw)) return null
    const { category, name, address, zipcode, phone } = raw
    if (
      !isString(category) ||
      !isString(name) ||
      !isString(address) ||
      !isString(zipcode) ||
      !isString(phone)
    ) {
      return null
    }
    const value: StoredSiteFields = { category, name, address, zipcode, phone }
    return { kind: 'site', value }
  },

  'nearby-places': (raw) => {
    if (!isJsonObject(raw)) return null
    return { kind: 'nearby-places', value: raw }
  }
}

/**
 * Read a stored value as the given kind.
 * Returns null when nothing is stored or the stored shape doesn't match.
 */
export function decodeEntry<K extends CacheEntryKind>(
  kind: K,
  raw: JsonValue | undefined
): CacheEntryOf<K> | null {
  if (raw === undefined) return null
  return DECODERS[kind](raw)
}
