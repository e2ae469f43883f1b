/**
 * Filesystem-based Cache Store for CLI
 *
 * Stores the whole cache as one JSON file. The file is rewritten in full on
 * every save; there is no locking, so concurrent processes can lose updates.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { isJsonObject } from '../types'
import type { CacheMapping, CacheStore } from './types'

/** Default cache file, relative to the working directory */
export const DEFAULT_CACHE_FILE = 'nps_cache.json'

/**
 * Single-file JSON cache.
 *
 * File layout:
 * ```
 * {
 *   "state_url_dict": { "michigan": "https://www.nps.gov/state/mi/index.htm", ... },
 *   "https://www.nps.gov/state/mi/index.htm": ["https://www.nps.gov/isro/index.htm", ...],
 *   "https://www.nps.gov/isro/index.htm": { "name": "Isle Royale", ... },
 *   "49931": { "searchResults": [...], ... }
 * }
 * ```
 */
export class JsonFileCache implements CacheStore {
  constructor(private readonly cachePath: string = DEFAULT_CACHE_FILE) {}

  get path(): string {
    return this.cachePath
  }

  async load(): Promise<CacheMapping> {
    if (!existsSync(this.cachePath)) {
      return {}
    }

    try {
      const raw = readFileSync(this.cachePath, 'utf-8')
      const parsed: unknown = JSON.parse(raw)
      return isJsonObject(parsed) ? parsed : {}
    } catch {
      // A missing or corrupt cache is just an empty cache
      return {}
    }
  }

  async save(mapping: CacheMapping): Promise<void> {
    const dir = dirname(this.cachePath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    writeFileSync(this.cachePath, JSON.stringify(mapping))
  }
}

/**
 * In-memory cache store. Holds a serialized copy so callers never share
 * object references with what is "on disk".
 */
export class MemoryCache implements CacheStore {
  private serialized = '{}'

  async load(): Promise<CacheMapping> {
    const parsed: unknown = JSON.parse(this.serialized)
    return isJsonObject(parsed) ? parsed : {}
  }

  async save(mapping: CacheMapping): Promise<void> {
    this.serialized = JSON.stringify(mapping)
  }
}
