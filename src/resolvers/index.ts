/**
 * Cached Resolvers
 *
 * Each resolver answers one request shape from the cache file when the key is
 * already stored, and otherwise fetches live, stores the result under the key
 * and saves the whole cache. Stored keys are never refetched or expired.
 */

import { decodeEntry, encodeEntry } from '../caching/entry'
import {
  generateNearbyCacheKey,
  generateSiteCacheKey,
  generateStateCacheKey,
  STATE_INDEX_KEY
} from '../caching/key'
import type { CacheEntryKind, CacheEntryOf, CacheStore } from '../caching/types'
import { fetchSiteFields, fetchSiteUrls, fetchStateIndex } from '../directory/index'
import { searchNearbyPlaces } from '../nearby/index'
import { fromStoredFields, normalizeSite, toStoredFields } from '../site/index'
import type { NearbyPlacesResult, NpsConfig, Result, SiteRecord, StateIndex } from '../types'

/** Emitted once per resolver call */
export interface CacheEvent {
  readonly type: 'hit' | 'miss'
  readonly kind: CacheEntryKind
  readonly key: string
}

export interface ResolverContext {
  readonly store: CacheStore
  readonly config: NpsConfig
  readonly onCacheEvent?: ((event: CacheEvent) => void) | undefined
}

/**
 * Cache-or-fetch policy shared by every resolver.
 *
 * 1. Load the whole cache.
 * 2. Hit: return the stored entry, no network access.
 * 3. Miss: fetch, store under the key, save the whole cache, return.
 *
 * A failed fetch stores nothing. A stored value of the wrong shape counts as a miss.
 */
async function resolveCached<K extends CacheEntryKind>(
  ctx: ResolverContext,
  kind: K,
  key: string,
  fetchEntry: () => Promise<Result<CacheEntryOf<K>>>
): Promise<Result<CacheEntryOf<K>>> {
  const mapping = await ctx.store.load()
  const cached = decodeEntry(kind, Object.hasOwn(mapping, key) ? mapping[key] : undefined)
  if (cached) {
    ctx.onCacheEvent?.({ type: 'hit', kind, key })
    return { ok: true, value: cached }
  }

  ctx.onCacheEvent?.({ type: 'miss', kind, key })
  const fetched = await fetchEntry()
  if (!fetched.ok) return fetched

  mapping[key] = encodeEntry(fetched.value)
  await ctx.store.save(mapping)
  return fetched
}

/**
 * Lowercase state name -> state page URL, cached under a fixed key.
 */
export async function resolveStateIndex(ctx: ResolverContext): Promise<Result<StateIndex>> {
  const result = await resolveCached<'state-index'>(
    ctx,
    'state-index',
    STATE_INDEX_KEY,
    async () => {
      const fetched = await fetchStateIndex(ctx.config)
      if (!fetched.ok) return fetched
      return { ok: true, value: { kind: 'state-index', value: fetched.value } }
    }
  )
  if (!result.ok) return result
  return { ok: true, value: result.value.value }
}

/**
 * Ordered site detail URLs for a state page, cached under the state URL.
 */
export async function resolveSiteUrls(
  ctx: ResolverContext,
  stateUrl: string
): Promise<Result<readonly string[]>> {
  const key = generateStateCacheKey(stateUrl)
  const result = await resolveCached<'site-urls'>(ctx, 'site-urls', key, async () => {
    const fetched = await fetchSiteUrls(stateUrl, ctx.config)
    if (!fetched.ok) return fetched
    return { ok: true, value: { kind: 'site-urls', value: fetched.value } }
  })
  if (!result.ok) return result
  return { ok: true, value: result.value.value }
}

/**
 * One site's record, cached under the site URL.
 */
export async function resolveSite(
  ctx: ResolverContext,
  siteUrl: string
): Promise<Result<SiteRecord>> {
  const key = generateSiteCacheKey(siteUrl)
  const result = await resolveCached<'site'>(ctx, 'site', key, async () => {
    const fetched = await fetchSiteFields(siteUrl, ctx.config)
    if (!fetched.ok) return fetched
    const site = normalizeSite(fetched.value)
    return { ok: true, value: { kind: 'site', value: toStoredFields(site) } }
  })
  if (!result.ok) return result
  return { ok: true, value: fromStoredFields(result.value.value) }
}

/**
 * All sites of a state, in park list order.
 *
 * The URL list and every site are cached independently: a cached URL list
 * still resolves each site through its own cache check. Sites resolve one at
 * a time and the first failure ends the listing.
 */
export async function resolveSitesForState(
  ctx: ResolverContext,
  stateUrl: string
): Promise<Result<SiteRecord[]>> {
  const urls = await resolveSiteUrls(ctx, stateUrl)
  if (!urls.ok) return urls

  const sites: SiteRecord[] = []
  for (const url of urls.value) {
    const site = await resolveSite(ctx, url)
    if (!site.ok) return site
    sites.push(site.value)
  }
  return { ok: true, value: sites }
}

/**
 * Raw radius search around a site, cached under its postal code.
 *
 * Sites without a postal code search for and share the "No Zipcode" entry.
 */
export async function resolveNearbyPlaces(
  ctx: ResolverContext,
  site: SiteRecord
): Promise<Result<NearbyPlacesResult>> {
  const key = generateNearbyCacheKey(site)
  const result = await resolveCached<'nearby-places'>(ctx, 'nearby-places', key, async () => {
    const fetched = await searchNearbyPlaces(site.postalCode, ctx.config)
    if (!fetched.ok) return fetched
    return { ok: true, value: { kind: 'nearby-places', value: fetched.value } }
  })
  if (!result.ok) return result
  return { ok: true, value: result.value.value }
}

/**
 * Case-insensitive state lookup. Returns undefined for unknown states.
 */
export function findStateUrl(index: StateIndex, input: string): string | undefined {
  const name = input.trim().toLowerCase()
  return Object.hasOwn(index, name) ? index[name] : undefined
}
