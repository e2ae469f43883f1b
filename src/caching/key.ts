/**
 * Cache Key Generation
 *
 * Keys are raw strings chosen per request class. They are written to the cache
 * file as-is, so they must stay stable across releases.
 */

import type { SiteRecord } from '../types'

/** Sentinel key for the state name -> URL index */
export const STATE_INDEX_KEY = 'state_url_dict'

/**
 * Key for a state's site URL list: the state page URL itself.
 */
export function generateStateCacheKey(stateUrl: string): string {
  return stateUrl
}

/**
 * Key for a site's detail fields: the site page URL itself.
 */
export function generateSiteCacheKey(siteUrl: string): string {
  return siteUrl
}

/**
 * Key for nearby places: the site's postal code.
 *
 * Sites without a postal code all share the "No Zipcode" key, and so share
 * one cached search result.
 */
export function generateNearbyCacheKey(site: Pick<SiteRecord, 'postalCode'>): string {
  return site.postalCode
}
