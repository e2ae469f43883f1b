/**
 * Site Module
 *
 * Builds fully-populated site records from whatever a detail page provided.
 * All sentinel substitution happens in normalizeSite().
 */

import {
  NO_ADDRESS,
  NO_CATEGORY,
  NO_NAME,
  NO_PHONE,
  NO_ZIPCODE,
  type SiteFields,
  type SiteRecord,
  type StoredSiteFields
} from '../types'

/**
 * Trimmed value. A blank field stays blank; only a missing one is undefined.
 */
function present(value: string | undefined): string | undefined {
  return value?.trim()
}

/**
 * Join locality and region as "City, ST". Both halves are required.
 */
export function composeAddress(
  locality: string | undefined,
  region: string | undefined
): string {
  const city = present(locality)
  const state = present(region)
  if (city === undefined || state === undefined) return NO_ADDRESS
  return `${city}, ${state}`
}

/**
 * Build a site record from an optional-field bag.
 */
export function normalizeSite(fields: SiteFields): SiteRecord {
  return Object.freeze({
    category: present(fields.category) ?? NO_CATEGORY,
    name: present(fields.name) ?? NO_NAME,
    address: composeAddress(fields.locality, fields.region),
    postalCode: present(fields.postalCode) ?? NO_ZIPCODE,
    phone: present(fields.phone) ?? NO_PHONE
  })
}

/**
 * Field mapping persisted in the cache file.
 */
export function toStoredFields(site: SiteRecord): StoredSiteFields {
  return {
    category: site.category,
    name: site.name,
    address: site.address,
    zipcode: site.postalCode,
    phone: site.phone
  }
}

/**
 * Rebuild a site record from its cached field mapping. Values are used as
 * stored, sentinels included.
 */
export function fromStoredFields(stored: StoredSiteFields): SiteRecord {
  return Object.freeze({
    category: stored.category,
    name: stored.name,
    address: stored.address,
    postalCode: stored.zipcode,
    phone: stored.phone
  })
}

/**
 * One-line summary, e.g. "Isle Royale (National Park): Houghton, MI 49931"
 */
export function formatSiteInfo(site: SiteRecord): string {
  return `${site.name} (${site.category}): ${site.address} ${site.postalCode}`
}
