/**
 * Site Types
 *
 * Types for National Park Service sites and the state directory.
 */

/**
 * Fields read from a site detail page. Any of them may be missing.
 */
export interface SiteFields {
  readonly name?: string | undefined
  readonly category?: string | undefined
  /** City, e.g. "Houghton" */
  readonly locality?: string | undefined
  /** State abbreviation, e.g. "MI" */
  readonly region?: string | undefined
  readonly postalCode?: string | undefined
  readonly phone?: string | undefined
}

/**
 * A fully-populated site. Missing source data is replaced by a
 * sentinel placeholder, never left empty.
 */
export interface SiteRecord {
  /** e.g. "National Park", or "No Category" */
  readonly category: string
  /** e.g. "Isle Royale", or "No Name" */
  readonly name: string
  /** "City, ST", or "No Address" */
  readonly address: string
  /** e.g. "49931" or "82190-0168", or "No Zipcode" */
  readonly postalCode: string
  /** e.g. "(906) 482-0984", or "No Phone" */
  readonly phone: string
}

/**
 * On-disk shape of a site inside the cache file.
 */
export interface StoredSiteFields {
  readonly category: string
  readonly name: string
  readonly address: string
  readonly zipcode: string
  readonly phone: string
}

/**
 * Lowercase state name -> state directory page URL.
 * e.g. { michigan: 'https://www.nps.gov/state/mi/index.htm' }
 */
export type StateIndex = Readonly<Record<string, string>>

export const NO_NAME = 'No Name'
export const NO_CATEGORY = 'No Category'
export const NO_ADDRESS = 'No Address'
export const NO_ZIPCODE = 'No Zipcode'
export const NO_PHONE = 'No Phone'
