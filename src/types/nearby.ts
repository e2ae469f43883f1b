/**
 * Nearby Places Types
 *
 * MapQuest radius search response shapes.
 */

import type { JsonObject } from './common'

/**
 * Raw radius search response, cached and passed through unmodified.
 * Only `searchResults` and `info` are read; everything else is kept as-is.
 */
export type NearbyPlacesResult = JsonObject

/**
 * One place from `searchResults`, as read for display.
 */
export interface NearbyPlace {
  readonly name: string
  readonly category: string
  readonly address: string
  readonly city: string
}

/**
 * Fixed radius search parameters.
 */
export interface RadiusSearchParams {
  readonly radius: number
  readonly maxMatches: number
  readonly ambiguities: 'ignore'
  readonly outFormat: 'json'
}

export const RADIUS_SEARCH_PARAMS: RadiusSearchParams = {
  radius: 10,
  maxMatches: 10,
  ambiguities: 'ignore',
  outFormat: 'json'
}
