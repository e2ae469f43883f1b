/**
 * Nearby Places Module
 *
 * Radius search around a postal code using the MapQuest Search API.
 * The raw response is returned as-is; defaults for empty fields are applied
 * only when formatting for display.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import {
  isJsonObject,
  type JsonValue,
  type NearbyPlace,
  type NearbyPlacesResult,
  type NpsConfig,
  RADIUS_SEARCH_PARAMS,
  type Result
} from '../types'

const NO_PLACE_CATEGORY = 'no category'
const NO_PLACE_ADDRESS = 'no address'
const NO_PLACE_CITY = 'no city'

/**
 * Build the radius search URL for an origin.
 */
export function buildSearchUrl(origin: string, config: NpsConfig): string {
  const params = new URLSearchParams({
    key: config.apiKey,
    origin,
    radius: String(RADIUS_SEARCH_PARAMS.radius),
    maxMatches: String(RADIUS_SEARCH_PARAMS.maxMatches),
    ambiguities: RADIUS_SEARCH_PARAMS.ambiguities,
    outFormat: RADIUS_SEARCH_PARAMS.outFormat
  })
  return `${config.searchUrl}?${params.toString()}`
}

/**
 * MapQuest reports request problems in `info.statuscode` with HTTP 200.
 * Returns an error Result for a non-zero status, null if OK.
 */
function handleSearchStatus(data: NearbyPlacesResult): Result<never> | null {
  const info = data.info
  if (!isJsonObject(info)) return null

  const status = info.statuscode
  if (typeof status !== 'number' || status === 0) return null

  const messages = Array.isArray(info.messages)
    ? info.messages.filter((m): m is string => typeof m === 'string')
    : []
  const detail = messages.length > 0 ? messages.join('; ') : `status ${status}`

  if (status === 403) {
    return { ok: false, error: { type: 'auth', message: `MapQuest request denied: ${detail}` } }
  }
  return { ok: false, error: { type: 'invalid_response', message: `MapQuest error: ${detail}` } }
}

function invalidSearchResponse(message: string): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message } }
}

/**
 * Parse a response body into a JSON object.
 */
function parseSearchBody(text: string): Result<NearbyPlacesResult> {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return invalidSearchResponse(`MapQuest response is not valid JSON: ${message}`)
  }
  if (!isJsonObject(data)) {
    return invalidSearchResponse('MapQuest response is not an object')
  }
  return { ok: true, value: data }
}

/**
 * Search for places within the fixed radius of a postal code.
 * The origin is sent as given, placeholder values included.
 */
export async function searchNearbyPlaces(
  origin: string,
  config: NpsConfig
): Promise<Result<NearbyPlacesResult>> {
  try {
    const response = await httpFetch(buildSearchUrl(origin, config), config.fetch)
    if (!response.ok) {
      return handleHttpError(response)
    }

    const text = await response.text()
    if (!text) {
      return emptyResponseError()
    }

    const data = parseSearchBody(text)
    if (!data.ok) return data

    const statusError = handleSearchStatus(data.value)
    if (statusError) return statusError

    return data
  } catch (error) {
    return handleNetworkError(error)
  }
}

function stringField(value: JsonValue | undefined): string {
  return typeof value === 'string' ? value.trim() : ''
}

/**
 * Read the places out of a radius search response. Fields absent from the
 * response come back as empty strings.
 */
export function readNearbyPlaces(result: NearbyPlacesResult): NearbyPlace[] {
  const searchResults = result.searchResults
  if (!Array.isArray(searchResults)) return []

  const places: NearbyPlace[] = []
  for (const item of searchResults) {
    if (!isJsonObject(item)) continue
    const fields = isJsonObject(item.fields) ? item.fields : {}
    places.push({
      name: stringField(item.name),
      category: stringField(fields.group_sic_code_name),
      address: stringField(fields.address),
      city: stringField(fields.city)
    })
  }
  return places
}

/**
 * Display line, e.g. "- Keweenaw Coffee (Coffee Shops): 100 Main St, Houghton"
 */
export function formatNearbyPlace(place: NearbyPlace): string {
  const category = place.category || NO_PLACE_CATEGORY
  const address = place.address || NO_PLACE_ADDRESS
  const city = place.city || NO_PLACE_CITY
  return `- ${place.name} (${category}): ${address}, ${city}`
}
