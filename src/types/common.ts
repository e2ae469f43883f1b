/**
 * Common Types
 *
 * Shared types used across multiple modules: Result, JSON values, runtime config.
 */

import type { FetchFn } from '../http'

// Result Types
export type ApiErrorType = 'rate_limit' | 'auth' | 'network' | 'invalid_response'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

// JSON Types
export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Runtime Config
/**
 * Endpoints and credentials handed to every fetcher and resolver.
 * Tests substitute fake endpoints, keys and a mock fetch.
 */
export interface NpsConfig {
  /** Directory site root, e.g. https://www.nps.gov */
  readonly baseUrl: string
  /** MapQuest radius search endpoint */
  readonly searchUrl: string
  /** MapQuest API key */
  readonly apiKey: string
  /** Custom fetch function for testing/mocking */
  readonly fetch?: FetchFn | undefined
}

export const DEFAULT_BASE_URL = 'https://www.nps.gov'
export const DEFAULT_SEARCH_URL = 'http://www.mapquestapi.com/search/v2/radius'
