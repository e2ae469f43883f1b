/**
 * HTTP Utilities
 *
 * Helper types and functions shared by the directory and nearby-places fetchers.
 */

import type { Result } from './types'

/**
 * Fetch function type for dependency injection.
 */
export type FetchFn = typeof fetch

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Tests in CI must never reach nps.gov or MapQuest.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a live HTTP request is made while requests are blocked.
 */
export class UncachedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `Uncached HTTP request to ${url} blocked: running tests in CI. ` +
        'Pass a mock fetch in the config instead.'
    )
    this.name = 'UncachedHttpRequestError'
  }
}

/**
 * The parts of a fetch Response the fetchers read.
 * Mocks in tests only need to provide these members.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  text(): Promise<string>
}

/**
 * Guarded fetch - throws when HTTP requests are blocked.
 * Use this as the default instead of global fetch.
 */
export const guardedFetch: FetchFn = (input, init) => {
  let url: string
  if (typeof input === 'string') {
    url = input
  } else if (input instanceof URL) {
    url = input.href
  } else {
    url = input.url
  }
  if (shouldBlockHttpRequests()) {
    throw new UncachedHttpRequestError(url)
  }
  return fetch(input, init)
}

/**
 * Fetch a URL with the configured (or guarded) fetch function.
 */
export async function httpFetch(
  url: string,
  fetchFn: FetchFn = guardedFetch
): Promise<HttpResponse> {
  return fetchFn(url)
}

/**
 * Handle HTTP error responses uniformly across all fetchers.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    return { ok: false, error: { type: 'rate_limit', message: `Rate limited: ${errorText}` } }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `HTTP error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all fetchers.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from server' } }
}
