/**
 * Test Support Module
 *
 * Fake nps.gov pages and an in-process fetch that serves them.
 */

import type { FetchFn } from '../http'
import type { NpsConfig } from '../types'

export const TEST_BASE_URL = 'https://nps.test'
export const TEST_SEARCH_URL = 'https://mapquest.test/search/v2/radius'

/**
 * A canned response for one URL.
 */
export interface MockRoute {
  readonly status?: number
  readonly body: string
}

export interface MockFetch {
  readonly fetch: FetchFn
  /** Every requested URL, in order */
  readonly requests: string[]
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input
  if (input instanceof URL) return input.href
  return input.url
}

/**
 * Create a fetch that serves canned responses and records each request.
 * A route keyed without a query string matches any query on that path.
 * Unknown URLs reject like an unreachable host.
 */
export function createMockFetch(routes: ReadonlyMap<string, MockRoute>): MockFetch {
  const requests: string[] = []

  const fetch: FetchFn = async (input) => {
    const url = requestUrl(input)
    requests.push(url)

    const parsed = new URL(url)
    const route = routes.get(url) ?? routes.get(`${parsed.origin}${parsed.pathname}`)
    if (!route) {
      throw new Error(`No mock response for URL: ${url}`)
    }
    return new Response(route.body, { status: route.status ?? 200 })
  }

  return { fetch, requests }
}

/**
 * Create a config pointing at the fake endpoints.
 */
export function createTestConfig(fetch: FetchFn, overrides: Partial<NpsConfig> = {}): NpsConfig {
  return {
    baseUrl: TEST_BASE_URL,
    searchUrl: TEST_SEARCH_URL,
    apiKey: 'test-key',
    fetch,
    ...overrides
  }
}

// ============================================================================
// Fake pages
// ============================================================================

/**
 * Root page with the state menu. States map display name -> href.
 */
export function createRootPageHtml(states: Readonly<Record<string, string>>): string {
  const items = Object.entries(states)
    .map(([name, href]) => `      <li><a href="${href}">${name}</a></li>`)
    .join('\n')
  return `<html><body>
  <nav>
    <ul class="dropdown-menu SearchBar-keywordSearch">
${items}
    </ul>
  </nav>
</body></html>`
}

/**
 * State page with a park list of the given detail-page hrefs.
 */
export function createStatePageHtml(siteHrefs: readonly string[]): string {
  const items = siteHrefs
    .map(
      (href) => `    <li class="clearfix"><h3><a href="${href}">Park</a></h3><p>About</p></li>`
    )
    .join('\n')
  return `<html><body>
  <ul id="list_parks">
${items}
  </ul>
</body></html>`
}

export interface SitePageFields {
  readonly name?: string
  readonly category?: string
  readonly locality?: string
  readonly region?: string
  readonly postalCode?: string
  readonly phone?: string
}

/**
 * Site detail page. Omitted fields are left out of the markup entirely.
 */
export function createSitePageHtml(fields: SitePageFields): string {
  const parts: string[] = []
  if (fields.name !== undefined) parts.push(`<a class="Hero-title">${fields.name}</a>`)
  if (fields.category !== undefined) {
    parts.push(`<span class="Hero-designation">${fields.category}</span>`)
  }
  if (fields.locality !== undefined) {
    parts.push(`<span itemprop="addressLocality">${fields.locality}</span>`)
  }
  if (fields.region !== undefined) {
    parts.push(`<span itemprop="addressRegion">${fields.region}</span>`)
  }
  if (fields.postalCode !== undefined) {
    parts.push(`<span itemprop="postalCode">${fields.postalCode}</span>`)
  }
  if (fields.phone !== undefined) {
    parts.push(`<span itemprop="telephone">${fields.phone}</span>`)
  }
  return `<html><body>\n${parts.join('\n')}\n</body></html>`
}

/**
 * MapQuest radius search response body.
 */
export function createSearchResponse(
  places: ReadonlyArray<{
    name: string
    category?: string
    address?: string
    city?: string
  }>
): string {
  return JSON.stringify({
    info: { statuscode: 0, messages: [] },
    resultsCount: places.length,
    searchResults: places.map((place) => ({
      name: place.name,
      fields: {
        group_sic_code_name: place.category ?? '',
        address: place.address ?? '',
        city: place.city ?? ''
      }
    }))
  })
}
