/**
 * Directory Module
 *
 * Fetch and parse nps.gov directory pages: the state menu on the root page,
 * the park list on a state page, and the detail fields on a site page.
 */

import { type CheerioAPI, load } from 'cheerio'
import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { NpsConfig, Result, SiteFields, StateIndex } from '../types'

const STATE_MENU_SELECTOR = '.dropdown-menu.SearchBar-keywordSearch'
const PARK_LIST_SELECTOR = '#list_parks'

/**
 * Resolve an href against the directory root.
 */
function resolveHref(href: string, baseUrl: string): string {
  return new URL(href, baseUrl).href
}

/**
 * Trimmed text of the first match, or undefined if nothing matches.
 */
function firstText($: CheerioAPI, selector: string): string | undefined {
  const match = $(selector).first()
  if (match.length === 0) return undefined
  return match.text().trim()
}

/**
 * Build the state index from the root page's state menu.
 * Returns null if the page has no state menu.
 */
export function parseStateIndex(html: string, baseUrl: string): StateIndex | null {
  const $ = load(html)
  const menu = $(STATE_MENU_SELECTOR).first()
  if (menu.length === 0) return null

  const index: Record<string, string> = {}
  menu.children('li').each((_, item) => {
    const anchor = $(item).find('a').first()
    const href = anchor.attr('href')
    const name = anchor.text().trim().toLowerCase()
    if (!href || !name) return
    index[name] = resolveHref(href, baseUrl)
  })
  return index
}

/**
 * Extract the ordered site detail URLs from a state page's park list.
 * Returns null if the page has no park list.
 */
export function parseSiteUrls(html: string, baseUrl: string): string[] | null {
  const $ = load(html)
  const list = $(PARK_LIST_SELECTOR).first()
  if (list.length === 0) return null

  const urls: string[] = []
  list.children('li').each((_, item) => {
    const href = $(item).find('a').first().attr('href')
    if (href) urls.push(resolveHref(href, baseUrl))
  })
  return urls
}

/**
 * Read the detail fields of a site page. Missing fields stay undefined.
 */
export function parseSiteFields(html: string): SiteFields {
  const $ = load(html)
  return {
    name: firstText($, '.Hero-title'),
    category: firstText($, '.Hero-designation'),
    locality: firstText($, '[itemprop="addressLocality"]'),
    region: firstText($, '[itemprop="addressRegion"]'),
    postalCode: firstText($, '[itemprop="postalCode"]'),
    phone: firstText($, '[itemprop="telephone"]')
  }
}

/**
 * Fetch a directory page and return its HTML.
 */
export async function fetchDirectoryPage(url: string, config: NpsConfig): Promise<Result<string>> {
  try {
    const response = await httpFetch(url, config.fetch)
    if (!response.ok) {
      return handleHttpError(response)
    }
    const html = await response.text()
    if (!html) {
      return emptyResponseError()
    }
    return { ok: true, value: html }
  } catch (error) {
    return handleNetworkError(error)
  }
}

function missingSection(section: string, url: string): Result<never> {
  return {
    ok: false,
    error: { type: 'invalid_response', message: `No ${section} found on ${url}` }
  }
}

/**
 * Fetch the root page and build the state index.
 */
export async function fetchStateIndex(config: NpsConfig): Promise<Result<StateIndex>> {
  const page = await fetchDirectoryPage(config.baseUrl, config)
  if (!page.ok) return page

  const index = parseStateIndex(page.value, config.baseUrl)
  if (!index) return missingSection('state menu', config.baseUrl)
  return { ok: true, value: index }
}

/**
 * Fetch a state page and list its site detail URLs.
 */
export async function fetchSiteUrls(
  stateUrl: string,
  config: NpsConfig
): Promise<Result<string[]>> {
  const page = await fetchDirectoryPage(stateUrl, config)
  if (!page.ok) return page

  const urls = parseSiteUrls(page.value, config.baseUrl)
  if (!urls) return missingSection('park list', stateUrl)
  return { ok: true, value: urls }
}

/**
 * Fetch a site page and read its detail fields.
 */
export async function fetchSiteFields(
  siteUrl: string,
  config: NpsConfig
): Promise<Result<SiteFields>> {
  const page = await fetchDirectoryPage(siteUrl, config)
  if (!page.ok) return page
  return { ok: true, value: parseSiteFields(page.value) }
}
