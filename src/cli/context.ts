/**
 * Browse Context
 *
 * Resolves runtime settings (CLI flag > env var > config file > default) and
 * builds the resolver context for a session.
 */

import { DEFAULT_CACHE_FILE, JsonFileCache } from '../caching/filesystem'
import type { CacheEvent, ResolverContext } from '../resolvers/index'
import { DEFAULT_BASE_URL, DEFAULT_SEARCH_URL, type NpsConfig } from '../types'
import type { Config } from './config'
import type { Logger } from './logger'

type Env = Readonly<Record<string, string | undefined>>

/**
 * Thrown when required settings are missing at startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Get the cache file: CLI arg > env var > config file > default.
 */
export function getCacheFile(
  override: string | undefined,
  config: Config | null,
  env: Env
): string {
  return override || env.NPS_SITES_CACHE_FILE || config?.cacheFile || DEFAULT_CACHE_FILE
}

/**
 * Get the MapQuest key: env var > config file. Throws if neither is set.
 */
export function getApiKey(config: Config | null, env: Env): string {
  const apiKey = env.MAPQUEST_API_KEY || config?.mapquestKey
  if (!apiKey) {
    throw new ConfigurationError(
      'MapQuest API key not configured. ' +
        'Set MAPQUEST_API_KEY or run: nps-sites config set mapquestKey <key>'
    )
  }
  return apiKey
}

/**
 * Build the fetcher config from settings.
 */
export function createNpsConfig(config: Config | null, env: Env): NpsConfig {
  return {
    baseUrl: config?.baseUrl ?? DEFAULT_BASE_URL,
    searchUrl: DEFAULT_SEARCH_URL,
    apiKey: getApiKey(config, env)
  }
}

/**
 * Report cache hits and misses the way the CLI shows them.
 */
export function createCacheEventLogger(logger: Logger): (event: CacheEvent) => void {
  return (event) => {
    logger.log(event.type === 'hit' ? 'Using Cache' : 'Fetching')
    logger.verbose(`${event.kind}: ${event.key}`)
  }
}

export interface BrowseContextOptions {
  readonly cacheFile?: string | undefined
  readonly env?: Env | undefined
}

/**
 * Initialize the resolver context for a browse session.
 */
export function initBrowseContext(
  config: Config | null,
  logger: Logger,
  options: BrowseContextOptions = {}
): ResolverContext {
  const env = options.env ?? process.env
  const npsConfig = createNpsConfig(config, env)
  const cacheFile = getCacheFile(options.cacheFile, config, env)
  logger.verbose(`Cache file: ${cacheFile}`)

  return {
    store: new JsonFileCache(cacheFile),
    config: npsConfig,
    onCacheEvent: createCacheEventLogger(logger)
  }
}
