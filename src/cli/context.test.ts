import { describe, expect, it } from 'vitest'
import { DEFAULT_CACHE_FILE, JsonFileCache } from '../caching/filesystem'
import { DEFAULT_BASE_URL, DEFAULT_SEARCH_URL } from '../types'
import {
  ConfigurationError,
  createCacheEventLogger,
  createNpsConfig,
  getApiKey,
  getCacheFile,
  initBrowseContext
} from './context'
import type { Logger } from './logger'

function createRecordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = []
  return {
    lines,
    log: (msg: string) => lines.push(msg),
    verbose: (msg: string) => lines.push(`[debug] ${msg}`),
    success: (msg: string) => lines.push(msg),
    error: (msg: string) => lines.push(`[error] ${msg}`)
  }
}

describe('getCacheFile', () => {
  it('prefers the CLI flag', () => {
    const file = getCacheFile(
      'flag.json',
      { cacheFile: 'config.json' },
      { NPS_SITES_CACHE_FILE: 'env.json' }
    )
    expect(file).toBe('flag.json')
  })

  it('falls back to the env var, then the config file', () => {
    const config = { cacheFile: 'config.json' }
    expect(getCacheFile(undefined, config, { NPS_SITES_CACHE_FILE: 'env.json' })).toBe('env.json')
    expect(getCacheFile(undefined, config, {})).toBe('config.json')
  })

  it('skips empty values', () => {
    expect(getCacheFile('', { cacheFile: '' }, { NPS_SITES_CACHE_FILE: '' })).toBe(
      DEFAULT_CACHE_FILE
    )
    const config = { cacheFile: 'config.json' }
    expect(getCacheFile(undefined, config, { NPS_SITES_CACHE_FILE: '' })).toBe('config.json')
  })

  it('defaults to nps_cache.json in the working directory', () => {
    expect(getCacheFile(undefined, null, {})).toBe(DEFAULT_CACHE_FILE)
    expect(DEFAULT_CACHE_FILE).toBe('nps_cache.json')
  })
})

describe('getApiKey', () => {
  it('prefers the env var over the config file', () => {
    const config = { mapquestKey: 'config-key' }
    expect(getApiKey(config, { MAPQUEST_API_KEY: 'env-key' })).toBe('env-key')
    expect(getApiKey(config, {})).toBe('config-key')
  })

  it('throws a ConfigurationError when no key is set', () => {
    expect(() => getApiKey(null, { MAPQUEST_API_KEY: '' })).toThrow(ConfigurationError)
    expect(() => getApiKey({}, {})).toThrow('MapQuest API key not configured')
  })
})

describe('createNpsConfig', () => {
  it('uses the default endpoints', () => {
    expect(createNpsConfig(null, { MAPQUEST_API_KEY: 'test-key' })).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      searchUrl: DEFAULT_SEARCH_URL,
      apiKey: 'test-key'
    })
  })

  it('takes the directory root from the config file', () => {
    const config = createNpsConfig({ baseUrl: 'https://nps.test', mapquestKey: 'test-key' }, {})
    expect(config.baseUrl).toBe('https://nps.test')
  })
})

describe('createCacheEventLogger', () => {
  it('logs hits and misses', () => {
    const logger = createRecordingLogger()
    const onCacheEvent = createCacheEventLogger(logger)

    onCacheEvent({ type: 'miss', kind: 'state-index', key: 'state_url_dict' })
    onCacheEvent({ type: 'hit', kind: 'state-index', key: 'state_url_dict' })

    expect(logger.lines).toEqual([
      'Fetching',
      '[debug] state-index: state_url_dict',
      'Using Cache',
      '[debug] state-index: state_url_dict'
    ])
  })
})

describe('initBrowseContext', () => {
  it('opens the resolved cache file', () => {
    const logger = createRecordingLogger()
    const ctx = initBrowseContext({ mapquestKey: 'test-key' }, logger, {
      cacheFile: '/tmp/nps-test-cache.json',
      env: {}
    })

    expect(ctx.store).toBeInstanceOf(JsonFileCache)
    if (ctx.store instanceof JsonFileCache) {
      expect(ctx.store.path).toBe('/tmp/nps-test-cache.json')
    }
    expect(ctx.config.apiKey).toBe('test-key')
    expect(logger.lines).toEqual(['[debug] Cache file: /tmp/nps-test-cache.json'])
  })

  it('fails before any cache access when the key is missing', () => {
    expect(() => initBrowseContext(null, createRecordingLogger(), { env: {} })).toThrow(
      ConfigurationError
    )
  })
})
