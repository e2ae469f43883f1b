/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/nps-sites/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or NPS_SITES_CONFIG env var.
 * The MapQuest key lives here (or in MAPQUEST_API_KEY), never in the repository.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { isJsonObject } from '../types'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** MapQuest API key */
  mapquestKey?: string | undefined
  /** Cache file path (default: ./nps_cache.json) */
  cacheFile?: string | undefined
  /** Directory site root (default: https://www.nps.gov) */
  baseUrl?: string | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

const CONFIG_KEYS: readonly ConfigKey[] = ['baseUrl', 'cacheFile', 'mapquestKey']

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  baseUrl: 'Directory site root (default: https://www.nps.gov)',
  cacheFile: 'Cache file path (default: ./nps_cache.json)',
  mapquestKey: 'MapQuest API key (or set MAPQUEST_API_KEY)'
}

/** Keys whose values are masked when listed */
const SECRET_KEYS: readonly ConfigKey[] = ['mapquestKey']

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for nps-sites.
 * Uses ~/.config/nps-sites on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'nps-sites')
}

/**
 * Get the config file path.
 * Priority: configFile arg > NPS_SITES_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.NPS_SITES_CONFIG) {
    return process.env.NPS_SITES_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 * Values of the wrong type are dropped.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    const parsed: unknown = JSON.parse(content)
    if (!isJsonObject(parsed)) return null

    const config: Config = {}
    for (const key of CONFIG_KEYS) {
      const value = optionalString(parsed[key])
      if (value !== undefined) config[key] = value
    }
    const updatedAt = optionalString(parsed.updatedAt)
    if (updatedAt !== undefined) config.updatedAt = updatedAt
    return config
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Format a config value for display. Secrets show only their last 4 characters.
 */
export function formatConfigValue(key: ConfigKey, value: string): string {
  if (SECRET_KEYS.includes(key) && value.length > 4) {
    return `${'*'.repeat(value.length - 4)}${value.slice(-4)}`
  }
  return value
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((valid) => valid === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...CONFIG_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  config[key] = value
  await saveConfig(config, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}
