/**
 * Config Command
 *
 * Manage persistent CLI settings stored in ~/.config/nps-sites/config.json.
 * Supports list, set, and unset operations.
 */

import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  setConfigValue,
  unsetConfigValue
} from '../config'
import { ConfigurationError } from '../context'
import type { Logger } from '../logger'

/**
 * Execute the config command.
 */
export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const configFile = args.configFile

  switch (args.configAction) {
    case 'list':
      await listConfig(configFile, logger)
      break
    case 'set':
      await setConfig(args.configKey, args.configValue, configFile, logger)
      break
    case 'unset':
      await unsetConfig(args.configKey, configFile, logger)
      break
  }
}

async function listConfig(configFile: string | undefined, logger: Logger): Promise<void> {
  const config = await loadConfig(configFile)
  const path = getConfigPath(configFile)

  logger.log(`\nConfig file: ${path}\n`)

  let listed = 0
  for (const key of getValidConfigKeys()) {
    const value = config?.[key]
    if (value === undefined) continue
    logger.log(`  ${key}: ${formatConfigValue(key, value)}`)
    listed++
  }
  if (listed === 0) {
    logger.log('No settings configured. Run `nps-sites config --help` for available settings.')
  }
}

function validateConfigKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new ConfigurationError(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new ConfigurationError(
      `Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`
    )
  }
  return key
}

async function setConfig(
  key: string | undefined,
  value: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'nps-sites config set <key> <value>')
  if (value === undefined) {
    throw new ConfigurationError('Missing value. Usage: nps-sites config set <key> <value>')
  }
  await setConfigValue(validKey, value, configFile)
  logger.success(`Set ${validKey}=${formatConfigValue(validKey, value)}`)
}

async function unsetConfig(
  key: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'nps-sites config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.success(`Unset ${validKey}`)
}
