/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI. `browse` is the default command.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getValidConfigKeys } from './config'

export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  quiet: boolean
  verbose: boolean
  cacheFile: string | undefined
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Browse National Park Service sites by state and find places near them.

Directory pages and search results are cached in a JSON file and reused on
every later run; delete the file to start fresh.

Examples:
  $ nps-sites
  $ nps-sites browse --cache-file ~/nps_cache.json
  $ nps-sites config set mapquestKey <key>`

function createProgram(): Command {
  const program = new Command()
    .name('nps-sites')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-file <path>', 'Cache file (or set NPS_SITES_CACHE_FILE)')
    .option('--config-file <path>', 'Config file path (or set NPS_SITES_CONFIG)')

  // ============ BROWSE (interactive, default) ============
  program
    .command('browse', { isDefault: true })
    .description('Interactively list sites by state and look up nearby places')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => k.length))
  const settingsHelp = configKeys
    .map((key) => `  ${key.padEnd(maxLen)}  ${getConfigDescription(key)}`)
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  nps-sites config                              List current settings
  nps-sites config set mapquestKey <key>        Store the MapQuest key
  nps-sites config unset cacheFile              Use ./nps_cache.json again`
    )

  return program
}

function buildCLIArgs(commandName: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    cacheFile: typeof opts.cacheFile === 'string' ? opts.cacheFile : undefined,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that capture the parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command, onParsed: (args: CLIArgs) => void): void {
  const browseCmd = program.commands.find((c) => c.name() === 'browse')
  if (browseCmd) {
    browseCmd.action(() => {
      onParsed(buildCLIArgs('browse', browseCmd.optsWithGlobals()))
    })
  }

  const configCmd = program.commands.find((c) => c.name() === 'config')
  if (configCmd) {
    configCmd.action((action?: string, key?: string, value?: string) => {
      onParsed({
        ...buildCLIArgs('config', configCmd.optsWithGlobals()),
        configAction: parseConfigAction(action),
        configKey: key,
        configValue: value
      })
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[]): CLIArgs {
  const program = createProgram()
  program.exitOverride()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help/version
    if (!result) {
      return buildCLIArgs('help', {})
    }
  }

  return result ?? buildCLIArgs('help', {})
}
