#!/usr/bin/env node
/**
 * nps-sites CLI
 *
 * Interactive National Park Service site browser with a persistent response cache.
 */

import { parseCliArgs } from './cli/args'
import { cmdBrowse } from './cli/commands/browse'
import { cmdConfig } from './cli/commands/config'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'browse':
        await cmdBrowse(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'nps-sites --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
