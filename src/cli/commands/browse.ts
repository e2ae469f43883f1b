/**
 * Browse Command
 *
 * Interactive state -> site -> nearby places lookup.
 */

import type { CLIArgs } from '../args'
import { loadConfig } from '../config'
import { initBrowseContext } from '../context'
import { createTerminalIO } from '../io'
import type { Logger } from '../logger'
import { runBrowseSession } from '../session'

export async function cmdBrowse(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadConfig(args.configFile)
  const ctx = initBrowseContext(config, logger, { cacheFile: args.cacheFile })

  const io = createTerminalIO()
  try {
    await runBrowseSession(ctx, io, logger)
  } finally {
    io.close()
  }
}
