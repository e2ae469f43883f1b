/**
 * Interactive Browse Session
 *
 * State prompt -> site list -> nearby places, driven by the cached resolvers.
 */

import { formatNearbyPlace, readNearbyPlaces } from '../nearby/index'
import {
  findStateUrl,
  type ResolverContext,
  resolveNearbyPlaces,
  resolveSitesForState,
  resolveStateIndex
} from '../resolvers/index'
import { formatSiteInfo } from '../site/index'
import type { SiteRecord } from '../types'
import type { SessionIO } from './io'
import type { Logger } from './logger'

export const STATE_PROMPT = 'Enter a state name (e.g. Michigan, michigan) or "exit": '
export const SITE_PROMPT = 'Choose the number for detail search or "exit" or "back": '
export const INVALID_STATE_MESSAGE = '[Error] Enter proper state name'
export const INVALID_INPUT_MESSAGE = '[Error] Invalid input'

const DIVIDER = '-'.repeat(34)

type SiteListOutcome = 'back' | 'exit'

function printHeading(io: SessionIO, title: string): void {
  io.print(DIVIDER)
  io.print(title)
  io.print(DIVIDER)
}

function titleCase(text: string): string {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`)
    .join(' ')
}

/**
 * Parse a 1-based site selection. Returns null unless it names a listed site.
 */
export function parseSelection(input: string, count: number): number | null {
  if (!/^\d+$/.test(input)) return null
  const selection = Number.parseInt(input, 10)
  if (selection < 1 || selection > count) return null
  return selection - 1
}

/**
 * Site prompt loop for one state's list. Returns how the user left it;
 * a failed lookup ends the session.
 */
async function browseSites(
  ctx: ResolverContext,
  io: SessionIO,
  logger: Logger,
  sites: readonly SiteRecord[]
): Promise<SiteListOutcome> {
  while (true) {
    const line = await io.prompt(SITE_PROMPT)
    if (line === null) return 'exit'

    const command = line.trim().toLowerCase()
    if (command === 'exit') return 'exit'
    if (command === 'back') return 'back'

    const index = parseSelection(command, sites.length)
    const site = index === null ? undefined : sites[index]
    if (!site) {
      io.print(INVALID_INPUT_MESSAGE)
      continue
    }

    const nearby = await resolveNearbyPlaces(ctx, site)
    if (!nearby.ok) {
      logger.error(nearby.error.message)
      return 'exit'
    }

    printHeading(io, `Places near ${site.name}`)
    for (const place of readNearbyPlaces(nearby.value)) {
      io.print(formatNearbyPlace(place))
    }
  }
}

/**
 * Run the interactive session until the user exits, input ends, or a
 * live fetch fails.
 */
export async function runBrowseSession(
  ctx: ResolverContext,
  io: SessionIO,
  logger: Logger
): Promise<void> {
  const stateIndex = await resolveStateIndex(ctx)
  if (!stateIndex.ok) {
    logger.error(stateIndex.error.message)
    return
  }

  while (true) {
    const line = await io.prompt(STATE_PROMPT)
    if (line === null) return

    const stateName = line.trim().toLowerCase()
    if (stateName === 'exit') return

    const stateUrl = findStateUrl(stateIndex.value, stateName)
    if (!stateUrl) {
      io.print(INVALID_STATE_MESSAGE)
      continue
    }

    const sites = await resolveSitesForState(ctx, stateUrl)
    if (!sites.ok) {
      logger.error(sites.error.message)
      return
    }

    printHeading(io, `List of national sites in ${titleCase(stateName)}`)
    sites.value.forEach((site, i) => {
      io.print(`[${i + 1}] ${formatSiteInfo(site)}`)
    })

    const outcome = await browseSites(ctx, io, logger, sites.value)
    if (outcome === 'exit') return
  }
}
