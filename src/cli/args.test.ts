import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'

describe('parseArgs', () => {
  it('defaults to the browse command', () => {
    const args = parseArgs([])
    expect(args.command).toBe('browse')
    expect(args.quiet).toBe(false)
    expect(args.verbose).toBe(false)
    expect(args.cacheFile).toBeUndefined()
  })

  it('parses browse with global options', () => {
    const args = parseArgs(['--cache-file', '/tmp/nps.json', '-v', 'browse'])
    expect(args.command).toBe('browse')
    expect(args.cacheFile).toBe('/tmp/nps.json')
    expect(args.verbose).toBe(true)
  })

  it('accepts global options after the subcommand', () => {
    const args = parseArgs(['browse', '--quiet', '--config-file', '/tmp/config.json'])
    expect(args.quiet).toBe(true)
    expect(args.configFile).toBe('/tmp/config.json')
  })

  it('parses config set', () => {
    const args = parseArgs(['config', 'set', 'mapquestKey', 'test-key'])
    expect(args.command).toBe('config')
    expect(args.configAction).toBe('set')
    expect(args.configKey).toBe('mapquestKey')
    expect(args.configValue).toBe('test-key')
  })

  it('defaults config action to list', () => {
    const args = parseArgs(['config'])
    expect(args.configAction).toBe('list')
    expect(args.configKey).toBeUndefined()
  })

  it('treats an unknown config action as list', () => {
    expect(parseArgs(['config', 'show']).configAction).toBe('list')
  })
})
