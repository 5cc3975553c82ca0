import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { parseArgs } from '../args'
import { loadConfig } from '../config'
import { createLogger } from '../logger'
import { cmdConfig, describeSettings } from './config'

describe('describeSettings', () => {
  it('shows defaults when nothing is saved', () => {
    expect(describeSettings(null)).toEqual([
      '  dateOrder: auto (default)',
      '  includeSystem: false (default)',
      '  maxFileSizeMb: 16 (default)'
    ])
  })

  it('shows saved values', () => {
    expect(describeSettings({ dateOrder: 'dmy', maxFileSizeMb: 4 })).toEqual([
      '  dateOrder: dmy',
      '  includeSystem: false (default)',
      '  maxFileSizeMb: 4'
    ])
  })
})

describe('cmdConfig', () => {
  let tempDir: string
  let configFile: string
  let output: string[]

  const run = (argv: string[]) => {
    const logger = createLogger(false, false, {
      out: (line) => output.push(line),
      err: (line) => output.push(line)
    })
    return cmdConfig(parseArgs([...argv, '--config-file', configFile], false), logger)
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'transcript-lens-config-cmd-test-'))
    configFile = join(tempDir, 'config.json')
    output = []
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('sets and unsets a value', async () => {
    await run(['config', 'set', 'dateOrder', 'dmy'])
    expect((await loadConfig(configFile))?.dateOrder).toBe('dmy')

    await run(['config', 'unset', 'dateOrder'])
    expect((await loadConfig(configFile))?.dateOrder).toBeUndefined()

    expect(output).toEqual(['Set dateOrder=dmy', 'Unset dateOrder (now auto)'])
  })

  it('lists settings', async () => {
    await run(['config', 'set', 'includeSystem', 'true'])
    output = []

    await run(['config'])

    expect(output.slice(1)).toEqual([
      '  dateOrder: auto (default)',
      '  includeSystem: true',
      '  maxFileSizeMb: 16 (default)'
    ])
  })

  it('rejects unknown keys', async () => {
    await expect(run(['config', 'set', 'homeCountry', 'NZ'])).rejects.toThrow(
      'Invalid key: homeCountry. Valid keys: dateOrder, includeSystem, maxFileSizeMb'
    )
  })

  it('requires a value for set', async () => {
    await expect(run(['config', 'set', 'dateOrder'])).rejects.toThrow(
      'Missing value. Usage: transcript-lens config set <key> <value>'
    )
  })
})
