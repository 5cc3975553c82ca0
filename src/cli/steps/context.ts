/**
 * Pipeline Context
 *
 * Shared context for the pipeline steps: input content, resolved settings
 * and logger.
 */

import type { DateOrderOption } from '../../types'
import type { CLIArgs } from '../args'
import { type Config, DEFAULT_MAX_FILE_SIZE_MB, loadConfig } from '../config'
import { readInputFile } from '../io'
import type { Logger } from '../logger'

/**
 * Settings after applying CLI flags over the config file over defaults.
 */
export interface Settings {
  readonly dateOrder: DateOrderOption
  readonly includeSystem: boolean
  readonly maxFileSizeMb: number
  readonly maxMessages: number | undefined
}

/**
 * Pipeline context passed to all steps.
 */
export interface PipelineContext {
  /** Original input path */
  readonly input: string
  /** Extracted content (from zip or txt) */
  readonly content: string
  readonly settings: Settings
  /** Logger for output */
  readonly logger: Logger
}

/**
 * Resolve settings: CLI flag > config file > default.
 */
export function resolveSettings(args: CLIArgs, config: Config | null): Settings {
  return {
    dateOrder: args.dateOrder ?? config?.dateOrder ?? 'auto',
    includeSystem: args.includeSystem ?? config?.includeSystem ?? false,
    maxFileSizeMb: config?.maxFileSizeMb ?? DEFAULT_MAX_FILE_SIZE_MB,
    maxMessages: args.maxMessages
  }
}

/**
 * Initialize pipeline context for an input file.
 */
export async function initContext(args: CLIArgs, logger: Logger): Promise<PipelineContext> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  const config = await loadConfig(args.configFile)
  const settings = resolveSettings(args, config)
  logger.verbose(
    `Settings: dateOrder=${settings.dateOrder}, includeSystem=${settings.includeSystem}, maxFileSizeMb=${settings.maxFileSizeMb}`
  )

  const content = await readInputFile(args.input, settings.maxFileSizeMb)
  logger.verbose(`Read ${content.length.toLocaleString()} characters from ${args.input}`)

  return { input: args.input, content, settings, logger }
}
