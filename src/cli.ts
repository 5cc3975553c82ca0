#!/usr/bin/env node
/**
 * TranscriptLens CLI
 *
 * Local orchestrator for the core library.
 * Handles file I/O, settings and progress reporting.
 *
 * @license AGPL-3.0
 */

import { type CLIArgs, parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdExport } from './cli/commands/export'
import { cmdParse } from './cli/commands/parse'
import { createLogger } from './cli/logger'

async function run(args: CLIArgs): Promise<void> {
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'parse':
        await cmdParse(args, logger)
        break

      case 'export':
        await cmdExport(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'transcript-lens --help' for usage.`)
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

function main(): Promise<void> {
  let args: CLIArgs
  try {
    args = parseCliArgs()
  } catch (error) {
    createLogger(false, false).error(error instanceof Error ? error.message : String(error))
    process.exit(1)
  }
  return run(args)
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
