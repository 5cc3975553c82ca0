/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import type { DateOrderOption } from '../types'
import { getConfigDescription, getConfigType, getValidConfigKeys, parseDateOrderOption } from './config'

export interface CLIArgs {
  command: string
  input: string
  quiet: boolean
  verbose: boolean
  configFile: string | undefined
  /** Undefined when not given, so config file settings can apply */
  dateOrder: DateOrderOption | undefined
  maxMessages: number | undefined
  jsonOutput: string | undefined
  output: string | undefined
  includeSystem: boolean | undefined
  /** For config command: action (list, set, unset) */
  configAction: 'list' | 'set' | 'unset'
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Parse exported chat transcripts into structured messages.

Supported formats (auto-detected):
  • [1/15/24, 10:30:45 AM] Sender: text
  • 1/15/24, 10:30 AM - Sender: text
  • 2025/02/20, 14:25 - Sender: text
  • 20/02/25, 14:25 - Sender: text

Examples:
  $ transcript-lens parse "WhatsApp Chat.zip"
  $ transcript-lens parse chat.txt --json parsed.json
  $ transcript-lens export chat.txt -o transcript.txt`

function createProgram(): Command {
  const program = new Command()
    .name('transcript-lens')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set TRANSCRIPT_LENS_CONFIG)')

  // ============ PARSE ============
  program
    .command('parse')
    .description('Parse and validate a chat export: check format, count messages, list participants')
    .argument('<input>', 'Chat export (.txt file or .zip export)')
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')
    .option('--date-order <order>', 'Day/month order for slash dates: auto, mdy, dmy')
    .option('-m, --max-messages <num>', 'Max messages to parse')

  // ============ EXPORT ============
  program
    .command('export')
    .description('Print the flattened chronological transcript used for analysis')
    .argument('<input>', 'Chat export (.txt file or .zip export)')
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .option('--include-system', 'Include system notifications')
    .option('--date-order <order>', 'Day/month order for slash dates: auto, mdy, dmy')
    .option('-m, --max-messages <num>', 'Max messages to export')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
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
  transcript-lens config                          List current settings
  transcript-lens config set dateOrder dmy        Read 01/02/25 as 1 February
  transcript-lens config unset maxFileSizeMb      Back to the default limit`
    )

  return program
}

function parseDateOrder(value: unknown): DateOrderOption | undefined {
  if (value === undefined) return undefined
  const order = parseDateOrderOption(value)
  if (!order) {
    throw new Error(`Invalid --date-order: ${String(value)}. Use auto, mdy or dmy`)
  }
  return order
}

function parseMaxMessages(value: unknown): number | undefined {
  if (value === undefined) return undefined
  const text = String(value)
  const count = Number(text)
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(count) || count < 1) {
    throw new Error(`Invalid --max-messages: ${text}. Use a positive whole number`)
  }
  return count
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    input,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    dateOrder: parseDateOrder(opts.dateOrder),
    maxMessages: parseMaxMessages(opts.maxMessages),
    jsonOutput:
      opts.json === true ? 'stdout' : typeof opts.json === 'string' ? opts.json : undefined,
    output: typeof opts.output === 'string' ? opts.output : undefined,
    includeSystem: opts.includeSystem === true ? true : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): 'list' | 'set' | 'unset' {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that hand the parsed args to `capture`.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    if (cmd.name() === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        capture({
          ...buildCLIArgs('config', '', cmd.optsWithGlobals()),
          configAction: parseConfigAction(action),
          configKey: key,
          configValue: value
        })
      })
    } else {
      cmd.action((input: string) => {
        capture(buildCLIArgs(cmd.name(), input ?? '', cmd.optsWithGlobals()))
      })
    }
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

  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version; anything else is a real error
    if (!(error instanceof Error) || !('exitCode' in error)) {
      throw error
    }
  }

  return result ?? buildCLIArgs('help', '', {})
}
