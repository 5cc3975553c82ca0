/**
 * Parse Step
 *
 * Parse the context's content into a transcript.
 */

import { parseTranscript } from '../../parser/index'
import type { ParsedTranscript } from '../../types'
import type { PipelineContext } from './context'

/**
 * Run the parse step.
 *
 * @throws Error with the user-facing message when the format is not recognized
 */
export function stepParse(ctx: PipelineContext): ParsedTranscript {
  const { content, logger, settings } = ctx

  logger.verbose('Parsing messages...')

  const result = parseTranscript(content, {
    dateOrder: settings.dateOrder,
    maxMessages: settings.maxMessages
  })

  if (!result.ok) {
    throw new Error(result.error.message)
  }

  const transcript = result.value
  logger.verbose(`Date order: ${transcript.dateOrder ?? 'n/a'}`)
  for (const diagnostic of transcript.diagnostics) {
    logger.verbose(`Line ${diagnostic.line} (${diagnostic.kind}): ${diagnostic.text}`)
  }

  if (settings.maxMessages !== undefined) {
    logger.verbose(`Limited to first ${settings.maxMessages} messages`)
  }

  return transcript
}
