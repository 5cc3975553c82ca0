/**
 * Parse Command
 *
 * Parse and validate a chat export.
 */

import { writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { exportToJSON } from '../../export/index'
import { VERSION } from '../../index'
import { formatTimestamp } from '../../parser/index'
import type { DateRange } from '../../types'
import type { CLIArgs } from '../args'
import { ensureDir } from '../io'
import type { Logger } from '../logger'
import { initContext, stepParse } from '../steps/index'

/**
 * Format participant list, showing top 5 + "and N others" if more.
 */
export function formatParticipants(participants: readonly string[]): string {
  if (participants.length <= 5) {
    return participants.join(', ')
  }
  const top5 = participants.slice(0, 5).join(', ')
  const remaining = participants.length - 5
  return `${top5}, and ${remaining} others`
}

/**
 * Format a date range as YYYY-MM-DD to YYYY-MM-DD (wall-clock calendar dates).
 */
export function formatDateRange(range: DateRange): string {
  if (range.start === null) {
    return 'none'
  }
  const day = (date: Date): string => formatTimestamp(date).slice(0, 10)
  return `${day(range.start)} to ${day(range.end)}`
}

export async function cmdParse(args: CLIArgs, logger: Logger): Promise<void> {
  logger.log(`\nTranscriptLens v${VERSION}`)

  const ctx = await initContext(args, logger)
  const transcript = stepParse(ctx)

  if (transcript.messages.length === 0) {
    logger.success('Empty chat export')
  } else {
    logger.success('Valid chat export')
  }
  logger.success(`${transcript.messageCount.toLocaleString()} messages`)
  if (transcript.systemCount > 0) {
    logger.success(`${transcript.systemCount.toLocaleString()} system notifications`)
  }
  logger.success(`Date range: ${formatDateRange(transcript.dateRange)}`)

  const count = transcript.participants.length
  logger.success(
    `${count} participant${count !== 1 ? 's' : ''}: ${formatParticipants(transcript.participants)}`
  )

  const malformed = transcript.diagnostics.filter((d) => d.kind === 'malformed_header').length
  if (malformed > 0) {
    logger.warn(`${malformed} line${malformed !== 1 ? 's' : ''} looked like headers but had invalid dates (kept as message text)`)
  }

  if (args.jsonOutput) {
    const json = exportToJSON(transcript)
    if (args.jsonOutput === 'stdout') {
      console.log(json)
    } else {
      await ensureDir(dirname(args.jsonOutput))
      await writeFile(args.jsonOutput, json)
      logger.success(`Saved to ${args.jsonOutput}`)
    }
  }
}
