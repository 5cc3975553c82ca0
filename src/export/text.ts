/**
 * Text Export
 *
 * Flatten a transcript back into one chronological text block, the form the
 * downstream analysis service reads.
 */

import { formatExportTimestamp } from '../parser/timestamp'
import type { Message, ParsedTranscript } from '../types'

export interface TextExportOptions {
  /** Include system notifications (default: false) */
  readonly includeSystem?: boolean | undefined
}

function formatMessage(message: Message): string {
  const timestamp = formatExportTimestamp(message.timestamp)
  if (message.sender === null) {
    return `${timestamp} - ${message.text}`
  }
  return `${timestamp} - ${message.sender}: ${message.text}`
}

/**
 * Render messages as `MM/DD/YY, hh:mm AM - Sender: text`, one per entry.
 * Multi-line messages keep their inner line breaks.
 */
export function exportToText(
  transcript: Pick<ParsedTranscript, 'messages'>,
  options: TextExportOptions = {}
): string {
  return transcript.messages
    .filter((message) => options.includeSystem === true || !message.isSystem)
    .map(formatMessage)
    .join('\n')
}
