/**
 * Transcript Summary
 *
 * Participants, counts and date range derived from parsed messages.
 */

import type { DateRange, Message, TranscriptSummary } from '../types'

/**
 * Summarize messages. System notifications count toward the date range and
 * systemCount, never toward participants or messageCount.
 */
export function summarizeMessages(messages: readonly Message[]): TranscriptSummary {
  const participants: string[] = []
  const seen = new Set<string>()
  let messageCount = 0
  let systemCount = 0
  let start: Date | null = null
  let end: Date | null = null

  for (const message of messages) {
    if (message.isSystem) {
      systemCount++
    } else {
      messageCount++
      if (message.sender !== null && !seen.has(message.sender)) {
        seen.add(message.sender)
        participants.push(message.sender)
      }
    }

    if (start === null || message.timestamp < start) start = message.timestamp
    if (end === null || message.timestamp > end) end = message.timestamp
  }

  const dateRange: DateRange = start && end ? { start, end } : { start: null, end: null }

  return { participants, messageCount, systemCount, dateRange }
}
