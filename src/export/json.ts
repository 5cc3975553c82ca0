/**
 * JSON Export
 *
 * Export a parsed transcript and its metadata to JSON.
 */

import { formatTimestamp } from '../parser/timestamp'
import type { DateOrder, ParsedTranscript } from '../types'
import { exportToText } from './text'

interface MessageJson {
  line: number
  timestamp: string
  sender: string | null
  text: string
  isSystem: boolean
}

export interface TranscriptJson {
  participants: string[]
  messageCount: number
  systemCount: number
  dateRange: {
    start: string | null
    end: string | null
  }
  dateOrder: DateOrder | null
  messages: MessageJson[]
  /** Flattened text block without system notifications */
  text: string
}

/**
 * Build the JSON-ready document for a transcript.
 */
export function toTranscriptJson(transcript: ParsedTranscript): TranscriptJson {
  const { dateRange } = transcript

  return {
    participants: [...transcript.participants],
    messageCount: transcript.messageCount,
    systemCount: transcript.systemCount,
    dateRange: {
      start: dateRange.start ? formatTimestamp(dateRange.start) : null,
      end: dateRange.end ? formatTimestamp(dateRange.end) : null
    },
    dateOrder: transcript.dateOrder,
    messages: transcript.messages.map((message) => ({
      line: message.line,
      timestamp: formatTimestamp(message.timestamp),
      sender: message.sender,
      text: message.text,
      isSystem: message.isSystem
    })),
    text: exportToText(transcript)
  }
}

/**
 * Export a transcript to a JSON string.
 */
export function exportToJSON(transcript: ParsedTranscript): string {
  return JSON.stringify(toTranscriptJson(transcript), null, 2)
}
