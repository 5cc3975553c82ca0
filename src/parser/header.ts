/**
 * Header Decoder
 *
 * Resolves a classified header into timestamp, sender and text, and tells
 * user messages apart from platform notifications.
 */

import type { DateOrder } from '../types'
import type { HeaderFields } from './families'
import { buildTimestamp, sampleDateOrder } from './timestamp'

export interface DecodedHeader {
  readonly timestamp: Date
  readonly sender: string | null
  readonly text: string
  readonly isSystem: boolean
  /** Day/month order this header was read with; null for year-first dates */
  readonly dateOrder: DateOrder | null
}

const LEFT_TO_RIGHT_MARK = /^\u200E/

// `Sender: text` - the first colon followed by whitespace or end of line
const SENDER_PATTERN = /^([^:]+?):(?:\s+(.*))?$/s

const ENCRYPTION_NOTICE = /^Messages and calls are end-to-end encrypted/i

// Notification sentences. iOS exports prefix these with U+200E after the group name.
const NOTIFICATION_PATTERNS: readonly RegExp[] = [
  ENCRYPTION_NOTICE,
  /^.+ added .+$/i,
  /^.+ removed .+$/i,
  /^.+ left$/i,
  /^.+ joined using this group['’]s invite link$/i,
  /^.+ changed (the subject|this group['’]s icon|the group description|their phone number)/i,
  /^.*created group/i,
  /^.*security code (with .+ )?changed/i,
  /^You['’]re now an admin$/i
]

// A would-be sender that is really a notification, split at a colon in a group name
const SENDER_NOTIFICATION_PATTERNS: readonly RegExp[] = [
  /created group/i,
  /changed the subject/i,
  /changed the group description/i,
  /changed this group['’]s icon/i
]

interface SenderSplit {
  readonly sender: string | null
  readonly text: string
  readonly isSystem: boolean
}

function systemSplit(text: string): SenderSplit {
  return { sender: null, text: text.replace(LEFT_TO_RIGHT_MARK, ''), isSystem: true }
}

/**
 * Split the text after a timestamp into sender and message.
 */
export function splitSender(remainder: string): SenderSplit {
  const trimmed = remainder.trim()
  const match = SENDER_PATTERN.exec(trimmed)
  const sender = match?.[1]?.trim()

  if (!match || !sender) {
    return systemSplit(trimmed)
  }
  if (SENDER_NOTIFICATION_PATTERNS.some((pattern) => pattern.test(sender))) {
    return systemSplit(trimmed)
  }

  const body = match[2] ?? ''
  const text = body.replace(LEFT_TO_RIGHT_MARK, '')
  if (ENCRYPTION_NOTICE.test(text)) {
    return systemSplit(text)
  }
  if (LEFT_TO_RIGHT_MARK.test(body) && NOTIFICATION_PATTERNS.some((pattern) => pattern.test(text))) {
    return systemSplit(text)
  }

  return { sender, text, isSystem: false }
}

/**
 * Decode a header. Returns null when the date or time values are impossible,
 * in which case the line reads as message text instead.
 *
 * @param lockedOrder Order already settled for this transcript, if any
 */
export function decodeHeader(
  fields: HeaderFields,
  lockedOrder: DateOrder | null
): DecodedHeader | null {
  const { calendar, clock } = fields

  let dateOrder: DateOrder | null = null
  if (calendar.kind === 'year_last') {
    dateOrder =
      lockedOrder ?? sampleDateOrder(calendar.first, calendar.second, clock.meridiem !== null)
  }

  const timestamp = buildTimestamp(calendar, clock, dateOrder ?? 'mdy')
  if (!timestamp) {
    return null
  }

  return { timestamp, dateOrder, ...splitSender(fields.remainder) }
}
