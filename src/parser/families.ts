/**
 * Header Families
 *
 * The timestamp layouts a chat export uses to start a message, tried in
 * priority order. Each family keeps its pattern and field reader together.
 *
 * bracketed:  [1/15/24, 10:30:45 AM] John: Hello
 *             [20/02/2025, 14:25:00] John: Hello
 * meridiem:   1/15/24, 10:30 AM - John: Hello
 * year_first: 2025/02/20, 14:25 - John: Hello
 * day_first:  20/02/25, 14:25 - John: Hello
 */

import type { CalendarFields, ClockFields, Meridiem } from './timestamp'

export type HeaderFamilyName = 'bracketed' | 'meridiem' | 'year_first' | 'day_first'

/** Fields of a line that has the shape of a header; values are not validated yet */
export interface HeaderFields {
  readonly family: HeaderFamilyName
  readonly calendar: CalendarFields
  readonly clock: ClockFields
  /** Everything after the timestamp and its separator */
  readonly remainder: string
}

export interface HeaderFamily {
  readonly name: HeaderFamilyName
  readonly pattern: RegExp
  readonly read: (match: RegExpExecArray) => Omit<HeaderFields, 'family'>
}

// Groups: 1-3 date, 4-6 clock, 7 meridiem letter, 8 remainder
// \u202F is the narrow no-break space newer exports put before AM/PM
const BRACKETED_PATTERN =
  /^\[(\d{1,2})[/.](\d{1,2})[/.](\d{2}|\d{4}),\s*(\d{1,2}):(\d{2})(?::(\d{2}))?(?:[\s\u202F]*([AaPp])\.?\s?[Mm]\.?)?\]\s*(.*)$/

const MERIDIEM_PATTERN =
  /^(\d{1,2})[/.](\d{1,2})[/.](\d{2}|\d{4}),\s*(\d{1,2}):(\d{2})(?::(\d{2}))?[\s\u202F]*([AaPp])\.?\s?[Mm]\.?\s*[-–]\s*(.*)$/

const YEAR_FIRST_PATTERN =
  /^(\d{4})[/-](\d{1,2})[/-](\d{1,2}),\s*(\d{1,2}):(\d{2})(?::(\d{2}))?(?:[\s\u202F]*([AaPp])\.?\s?[Mm]\.?)?\s*[-–]\s*(.*)$/

// Groups: 1-3 date, 4-6 clock, 7 remainder
const DAY_FIRST_PATTERN =
  /^(\d{1,2})[/.](\d{1,2})[/.](\d{2}|\d{4}),\s*(\d{1,2}):(\d{2})(?::(\d{2}))?\s*[-–]\s*(.*)$/

function toInt(value: string | undefined): number {
  return Number.parseInt(value ?? '0', 10)
}

function toMeridiem(letter: string | undefined): Meridiem | null {
  if (!letter) return null
  return letter.toUpperCase() === 'P' ? 'PM' : 'AM'
}

function readClock(match: RegExpExecArray, meridiemGroup: number | null): ClockFields {
  return {
    hour: toInt(match[4]),
    minute: toInt(match[5]),
    second: toInt(match[6]),
    meridiem: meridiemGroup === null ? null : toMeridiem(match[meridiemGroup])
  }
}

function readYearLast(match: RegExpExecArray): CalendarFields {
  return { kind: 'year_last', first: toInt(match[1]), second: toInt(match[2]), year: toInt(match[3]) }
}

export const HEADER_FAMILIES: readonly HeaderFamily[] = [
  {
    name: 'bracketed',
    pattern: BRACKETED_PATTERN,
    read: (match) => ({
      calendar: readYearLast(match),
      clock: readClock(match, 7),
      remainder: match[8] ?? ''
    })
  },
  {
    name: 'meridiem',
    pattern: MERIDIEM_PATTERN,
    read: (match) => ({
      calendar: readYearLast(match),
      clock: readClock(match, 7),
      remainder: match[8] ?? ''
    })
  },
  {
    name: 'year_first',
    pattern: YEAR_FIRST_PATTERN,
    read: (match) => ({
      calendar: {
        kind: 'year_first',
        year: toInt(match[1]),
        month: toInt(match[2]),
        day: toInt(match[3])
      },
      clock: readClock(match, 7),
      remainder: match[8] ?? ''
    })
  },
  {
    name: 'day_first',
    pattern: DAY_FIRST_PATTERN,
    read: (match) => ({
      calendar: readYearLast(match),
      clock: readClock(match, null),
      remainder: match[7] ?? ''
    })
  }
]

/**
 * Classify a line: header fields when it matches a family, null for a
 * continuation line. The first matching family wins.
 */
export function classifyLine(line: string): HeaderFields | null {
  for (const family of HEADER_FAMILIES) {
    const match = family.pattern.exec(line)
    if (match) {
      return { family: family.name, ...family.read(match) }
    }
  }
  return null
}
