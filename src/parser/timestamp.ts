/**
 * Timestamp Decoding
 *
 * Turns the date and clock fields of a header into a wall-clock Date and
 * settles which of day/month is written first.
 */

import type { DateOrder } from '../types'

export type Meridiem = 'AM' | 'PM'

export interface ClockFields {
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly meridiem: Meridiem | null
}

/**
 * Date fields exactly as written. `year_last` dates keep their two leading
 * numbers unresolved until a DateOrder is applied.
 */
export type CalendarFields =
  | { readonly kind: 'year_first'; readonly year: number; readonly month: number; readonly day: number }
  | { readonly kind: 'year_last'; readonly first: number; readonly second: number; readonly year: number }

/**
 * Pick the day/month order for a `year_last` date.
 *
 * A field above 12 can only be a day, which settles it. Otherwise a meridiem
 * marker suggests US month-first exports and its absence day-first ones.
 * Dates like 03/04/24 without other evidence stay ambiguous and may be misread.
 */
export function sampleDateOrder(first: number, second: number, hasMeridiem: boolean): DateOrder {
  if (first > 12 && second <= 12) return 'dmy'
  if (second > 12 && first <= 12) return 'mdy'
  return hasMeridiem ? 'mdy' : 'dmy'
}

function expandYear(year: number): number {
  return year < 100 ? 2000 + year : year
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month - 1] ?? 0
}

function toHour24(clock: ClockFields): number | null {
  if (clock.meridiem === null) {
    return clock.hour <= 23 ? clock.hour : null
  }
  if (clock.hour > 12) return null
  const base = clock.hour % 12
  return clock.meridiem === 'PM' ? base + 12 : base
}

/**
 * Build a wall-clock Date, or null when any field is out of range.
 *
 * The fields are stored as UTC so no host zone (or its DST gaps) shifts them;
 * read them back with the getUTC* accessors.
 */
export function buildTimestamp(
  calendar: CalendarFields,
  clock: ClockFields,
  order: DateOrder
): Date | null {
  let year: number
  let month: number
  let day: number

  if (calendar.kind === 'year_first') {
    year = calendar.year
    month = calendar.month
    day = calendar.day
  } else {
    year = expandYear(calendar.year)
    month = order === 'mdy' ? calendar.first : calendar.second
    day = order === 'mdy' ? calendar.second : calendar.first
  }

  if (month < 1 || month > 12) return null
  if (day < 1 || day > daysInMonth(year, month)) return null

  const hour = toHour24(clock)
  if (hour === null || clock.minute > 59 || clock.second > 59) return null

  const date = new Date(Date.UTC(year, month - 1, day, hour, clock.minute, clock.second))
  // Date.UTC maps years 0-99 to 1900-1999
  date.setUTCFullYear(year, month - 1, day)
  return date
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0')
}

/**
 * Format as ISO-like wall-clock text: 2025-02-20T14:25:00
 */
export function formatTimestamp(date: Date): string {
  const datePart = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
  const timePart = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  return `${datePart}T${timePart}`
}

/**
 * Format the way a US export writes headers: 02/20/25, 02:25 PM
 */
export function formatExportTimestamp(date: Date): string {
  const hours = date.getUTCHours()
  const hour12 = hours % 12 === 0 ? 12 : hours % 12
  const meridiem = hours < 12 ? 'AM' : 'PM'
  const year = pad(date.getUTCFullYear() % 100)
  return `${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}/${year}, ${pad(hour12)}:${pad(date.getUTCMinutes())} ${meridiem}`
}
