/**
 * Parser Types
 *
 * Types for transcript parsing and message representation.
 */

/** Reading order of a day/month/year date: month first (US) or day first */
export type DateOrder = 'mdy' | 'dmy'

export type DateOrderOption = DateOrder | 'auto'

export interface Message {
  /** 1-based line number of the header that started this message */
  readonly line: number
  /** Wall-clock time as written in the export, held in the UTC fields (no timezone) */
  readonly timestamp: Date
  /** Null for system notifications */
  readonly sender: string | null
  readonly text: string
  readonly isSystem: boolean
}

export type DiagnosticKind = 'malformed_header' | 'preamble'

export interface ParseDiagnostic {
  readonly line: number
  readonly kind: DiagnosticKind
  readonly text: string
}

export interface ParserOptions {
  /** Day/month order for slash dates; 'auto' samples the first header */
  readonly dateOrder?: DateOrderOption | undefined
  /** Stop after this many messages */
  readonly maxMessages?: number | undefined
}

export type DateRange =
  | { readonly start: Date; readonly end: Date }
  | { readonly start: null; readonly end: null }

export interface TranscriptSummary {
  /** Distinct senders of non-system messages, in order of first appearance */
  readonly participants: readonly string[]
  /** Non-system messages only */
  readonly messageCount: number
  readonly systemCount: number
  /** Earliest and latest timestamps, system notifications included */
  readonly dateRange: DateRange
}

export interface ParsedTranscript extends TranscriptSummary {
  readonly messages: readonly Message[]
  /** Order applied to day/month/year dates, null if the export had none */
  readonly dateOrder: DateOrder | null
  readonly diagnostics: readonly ParseDiagnostic[]
}
