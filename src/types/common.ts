/**
 * Common Types
 *
 * Shared types used across modules: Result and its error shape.
 */

export type ParseErrorType = 'unsupported_format'

export interface ParseError {
  readonly type: ParseErrorType
  readonly message: string
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ParseError }
