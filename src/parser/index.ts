/**
 * Parser Module
 *
 * Parse chat transcript exports into structured messages and metadata.
 */

import type { Message, ParsedTranscript, ParserOptions, Result } from '../types'
import { type AssemblyState, createAssemblyState, finishAssembly, foldLine } from './assembler'
import { summarizeMessages } from './summary'

export { classifyLine, HEADER_FAMILIES, type HeaderFamilyName } from './families'
export { decodeHeader, splitSender } from './header'
export { summarizeMessages } from './summary'
export { formatExportTimestamp, formatTimestamp, sampleDateOrder } from './timestamp'

const BYTE_ORDER_MARK = /^\uFEFF/

/**
 * Normalize line endings (exports mix CRLF, CR and LF) and drop a BOM.
 */
export function normalizeLineEndings(raw: string): string {
  return raw.replace(BYTE_ORDER_MARK, '').replace(/\r\n/g, '\n').replace(/\r/g, '\n')
}

function reachedLimit(count: number, options?: ParserOptions): boolean {
  return options?.maxMessages !== undefined && count >= options.maxMessages
}

interface Assembly {
  readonly messages: Message[]
  readonly state: AssemblyState
}

function assemble(raw: string, options?: ParserOptions): Assembly {
  const state = createAssemblyState(options)
  const messages: Message[] = []

  if (reachedLimit(0, options)) {
    return { messages, state }
  }

  for (const line of normalizeLineEndings(raw).split('\n')) {
    const finished = foldLine(state, line)
    if (finished) {
      messages.push(finished)
      if (reachedLimit(messages.length, options)) {
        return { messages, state }
      }
    }
  }

  const last = finishAssembly(state)
  if (last) {
    messages.push(last)
  }

  return { messages, state }
}

/**
 * Parse a transcript into messages, in input order. Never fails: lines
 * before the first header are dropped and unrecognized input yields [].
 */
export function parseMessages(raw: string, options?: ParserOptions): Message[] {
  return assemble(raw, options).messages
}

/**
 * Parse a transcript and summarize it.
 *
 * Fails with `unsupported_format` when the input has content but no line
 * matches a known header layout. Blank input is an empty transcript.
 */
export function parseTranscript(raw: string, options?: ParserOptions): Result<ParsedTranscript> {
  const { messages, state } = assemble(raw, options)

  if (messages.length === 0 && raw.trim() !== '' && !reachedLimit(0, options)) {
    return {
      ok: false,
      error: {
        type: 'unsupported_format',
        message:
          'Unsupported chat format: no line starts with a recognized timestamp. ' +
          'Export the chat as plain text without media and try again.'
      }
    }
  }

  return {
    ok: true,
    value: {
      messages,
      ...summarizeMessages(messages),
      dateOrder: state.dateOrder,
      diagnostics: state.diagnostics
    }
  }
}

/**
 * Parse a transcript from a line stream (e.g. node:readline over a large file).
 */
export async function* parseTranscriptStream(
  lines: AsyncIterable<string>,
  options?: ParserOptions
): AsyncIterable<Message> {
  const state = createAssemblyState(options)
  let count = 0

  if (reachedLimit(count, options)) return

  let first = true
  for await (const rawLine of lines) {
    const line = first ? rawLine.replace(BYTE_ORDER_MARK, '') : rawLine
    first = false

    const finished = foldLine(state, line.replace(/\r$/, ''))
    if (finished) {
      yield finished
      count++
      if (reachedLimit(count, options)) return
    }
  }

  const last = finishAssembly(state)
  if (last) {
    yield last
  }
}
