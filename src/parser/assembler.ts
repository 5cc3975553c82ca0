/**
 * Message Assembler
 *
 * Folds classified lines into messages. One AssemblyState is owned by one
 * parse call; nothing is shared between calls.
 */

import type { DateOrder, Message, ParseDiagnostic, ParserOptions } from '../types'
import { classifyLine } from './families'
import { decodeHeader } from './header'

interface MessageBuilder {
  readonly line: number
  readonly timestamp: Date
  readonly sender: string | null
  readonly isSystem: boolean
  readonly lines: string[]
}

export interface AssemblyState {
  /** Day/month order, fixed by the first valid day/month/year header */
  dateOrder: DateOrder | null
  currentBuilder: MessageBuilder | null
  lineNumber: number
  readonly diagnostics: ParseDiagnostic[]
}

export function createAssemblyState(options?: ParserOptions): AssemblyState {
  const forced = options?.dateOrder
  return {
    dateOrder: forced === 'mdy' || forced === 'dmy' ? forced : null,
    currentBuilder: null,
    lineNumber: 0,
    diagnostics: []
  }
}

/**
 * Finalize a builder. Trailing blank lines are dropped, inner ones kept.
 */
function finalizeMessage(builder: MessageBuilder): Message {
  const lines = [...builder.lines]
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') {
    lines.pop()
  }

  return Object.freeze({
    line: builder.line,
    timestamp: builder.timestamp,
    sender: builder.sender,
    text: lines.join('\n'),
    isSystem: builder.isSystem
  })
}

/**
 * Feed one line. Returns the previous message when this line starts a new one.
 */
export function foldLine(state: AssemblyState, rawLine: string): Message | null {
  state.lineNumber += 1
  const line = rawLine.replace(/^\u200E/, '')
  const fields = classifyLine(line)

  if (fields) {
    const header = decodeHeader(fields, state.dateOrder)
    if (header) {
      if (state.dateOrder === null && header.dateOrder !== null) {
        state.dateOrder = header.dateOrder
      }
      const finished = state.currentBuilder ? finalizeMessage(state.currentBuilder) : null
      state.currentBuilder = {
        line: state.lineNumber,
        timestamp: header.timestamp,
        sender: header.sender,
        isSystem: header.isSystem,
        lines: [header.text]
      }
      return finished
    }
    state.diagnostics.push({ line: state.lineNumber, kind: 'malformed_header', text: line })
  }

  if (state.currentBuilder) {
    state.currentBuilder.lines.push(line)
  } else if (!fields && line.trim() !== '') {
    state.diagnostics.push({ line: state.lineNumber, kind: 'preamble', text: line })
  }
  return null
}

/**
 * Finalize whatever message is still open at end of input.
 */
export function finishAssembly(state: AssemblyState): Message | null {
  const builder = state.currentBuilder
  state.currentBuilder = null
  return builder ? finalizeMessage(builder) : null
}
