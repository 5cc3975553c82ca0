/**
 * TranscriptLens Core Library
 *
 * Turn exported chat transcripts into ordered message records and metadata.
 *
 * Design principle: Pure functions only. No IO, no progress reporting, no orchestration.
 * The library is stateless and side-effect-free, so independent transcripts
 * can be parsed concurrently.
 *
 * @license AGPL-3.0
 */

// Export module
export { exportToJSON, exportToText, type TextExportOptions, type TranscriptJson, toTranscriptJson } from './export/index'
// Parser module
export {
  classifyLine,
  decodeHeader,
  formatExportTimestamp,
  formatTimestamp,
  HEADER_FAMILIES,
  type HeaderFamilyName,
  normalizeLineEndings,
  parseMessages,
  parseTranscript,
  parseTranscriptStream,
  sampleDateOrder,
  splitSender,
  summarizeMessages
} from './parser/index'
// Types
export type * from './types'

export const VERSION = '0.1.0'
