/**
 * Export Module
 *
 * Render parsed transcripts for downstream consumers.
 */

export { exportToJSON, type TranscriptJson, toTranscriptJson } from './json'
export { exportToText, type TextExportOptions } from './text'
