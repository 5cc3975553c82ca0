/**
 * CLI File I/O
 *
 * File reading and writing utilities for the CLI.
 */

import { mkdir, readFile, stat } from 'node:fs/promises'
import type { JSZipObject } from 'jszip'

const BYTES_PER_MB = 1024 * 1024

/**
 * Decode export bytes as UTF-8, falling back to Latin-1 for older exports.
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch {
    return new TextDecoder('latin1').decode(bytes)
  }
}

function assertWithinLimit(size: number, maxFileSizeMb: number, label: string): void {
  if (size > maxFileSizeMb * BYTES_PER_MB) {
    throw new Error(`${label} is too large (${(size / BYTES_PER_MB).toFixed(1)} MB). Maximum size is ${maxFileSizeMb} MB`)
  }
}

/**
 * Inflate a zip entry, stopping as soon as it passes maxBytes.
 */
async function readZipEntry(file: JSZipObject, maxBytes: number): Promise<Uint8Array> {
  const chunks: Buffer[] = []
  let total = 0

  for await (const chunk of file.nodeStream('nodebuffer')) {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
    total += bytes.byteLength
    if (total > maxBytes) {
      throw new Error(`Chat file in zip is too large (over ${maxBytes / BYTES_PER_MB} MB once extracted)`)
    }
    chunks.push(bytes)
  }

  return Buffer.concat(chunks)
}

/**
 * Read an input file, handling zip archives.
 *
 * @throws Error when the file (or the chat inside a zip) exceeds maxFileSizeMb
 */
export async function readInputFile(path: string, maxFileSizeMb: number): Promise<string> {
  const { size } = await stat(path)
  assertWithinLimit(size, maxFileSizeMb, 'Input file')

  if (path.toLowerCase().endsWith('.zip')) {
    const JSZip = await import('jszip')
    const zipBuffer = await readFile(path)
    const zip = await JSZip.default.loadAsync(new Uint8Array(zipBuffer))

    // iOS names the chat _chat.txt, Android "WhatsApp Chat with X.txt"
    const chatFile =
      Object.keys(zip.files).find((name) => name.endsWith('_chat.txt')) ??
      Object.keys(zip.files).find((name) => name.endsWith('.txt'))

    if (!chatFile) {
      throw new Error('No chat file found in zip archive')
    }

    const file = zip.files[chatFile]
    if (!file) {
      throw new Error('Could not read chat file from zip')
    }

    return decodeText(await readZipEntry(file, maxFileSizeMb * BYTES_PER_MB))
  }

  if (!path.toLowerCase().endsWith('.txt')) {
    throw new Error('Invalid file type. Please use a .txt or .zip chat export')
  }

  return decodeText(new Uint8Array(await readFile(path)))
}

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}
