import { mkdtempSync, rmSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import JSZip from 'jszip'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { decodeText, readInputFile } from './io'

const CHAT = '[1/15/24, 10:30:45 AM] John: Hello\n[1/15/24, 10:31:02 AM] Jane: Hi there!\n'

async function writeZip(path: string, files: Record<string, string>): Promise<void> {
  const zip = new JSZip()
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content)
  }
  const bytes = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' })
  await writeFile(path, bytes)
}

describe('decodeText', () => {
  it('decodes UTF-8', () => {
    expect(decodeText(new TextEncoder().encode('café'))).toBe('café')
  })

  it('falls back to Latin-1 for invalid UTF-8', () => {
    expect(decodeText(new Uint8Array([0x63, 0x61, 0x66, 0xe9]))).toBe('café')
  })
})

describe('readInputFile', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'transcript-lens-io-test-'))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('reads a text export', async () => {
    const path = join(tempDir, 'chat.txt')
    await writeFile(path, CHAT)

    expect(await readInputFile(path, 16)).toBe(CHAT)
  })

  it('reads _chat.txt from a zip export', async () => {
    const path = join(tempDir, 'export.zip')
    await writeZip(path, { 'notes.txt': 'not the chat', '_chat.txt': CHAT })

    expect(await readInputFile(path, 16)).toBe(CHAT)
  })

  it('falls back to any text file in a zip', async () => {
    const path = join(tempDir, 'export.zip')
    await writeZip(path, { 'WhatsApp Chat with Jane.txt': CHAT })

    expect(await readInputFile(path, 16)).toBe(CHAT)
  })

  it('rejects a zip without a chat file', async () => {
    const path = join(tempDir, 'export.zip')
    await writeZip(path, { 'photo.jpg': 'binary' })

    await expect(readInputFile(path, 16)).rejects.toThrow('No chat file found in zip archive')
  })

  it('rejects other file types', async () => {
    const path = join(tempDir, 'chat.csv')
    await writeFile(path, CHAT)

    await expect(readInputFile(path, 16)).rejects.toThrow(
      'Invalid file type. Please use a .txt or .zip chat export'
    )
  })

  it('rejects files over the size limit', async () => {
    const path = join(tempDir, 'chat.txt')
    await writeFile(path, CHAT)

    await expect(readInputFile(path, 0.00001)).rejects.toThrow('Input file is too large')
  })

  it('checks the extracted size of a zipped chat', async () => {
    const path = join(tempDir, 'export.zip')
    await writeZip(path, { '_chat.txt': 'a'.repeat(5000) })

    await expect(readInputFile(path, 0.001)).rejects.toThrow('Chat file in zip is too large')
  })

  it('stops inflating a highly compressed chat at the limit', async () => {
    const path = join(tempDir, 'export.zip')
    await writeZip(path, { '_chat.txt': 'a'.repeat(2 * 1024 * 1024) })

    await expect(readInputFile(path, 1)).rejects.toThrow(
      'Chat file in zip is too large (over 1 MB once extracted)'
    )
  })

  it('reads a zipped chat right at the limit', async () => {
    const path = join(tempDir, 'export.zip')
    const chat = `${CHAT}${'x'.repeat(1024 * 1024 - CHAT.length)}`
    await writeZip(path, { '_chat.txt': chat })

    expect(await readInputFile(path, 1)).toBe(chat)
  })
})
