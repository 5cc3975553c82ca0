import { describe, expect, it } from 'vitest'
import { classifyLine } from './families'
import { decodeHeader, splitSender } from './header'
import { formatTimestamp } from './timestamp'

function decode(line: string, lockedOrder: 'mdy' | 'dmy' | null = null) {
  const fields = classifyLine(line)
  if (!fields) throw new Error(`not a header: ${line}`)
  return decodeHeader(fields, lockedOrder)
}

describe('splitSender', () => {
  it('splits sender from text at the first colon', () => {
    expect(splitSender('John: Time is 3:30 PM')).toEqual({
      sender: 'John',
      text: 'Time is 3:30 PM',
      isSystem: false
    })
  })

  it('keeps an empty body', () => {
    expect(splitSender('John:')).toEqual({ sender: 'John', text: '', isSystem: false })
  })

  it('tags lines without a sender as system', () => {
    expect(splitSender('John added Jane')).toEqual({
      sender: null,
      text: 'John added Jane',
      isSystem: true
    })
  })

  it('does not take a URL scheme for a sender separator', () => {
    expect(splitSender('Visit https://example.com').isSystem).toBe(true)
  })

  it('tags the encryption notice as system even with a sender', () => {
    const split = splitSender('Trip Group: Messages and calls are end-to-end encrypted.')

    expect(split.isSystem).toBe(true)
    expect(split.sender).toBeNull()
    expect(split.text).toBe('Messages and calls are end-to-end encrypted.')
  })

  it('tags marked group notifications as system', () => {
    expect(splitSender('Trip Group: \u200EJohn added Jane')).toEqual({
      sender: null,
      text: 'John added Jane',
      isSystem: true
    })
  })

  it('leaves unmarked text that mentions a notification word alone', () => {
    expect(splitSender('Jane: I left early')).toEqual({
      sender: 'Jane',
      text: 'I left early',
      isSystem: false
    })
  })

  it('keeps marked media placeholders as user messages', () => {
    expect(splitSender('Jane: \u200Eimage omitted')).toEqual({
      sender: 'Jane',
      text: 'image omitted',
      isSystem: false
    })
  })

  it('tags group creation with a colon in the group name as system', () => {
    expect(splitSender('You created group "Trip: 2024"')).toEqual({
      sender: null,
      text: 'You created group "Trip: 2024"',
      isSystem: true
    })
  })
})

describe('decodeHeader', () => {
  it('decodes US order with a meridiem', () => {
    const header = decode('11/10/24, 9:15 AM - Alex: On my way')

    expect(header?.dateOrder).toBe('mdy')
    expect(header && formatTimestamp(header.timestamp)).toBe('2024-11-10T09:15:00')
    expect(header?.sender).toBe('Alex')
    expect(header?.text).toBe('On my way')
    expect(header?.isSystem).toBe(false)
  })

  it('decodes European order when the day exceeds 12', () => {
    const header = decode('20/02/25, 14:25 - Sarah: Hi')

    expect(header?.dateOrder).toBe('dmy')
    expect(header && formatTimestamp(header.timestamp)).toBe('2025-02-20T14:25:00')
  })

  it('reports no order for year-first dates', () => {
    const header = decode('2025/02/20, 14:25 - Sarah: Hi!')

    expect(header?.dateOrder).toBeNull()
    expect(header && formatTimestamp(header.timestamp)).toBe('2025-02-20T14:25:00')
  })

  it('reads with a locked order instead of sampling', () => {
    const header = decode('05/06/24, 10:00 - A: hi', 'mdy')

    expect(header?.dateOrder).toBe('mdy')
    expect(header && formatTimestamp(header.timestamp)).toBe('2024-05-06T10:00:00')
  })

  it('returns null for invalid values', () => {
    expect(decode('2025/13/40, 10:00 - Bob: nope')).toBeNull()
    expect(decode('1/15/24, 13:00 PM - Bob: nope')).toBeNull()
    expect(decode('20/02/25, 14:25 - Sarah: Hi', 'mdy')).toBeNull()
  })
})
