import { describe, expect, it } from 'vitest'
import { classifyLine } from './families'

describe('classifyLine', () => {
  it('reads the bracketed layout with seconds and meridiem', () => {
    const fields = classifyLine('[1/15/24, 10:30:45 AM] John: Hello')

    expect(fields?.family).toBe('bracketed')
    expect(fields?.calendar).toEqual({ kind: 'year_last', first: 1, second: 15, year: 24 })
    expect(fields?.clock).toEqual({ hour: 10, minute: 30, second: 45, meridiem: 'AM' })
    expect(fields?.remainder).toBe('John: Hello')
  })

  it('reads the bracketed layout with a four-digit year and 24-hour clock', () => {
    const fields = classifyLine('[20/02/2025, 14:25:00] Sarah: Hi')

    expect(fields?.family).toBe('bracketed')
    expect(fields?.calendar).toEqual({ kind: 'year_last', first: 20, second: 2, year: 2025 })
    expect(fields?.clock).toEqual({ hour: 14, minute: 25, second: 0, meridiem: null })
  })

  it('accepts a narrow no-break space before the meridiem', () => {
    const fields = classifyLine('[1/15/24, 10:30:45\u202FPM] John: Hello')

    expect(fields?.clock.meridiem).toBe('PM')
  })

  it('reads the unbracketed meridiem layout', () => {
    const fields = classifyLine('11/10/24, 9:15 AM - Alex: On my way')

    expect(fields?.family).toBe('meridiem')
    expect(fields?.clock).toEqual({ hour: 9, minute: 15, second: 0, meridiem: 'AM' })
    expect(fields?.remainder).toBe('Alex: On my way')
  })

  it('accepts lowercase dotted meridiem markers and an en dash', () => {
    const fields = classifyLine('3/4/24, 7:05 p.m. – Alex: Late')

    expect(fields?.family).toBe('meridiem')
    expect(fields?.clock.meridiem).toBe('PM')
    expect(fields?.remainder).toBe('Alex: Late')
  })

  it('reads the year-first layout', () => {
    const fields = classifyLine('2025/02/20, 14:25 - Sarah: Hi!')

    expect(fields?.family).toBe('year_first')
    expect(fields?.calendar).toEqual({ kind: 'year_first', year: 2025, month: 2, day: 20 })
    expect(fields?.remainder).toBe('Sarah: Hi!')
  })

  it('reads the year-first layout with dashes', () => {
    const fields = classifyLine('2025-02-20, 14:25 - Sarah: Hi!')

    expect(fields?.family).toBe('year_first')
  })

  it('reads the day-first 24-hour layout', () => {
    const fields = classifyLine('20/02/25, 14:25 - Sarah: Hi')

    expect(fields?.family).toBe('day_first')
    expect(fields?.calendar).toEqual({ kind: 'year_last', first: 20, second: 2, year: 25 })
    expect(fields?.clock).toEqual({ hour: 14, minute: 25, second: 0, meridiem: null })
  })

  it('accepts dotted dates', () => {
    const fields = classifyLine('20.02.25, 14:25 - Sarah: Hi')

    expect(fields?.family).toBe('day_first')
  })

  it('keeps an empty remainder', () => {
    expect(classifyLine('1/15/24, 10:30 - ')?.remainder).toBe('')
  })

  it('returns null for continuation lines', () => {
    expect(classifyLine('just some text')).toBeNull()
    expect(classifyLine('')).toBeNull()
    expect(classifyLine('meet at 10:30 - bring snacks')).toBeNull()
    expect(classifyLine('on 1/15/24, 10:30 - we met')).toBeNull()
  })

  it('does not validate values', () => {
    const fields = classifyLine('2025/13/40, 10:00 - Bob: nope')

    expect(fields?.calendar).toEqual({ kind: 'year_first', year: 2025, month: 13, day: 40 })
  })
})
