/**
 * Unit Tests: Markup Extractor
 *
 * Tests ShiftWeb page parsing:
 * - Heading year/month resolution and clock fallback
 * - Worked / off / incomplete rows
 * - Typed failures for missing tables and malformed cells
 * - Overnight policy
 */

import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'
import { DateParseError, MarkupStructureError } from '../src/errors.js'
import {
  extractShifts,
  firstLine,
  parseClock,
  parseDateCell,
  parseHeadingYearMonth,
  resolvePageMonth,
  splitTimeCell,
} from '../src/shifts/extractor.js'
import { MINUTE_FORMAT, shiftPage } from './helpers.js'

const NOW = DateTime.fromObject({ year: 2030, month: 3, day: 10 })

// -------------------------------------------------------------------
// Heading
// -------------------------------------------------------------------

describe('parseHeadingYearMonth', () => {
  it('reads year and month from a Japanese heading', () => {
    expect(parseHeadingYearMonth('2025年11月の確定シフト')).toEqual({ year: 2025, month: 11 })
  })

  it('reads single-digit months', () => {
    expect(parseHeadingYearMonth('2026年1月の確定シフト')).toEqual({ year: 2026, month: 1 })
  })

  it('accepts the YYYY-MM form', () => {
    expect(parseHeadingYearMonth('shifts 2025-09')).toEqual({ year: 2025, month: 9 })
  })

  it('returns null without a recognizable month', () => {
    expect(parseHeadingYearMonth('確定シフト')).toBeNull()
  })
})

describe('resolvePageMonth', () => {
  it('prefers the heading', () => {
    expect(resolvePageMonth('2025年11月の確定シフト', NOW)).toEqual({ year: 2025, month: 11 })
  })

  it('falls back to the clock when the heading has no month', () => {
    expect(resolvePageMonth('確定シフト', NOW)).toEqual({ year: 2030, month: 3 })
  })

  it('falls back to the clock when there is no heading', () => {
    expect(resolvePageMonth(null, NOW)).toEqual({ year: 2030, month: 3 })
  })
})

// -------------------------------------------------------------------
// Cell grammar
// -------------------------------------------------------------------

describe('cell grammar', () => {
  it('takes the first non-blank line of a cell', () => {
    expect(firstLine('\n  11/4\n未通知\n')).toBe('11/4')
    expect(firstLine(' \n ')).toBe('')
  })

  it('parses a date cell with a day-of-week suffix', () => {
    expect(parseDateCell('11/4(火)')).toEqual({ month: 11, day: 4 })
    expect(parseDateCell('1/15（水）')).toEqual({ month: 1, day: 15 })
    expect(parseDateCell('12/31\n祝')).toEqual({ month: 12, day: 31 })
  })

  it('rejects a date cell outside the grammar', () => {
    expect(() => parseDateCell('Nov 4')).toThrow(DateParseError)
  })

  it('parses clock times', () => {
    expect(parseClock('09:05')).toEqual({ hour: 9, minute: 5 })
    expect(parseClock(' 19:45 ')).toEqual({ hour: 19, minute: 45 })
  })

  it('rejects malformed clock times', () => {
    expect(() => parseClock('10時')).toThrow(DateParseError)
    expect(() => parseClock('10:5')).toThrow(DateParseError)
  })

  it('splits a worked time cell', () => {
    const markers = { workedMarker: '●', rangeSeparator: '-' }
    expect(splitTimeCell('●14:30-19:45', markers)).toEqual(['14:30', '19:45'])
    expect(splitTimeCell('● 9:00 - 13:00', markers)).toEqual(['9:00', '13:00'])
  })

  it('returns null for cells that are not worked', () => {
    const markers = { workedMarker: '●', rangeSeparator: '-' }
    expect(splitTimeCell('×', markers)).toBeNull()
    expect(splitTimeCell('●', markers)).toBeNull()
    expect(splitTimeCell('10:00-15:00', markers)).toBeNull()
  })
})

// -------------------------------------------------------------------
// extractShifts
// -------------------------------------------------------------------

describe('extractShifts', () => {
  it('extracts a worked row', () => {
    const html = shiftPage([{ date: '11/4(火)', shop: 'Shibuya', time: '●14:30-19:45' }])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts).toHaveLength(1)
    expect(shifts[0].start.toFormat(MINUTE_FORMAT)).toBe('2025-11-04T14:30')
    expect(shifts[0].end.toFormat(MINUTE_FORMAT)).toBe('2025-11-04T19:45')
    expect(shifts[0].location).toBe('Shibuya')
    expect(shifts[0].title).toBe('バイト')
    expect(shifts[0].memo).toBe('')
  })

  it('skips days off', () => {
    const html = shiftPage([{ date: '11/4(火)', shop: 'Shibuya', time: '×' }])

    expect(extractShifts(html, { now: NOW })).toEqual([])
  })

  it('skips rows missing a cell', () => {
    const html = shiftPage([
      { date: '11/4(火)', time: '●14:30-19:45' },
      { date: '11/5(水)', shop: '', time: '●10:00-15:00' },
      { shop: 'Shibuya', time: '●10:00-15:00' },
    ])

    expect(extractShifts(html, { now: NOW })).toEqual([])
  })

  it('keeps document order', () => {
    const html = shiftPage([
      { date: '11/20(木)', shop: 'Ebisu', time: '●09:00-13:00' },
      { date: '11/6(木)', shop: 'Shibuya', time: '●17:00-22:00' },
      { date: '11/7(金)', shop: 'Shibuya', time: '×' },
    ])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts.map((s) => s.start.toFormat(MINUTE_FORMAT))).toEqual([
      '2025-11-20T09:00',
      '2025-11-06T17:00',
    ])
    expect(shifts.map((s) => s.location)).toEqual(['Ebisu', 'Shibuya'])
  })

  it('reads the date when the day of week sits on its own line', () => {
    const html = shiftPage([{ date: '11/5<br>(水)', shop: 'Shibuya', time: '●10:00-15:00' }])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts[0].start.toFormat(MINUTE_FORMAT)).toBe('2025-11-05T10:00')
  })

  it('ignores a badge on the line after the date', () => {
    const html = shiftPage([{ date: '11/4<br>未通知', shop: 'Shibuya', time: '●14:30-19:45' }])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts).toHaveLength(1)
    expect(shifts[0].start.toFormat(MINUTE_FORMAT)).toBe('2025-11-04T14:30')
  })

  it('ignores a badge in a sibling element', () => {
    const html = shiftPage([
      { date: '<span>11/4</span><span>未通知</span>', shop: 'Shibuya', time: '●14:30-19:45' },
    ])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts).toHaveLength(1)
    expect(shifts[0].end.toFormat(MINUTE_FORMAT)).toBe('2025-11-04T19:45')
  })

  it('skips leading blank lines in the date cell', () => {
    const html = shiftPage([{ date: '<br>\n 11/6(木)<br>', shop: 'Shibuya', time: '●17:00-22:00' }])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts[0].start.toFormat(MINUTE_FORMAT)).toBe('2025-11-06T17:00')
  })

  it('uses the row month as-is even when it disagrees with the heading', () => {
    const html = shiftPage([{ date: '12/1(月)', shop: 'Shibuya', time: '●10:00-15:00' }])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts[0].start.toFormat(MINUTE_FORMAT)).toBe('2025-12-01T10:00')
  })

  it('takes the year from the clock when the heading is missing', () => {
    const html = shiftPage([{ date: '11/4(火)', shop: 'Shibuya', time: '●14:30-19:45' }], null)

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts[0].start.toFormat(MINUTE_FORMAT)).toBe('2030-11-04T14:30')
  })

  it('fails when the shift table is missing', () => {
    const html = '<html><body><h3 class="btn-block">2025年11月の確定シフト</h3></body></html>'

    expect(() => extractShifts(html, { now: NOW })).toThrow(MarkupStructureError)
  })

  it('fails the whole page on a malformed date in a worked row', () => {
    const html = shiftPage([
      { date: '11/4(火)', shop: 'Shibuya', time: '●14:30-19:45' },
      { date: 'Nov 5', shop: 'Shibuya', time: '●10:00-15:00' },
    ])

    expect(() => extractShifts(html, { now: NOW })).toThrow(DateParseError)
  })

  it('fails on a malformed clock time in a worked row', () => {
    const html = shiftPage([{ date: '11/4(火)', shop: 'Shibuya', time: '●14時-19:45' }])

    expect(() => extractShifts(html, { now: NOW })).toThrow(DateParseError)
  })

  it('fails on a date that does not exist', () => {
    const html = shiftPage([{ date: '2/30(月)', shop: 'Shibuya', time: '●10:00-15:00' }])

    expect(() => extractShifts(html, { now: NOW })).toThrow(DateParseError)
  })

  it('ignores malformed text in rows that are not worked', () => {
    const html = shiftPage([{ date: 'Nov 5', shop: 'Shibuya', time: '×' }])

    expect(extractShifts(html, { now: NOW })).toEqual([])
  })

  it('skips zero-length shifts', () => {
    const html = shiftPage([{ date: '11/4(火)', shop: 'Shibuya', time: '●10:00-10:00' }])

    expect(extractShifts(html, { now: NOW })).toEqual([])
  })

  it('moves the end of an overnight shift to the next day', () => {
    const html = shiftPage([{ date: '11/30(日)', shop: 'Shibuya', time: '●22:00-02:00' }])

    const shifts = extractShifts(html, { now: NOW })

    expect(shifts[0].start.toFormat(MINUTE_FORMAT)).toBe('2025-11-30T22:00')
    expect(shifts[0].end.toFormat(MINUTE_FORMAT)).toBe('2025-12-01T02:00')
  })

  it('rejects overnight shifts when configured to', () => {
    const html = shiftPage([{ date: '11/30(日)', shop: 'Shibuya', time: '●22:00-02:00' }])

    expect(() => extractShifts(html, { now: NOW, overnight: 'reject' })).toThrow(DateParseError)
  })

  it('honors custom markers and title', () => {
    const html = shiftPage([
      { date: '11/4(火)', shop: 'Shibuya', time: '◎14:30〜19:45' },
      { date: '11/5(水)', shop: 'Shibuya', time: '●10:00-15:00' },
    ])

    const shifts = extractShifts(html, {
      now: NOW,
      workedMarker: '◎',
      rangeSeparator: '〜',
      title: 'Cafe',
    })

    expect(shifts).toHaveLength(1)
    expect(shifts[0].title).toBe('Cafe')
    expect(shifts[0].end.toFormat(MINUTE_FORMAT)).toBe('2025-11-04T19:45')
  })

  it('ignores undefined overrides', () => {
    const html = shiftPage([{ date: '11/4(火)', shop: 'Shibuya', time: '●14:30-19:45' }])

    const shifts = extractShifts(html, { now: NOW, title: undefined })

    expect(shifts[0].title).toBe('バイト')
  })
})
