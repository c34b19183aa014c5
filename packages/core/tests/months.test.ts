/**
 * Unit Tests: Month Ranges
 */

import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'
import { ConfigError } from '../src/errors.js'
import {
  addMonths,
  buildMonthRange,
  formatYearMonth,
  parseYearMonth,
} from '../src/source/months.js'

const NOW = DateTime.fromObject({ year: 2025, month: 12, day: 15 })

function labels(bounds: { from?: string; to?: string }): string[] {
  return buildMonthRange(bounds, NOW).map(formatYearMonth)
}

describe('parseYearMonth', () => {
  it('parses YYYY-MM and YYYY-M', () => {
    expect(parseYearMonth('2025-11')).toEqual({ year: 2025, month: 11 })
    expect(parseYearMonth('2026-3')).toEqual({ year: 2026, month: 3 })
  })

  it('rejects anything else', () => {
    expect(() => parseYearMonth('2025/11')).toThrow(ConfigError)
    expect(() => parseYearMonth('2025-13')).toThrow('Expected YYYY-MM, got "2025-13"')
    expect(() => parseYearMonth('2025-00')).toThrow(ConfigError)
  })
})

describe('addMonths', () => {
  it('rolls over the year', () => {
    expect(addMonths({ year: 2025, month: 12 }, 1)).toEqual({ year: 2026, month: 1 })
    expect(addMonths({ year: 2025, month: 1 }, -1)).toEqual({ year: 2024, month: 12 })
  })
})

describe('buildMonthRange', () => {
  it('defaults to this month and next', () => {
    expect(labels({})).toEqual(['2025-12', '2026-01'])
  })

  it('takes one month after a lone from', () => {
    expect(labels({ from: '2026-02' })).toEqual(['2026-02', '2026-03'])
  })

  it('runs from this month to a lone to', () => {
    expect(labels({ to: '2026-02' })).toEqual(['2025-12', '2026-01', '2026-02'])
  })

  it('includes both bounds', () => {
    expect(labels({ from: '2025-11', to: '2025-11' })).toEqual(['2025-11'])
    expect(labels({ from: '2025-10', to: '2026-01' })).toEqual([
      '2025-10',
      '2025-11',
      '2025-12',
      '2026-01',
    ])
  })

  it('rejects a reversed range', () => {
    expect(() => labels({ from: '2026-01', to: '2025-11' })).toThrow('2026-01 is after 2025-11')
  })

  it('allows twelve months and no more', () => {
    expect(labels({ from: '2025-01', to: '2025-12' })).toHaveLength(12)
    expect(() => labels({ from: '2025-01', to: '2026-01' })).toThrow(
      'Range is too wide (at most 12 months)',
    )
  })
})
