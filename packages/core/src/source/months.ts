/**
 * Month ranges for fetching several ShiftWeb pages in one run.
 */

import { DateTime } from 'luxon'
import { ConfigError } from '../errors.js'
import type { YearMonth } from '../shifts/extractor.js'

export const MAX_MONTHS = 12

const YEAR_MONTH_PATTERN = /^(?<year>\d{4})-(?<month>\d{1,2})$/

/**
 * Parse "YYYY-MM".
 */
export function parseYearMonth(text: string): YearMonth {
  const groups = YEAR_MONTH_PATTERN.exec(text.trim())?.groups
  const year = Number(groups?.year)
  const month = Number(groups?.month)
  if (!groups || month < 1 || month > 12) {
    throw new ConfigError(`Expected YYYY-MM, got "${text}"`)
  }
  return { year, month }
}

export function formatYearMonth({ year, month }: YearMonth): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`
}

export function addMonths(ym: YearMonth, months: number): YearMonth {
  const dt = DateTime.fromObject({ year: ym.year, month: ym.month, day: 1 }).plus({ months })
  return { year: dt.year, month: dt.month }
}

export function compareYearMonth(a: YearMonth, b: YearMonth): number {
  return a.year !== b.year ? a.year - b.year : a.month - b.month
}

/**
 * Months to fetch, inclusive.
 *
 * - neither bound: this month and next
 * - only from: from and the month after
 * - only to: this month through to
 *
 * @throws ConfigError when from is after to or the range exceeds MAX_MONTHS
 */
export function buildMonthRange(
  bounds: { from?: string; to?: string },
  now: DateTime = DateTime.local(),
): YearMonth[] {
  const current: YearMonth = { year: now.year, month: now.month }

  let from: YearMonth
  let to: YearMonth
  if (bounds.from && bounds.to) {
    from = parseYearMonth(bounds.from)
    to = parseYearMonth(bounds.to)
  } else if (bounds.from) {
    from = parseYearMonth(bounds.from)
    to = addMonths(from, 1)
  } else if (bounds.to) {
    from = current
    to = parseYearMonth(bounds.to)
  } else {
    return [current, addMonths(current, 1)]
  }

  if (compareYearMonth(from, to) > 0) {
    throw new ConfigError(`${formatYearMonth(from)} is after ${formatYearMonth(to)}`)
  }

  const months: YearMonth[] = []
  for (let ym = from; compareYearMonth(ym, to) <= 0; ym = addMonths(ym, 1)) {
    months.push(ym)
    if (months.length > MAX_MONTHS) {
      throw new ConfigError(`Range is too wide (at most ${MAX_MONTHS} months)`)
    }
  }
  return months
}
