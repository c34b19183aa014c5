/**
 * Shift Pipeline
 *
 * Glue between the ShiftWeb pages and the sync engine: fetch each month,
 * extract its shifts, and render the outcome as report lines.
 */

import type { Logger } from 'pino'
import type { SyncReport } from './calendar/types.js'
import { silentLogger } from './logger.js'
import { extractShifts, type ExtractOptions, type YearMonth } from './shifts/extractor.js'
import type { ShiftRecord } from './shifts/types.js'
import { formatYearMonth } from './source/months.js'

/** Anything that can hand out a month's schedule page */
export interface MonthPageSource {
  fetchMonthPage(ym: YearMonth): Promise<string>
}

export interface MonthShifts {
  month: YearMonth
  shifts: ShiftRecord[]
}

/**
 * Fetch and extract each month in order. Any fetch or extraction error
 * aborts the whole collection: no partial list is returned.
 */
export async function collectShifts(
  source: MonthPageSource,
  months: readonly YearMonth[],
  options: ExtractOptions = {},
  logger: Logger = silentLogger,
): Promise<MonthShifts[]> {
  const log = logger.child({ component: 'pipeline' })
  const result: MonthShifts[] = []
  for (const month of months) {
    const html = await source.fetchMonthPage(month)
    const shifts = extractShifts(html, options)
    log.info({ month: formatYearMonth(month), count: shifts.length }, 'Extracted shifts')
    result.push({ month, shifts })
  }
  return result
}

export function sortByStart(shifts: readonly ShiftRecord[]): ShiftRecord[] {
  return [...shifts].sort((a, b) => a.start.toMillis() - b.start.toMillis())
}

/**
 * "2025-11-04  14:30-19:45  Shibuya"
 */
export function formatShiftLine(shift: ShiftRecord): string {
  const date = shift.start.toFormat('yyyy-MM-dd')
  const range = `${shift.start.toFormat('HH:mm')}-${shift.end.toFormat('HH:mm')}`
  return shift.location ? `${date}  ${range}  ${shift.location}` : `${date}  ${range}`
}

export function formatReport(report: SyncReport): string[] {
  const lines = report.succeeded.map((event) => `OK (${event.status})  ${event.url}`)
  for (const failure of report.failed) {
    lines.push(
      failure.status === null
        ? `FAILED  ${failure.url}  ${failure.body}`
        : `FAILED (${failure.status})  ${failure.url}  ${failure.body}`,
    )
  }
  lines.push(
    `Synced ${report.succeeded.length}/${report.total} events` +
      (report.failed.length > 0 ? `, ${report.failed.length} failed` : ''),
  )
  return lines
}
