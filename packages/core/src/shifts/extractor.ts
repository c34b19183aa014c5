/**
 * Markup Extractor
 *
 * Turns one ShiftWeb month page into ShiftRecords, in document order.
 *
 * The page is expected to look like:
 *
 *   <h3 class="btn-block">2025年11月の確定シフト</h3>
 *   <table id="shiftTable">
 *     <tr><th>日付</th><th>店舗</th><th>時間</th></tr>
 *     <tr>
 *       <td class="shiftDate">11/4(火)</td>
 *       <td class="shiftMisName">Shibuya</td>
 *       <td class="shiftTime">●14:30-19:45</td>
 *     </tr>
 *   </table>
 */

import { load } from 'cheerio'
import { DateTime } from 'luxon'
import { DateParseError, MarkupStructureError } from '../errors.js'
import {
  DEFAULT_EXTRACTOR_CONFIG,
  FLOATING_ZONE,
  type ExtractorConfig,
  type ShiftRecord,
} from './types.js'

export interface ExtractOptions extends Partial<ExtractorConfig> {
  /** Clock used when the heading carries no year/month */
  now?: DateTime
}

export interface YearMonth {
  year: number
  month: number
}

interface ClockTime {
  hour: number
  minute: number
}

const HEADING_PATTERNS = [/(?<year>\d{4})年(?<month>\d{1,2})月/, /(?<year>\d{4})-(?<month>\d{1,2})/]
const DATE_PATTERN = /^(?<month>\d{1,2})\s*\/\s*(?<day>\d{1,2})$/
const CLOCK_PATTERN = /^(?<hour>\d{1,2}):(?<minute>\d{2})$/
// Day-of-week suffix ("(火)") or a second line in the date cell
const DATE_SUFFIX = /[\n(（]/

/**
 * Find "2025年11月" (or "2025-11") in heading text.
 */
export function parseHeadingYearMonth(text: string): YearMonth | null {
  for (const pattern of HEADING_PATTERNS) {
    const groups = pattern.exec(text)?.groups
    if (groups?.year && groups.month) {
      return { year: Number(groups.year), month: Number(groups.month) }
    }
  }
  return null
}

/**
 * Year/month a page belongs to, falling back to the clock's month when the
 * heading is missing or carries no recognizable month.
 */
export function resolvePageMonth(headingText: string | null, now: DateTime): YearMonth {
  const parsed = headingText === null ? null : parseHeadingYearMonth(headingText)
  return parsed ?? { year: now.year, month: now.month }
}

/**
 * First non-blank line of a cell's text.
 */
export function firstLine(text: string): string {
  for (const line of text.split('\n')) {
    const trimmed = line.trim()
    if (trimmed) return trimmed
  }
  return ''
}

/**
 * Parse the leading "M/D" of a date cell such as "11/4(火)".
 */
export function parseDateCell(text: string): { month: number; day: number } {
  const suffixAt = text.search(DATE_SUFFIX)
  const main = (suffixAt === -1 ? text : text.slice(0, suffixAt)).trim()
  const groups = DATE_PATTERN.exec(main)?.groups
  if (!groups?.month || !groups.day) {
    throw new DateParseError('Unrecognized date cell', text)
  }
  return { month: Number(groups.month), day: Number(groups.day) }
}

/**
 * Parse "HH:MM".
 */
export function parseClock(text: string): ClockTime {
  const groups = CLOCK_PATTERN.exec(text.trim())?.groups
  if (!groups?.hour || !groups.minute) {
    throw new DateParseError('Unrecognized clock time', text)
  }
  return { hour: Number(groups.hour), minute: Number(groups.minute) }
}

/**
 * Split a worked time cell into its start and end clock text.
 * Returns null for anything that is not a worked cell (e.g. "×").
 */
export function splitTimeCell(
  text: string,
  config: Pick<ExtractorConfig, 'workedMarker' | 'rangeSeparator'>,
): [string, string] | null {
  const { workedMarker, rangeSeparator } = config
  if (!text.includes(workedMarker) || !text.includes(rangeSeparator)) {
    return null
  }
  const range = text.slice(text.indexOf(workedMarker) + workedMarker.length)
  const separatorAt = range.indexOf(rangeSeparator)
  if (separatorAt === -1) {
    throw new DateParseError('Time range has no separator after the marker', text)
  }
  return [
    range.slice(0, separatorAt).trim(),
    range.slice(separatorAt + rangeSeparator.length).trim(),
  ]
}

function combine(year: number, month: number, day: number, clock: ClockTime, raw: string): DateTime {
  const dt = DateTime.fromObject(
    { year, month, day, hour: clock.hour, minute: clock.minute },
    { zone: FLOATING_ZONE },
  )
  if (!dt.isValid) {
    throw new DateParseError(`Not a real date-time (${dt.invalidExplanation ?? 'invalid'})`, raw)
  }
  return dt
}

/**
 * Extract every worked shift from a month page.
 *
 * @throws MarkupStructureError when the shift table is missing
 * @throws DateParseError when a worked row has malformed date/time text
 */
export function extractShifts(html: string, options: ExtractOptions = {}): ShiftRecord[] {
  const { now, ...overrides } = options
  const config: ExtractorConfig = { ...DEFAULT_EXTRACTOR_CONFIG }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && key in config) {
      Object.assign(config, { [key]: value })
    }
  }
  const $ = load(html)

  const heading = $(config.headingSelector).first()
  const { year } = resolvePageMonth(
    heading.length > 0 ? heading.text().trim() : null,
    now ?? DateTime.local(),
  )

  const table = $(config.tableSelector).first()
  if (table.length === 0) {
    throw new MarkupStructureError(
      `Shift table "${config.tableSelector}" not found; the page layout may have changed`,
    )
  }

  // Date cells may carry badges on a second line ("11/4<br>未通知") or in
  // sibling elements; give each its own line so only the date is parsed
  table.find(`${config.dateCellSelector} br`).replaceWith('\n')
  table.find(`${config.dateCellSelector} *`).append('\n')

  const shifts: ShiftRecord[] = []
  const rows = table.find('tr').toArray()

  // First row is the header
  for (const row of rows.slice(1)) {
    const $row = $(row)
    const dateText = firstLine($row.find(config.dateCellSelector).first().text())
    const shopText = $row.find(config.shopCellSelector).first().text().trim()
    const timeText = $row.find(config.timeCellSelector).first().text().trim()

    if (!dateText || !shopText || !timeText) continue

    const range = splitTimeCell(timeText, config)
    if (!range) continue

    // The row's own month wins even when it disagrees with the heading
    const { month, day } = parseDateCell(dateText)
    const start = combine(year, month, day, parseClock(range[0]), dateText)
    let end = combine(year, month, day, parseClock(range[1]), dateText)

    if (end.toMillis() === start.toMillis()) continue
    if (end.toMillis() < start.toMillis()) {
      if (config.overnight === 'reject') {
        throw new DateParseError('Shift ends before it starts', timeText)
      }
      end = end.plus({ days: 1 })
    }

    shifts.push({
      title: config.title,
      start,
      end,
      location: shopText,
      memo: '',
    })
  }

  return shifts
}
