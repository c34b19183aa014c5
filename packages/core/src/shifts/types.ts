/**
 * Shift Types
 *
 * Records produced by the markup extractor and consumed by the encoder
 * and the synchronization engine.
 */

import type { DateTime } from 'luxon'

/**
 * Shift times are calendar-naive: they carry no timezone. Luxon needs a
 * zone to hold wall-clock fields, so every record uses this one and all
 * rendering ignores it.
 */
export const FLOATING_ZONE = 'utc'

/** One normalized work period */
export interface ShiftRecord {
  readonly title: string
  readonly start: DateTime
  /** Strictly after start */
  readonly end: DateTime
  /** Workplace name, may be empty */
  readonly location: string
  /** Free-text note, may be empty */
  readonly memo: string
}

/**
 * What to do when a row's end clock time is earlier than its start.
 * - next-day: the shift runs past midnight, end moves one day forward
 * - reject: the row is a DateParseError
 */
export type OvernightPolicy = 'next-day' | 'reject'

/**
 * Markers describing one ShiftWeb page layout.
 * Selectors are CSS selectors understood by cheerio.
 */
export interface ExtractorConfig {
  headingSelector: string
  tableSelector: string
  dateCellSelector: string
  shopCellSelector: string
  timeCellSelector: string
  /** Character that marks a worked time cell, e.g. "●10:00-19:00" */
  workedMarker: string
  rangeSeparator: string
  /** Title given to every extracted record */
  title: string
  overnight: OvernightPolicy
}

export const DEFAULT_SHIFT_TITLE = 'バイト'

export const DEFAULT_EXTRACTOR_CONFIG: Readonly<ExtractorConfig> = {
  headingSelector: 'h3.btn-block',
  tableSelector: 'table#shiftTable',
  dateCellSelector: 'td.shiftDate',
  shopCellSelector: 'td.shiftMisName',
  timeCellSelector: 'td.shiftTime',
  workedMarker: '●',
  rangeSeparator: '-',
  title: DEFAULT_SHIFT_TITLE,
  overnight: 'next-day',
}
