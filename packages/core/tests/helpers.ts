import { DateTime } from 'luxon'
import { FLOATING_ZONE, type ShiftRecord } from '../src/shifts/types.js'

export interface Row {
  date?: string
  shop?: string
  time?: string
}

/**
 * A ShiftWeb month page. Cells left undefined are omitted from the row.
 */
export function shiftPage(rows: Row[], heading: string | null = '2025年11月の確定シフト'): string {
  const body = rows
    .map((row) => {
      const cells = [
        row.date === undefined ? '' : `<td class="shiftDate">${row.date}</td>`,
        row.shop === undefined ? '' : `<td class="shiftMisName">${row.shop}</td>`,
        row.time === undefined ? '' : `<td class="shiftTime">${row.time}</td>`,
      ]
      return `<tr>${cells.join('')}</tr>`
    })
    .join('\n')

  return `<!DOCTYPE html>
<html>
<body>
${heading === null ? '' : `<h3 class="btn-block">${heading}</h3>`}
<table id="shiftTable">
<tr><th>日付</th><th>店舗</th><th>時間</th></tr>
${body}
</table>
</body>
</html>`
}

export function at(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: FLOATING_ZONE })
}

export function shift(overrides: Partial<ShiftRecord> = {}): ShiftRecord {
  return {
    title: 'バイト',
    start: at('2025-11-04T14:30'),
    end: at('2025-11-04T19:45'),
    location: 'Shibuya',
    memo: '',
    ...overrides,
  }
}

export const MINUTE_FORMAT = "yyyy-MM-dd'T'HH:mm"
