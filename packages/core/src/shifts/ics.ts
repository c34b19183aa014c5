/**
 * Event Encoder
 *
 * Renders ShiftRecords as iCalendar text. Times are floating (no TZID, no
 * "Z"), so calendar clients show them in the viewer's own timezone.
 */

import type { DateTime } from 'luxon'
import { shiftIdentity } from './identity.js'
import type { ShiftRecord } from './types.js'

const CRLF = '\r\n'
const PRODID = '-//Shift Sync//JP'
const MAX_LINE_OCTETS = 75

function formatDateTime(dt: DateTime): string {
  return dt.toFormat("yyyyMMdd'T'HHmmss")
}

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n')
}

/**
 * Fold a content line at 75 octets; continuation lines start with a space.
 * Never splits a multi-byte character.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) return line

  const parts: string[] = []
  let current = ''
  let size = 0
  let limit = MAX_LINE_OCTETS
  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8')
    if (size + octets > limit) {
      parts.push(current)
      current = ''
      size = 0
      // Leading space of the continuation line counts
      limit = MAX_LINE_OCTETS - 1
    }
    current += char
    size += octets
  }
  parts.push(current)
  return parts.join(`${CRLF} `)
}

function eventLines(record: ShiftRecord, uid: string): string[] {
  const lines = [
    'BEGIN:VEVENT',
    `UID:${uid}`,
    // Fixed per shift: re-encoding yields the same bytes
    `DTSTAMP:${formatDateTime(record.start)}Z`,
    `DTSTART:${formatDateTime(record.start)}`,
    `DTEND:${formatDateTime(record.end)}`,
    `SUMMARY:${escapeICalText(record.title)}`,
  ]
  if (record.location) {
    lines.push(`LOCATION:${escapeICalText(record.location)}`)
  }
  if (record.memo) {
    lines.push(`DESCRIPTION:${escapeICalText(record.memo)}`)
  }
  lines.push('END:VEVENT')
  return lines
}

function wrap(events: string[][]): string {
  const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${PRODID}`, ...events.flat(), 'END:VCALENDAR']
  return lines.map((line) => foldLine(line) + CRLF).join('')
}

/**
 * Single calendar object holding one event, as stored at
 * `<collection>/<uid>.ics`.
 */
export function encodeEvent(record: ShiftRecord, uid: string): string {
  return wrap([eventLines(record, uid)])
}

/**
 * One calendar document holding every record, e.g. for an .ics export.
 */
export function encodeCalendar(records: readonly ShiftRecord[]): string {
  return wrap(records.map((record) => eventLines(record, shiftIdentity(record))))
}
