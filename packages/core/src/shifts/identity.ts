import { createHash } from 'node:crypto'
import type { ShiftRecord } from './types.js'

const HASH_LENGTH = 8

/**
 * Deterministic identifier for a shift, used both as the iCalendar UID and
 * as the resource name under the calendar collection.
 *
 * Depends only on start, end (minute precision) and location, so the same
 * shift always lands on the same resource, e.g.
 * "shift-20251104-1430-1945-3f2a9c1b".
 */
export function shiftIdentity(record: Pick<ShiftRecord, 'start' | 'end' | 'location'>): string {
  const { start, end, location } = record
  const key = `${start.toFormat("yyyyMMdd'T'HHmm")}-${end.toFormat("yyyyMMdd'T'HHmm")}-${location}`
  const hash = createHash('sha1').update(key, 'utf8').digest('hex').slice(0, HASH_LENGTH)
  return `shift-${start.toFormat('yyyyMMdd')}-${start.toFormat('HHmm')}-${end.toFormat('HHmm')}-${hash}`
}
