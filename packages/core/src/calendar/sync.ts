/**
 * Synchronization Engine
 *
 * Publishes ShiftRecords as one calendar object each, at a URL derived
 * from the shift's identity. PUT to the same URL overwrites, so re-running
 * a sync never duplicates events and needs no lookup of what already
 * exists remotely.
 *
 * Records are written strictly one after another. A failed event is
 * recorded in the report and the batch carries on.
 */

import type { Logger } from 'pino'
import { InsecureTransportError, SyncEventError, errorMessage } from '../errors.js'
import { silentLogger } from '../logger.js'
import { encodeEvent } from '../shifts/ics.js'
import { shiftIdentity } from '../shifts/identity.js'
import type { ShiftRecord } from '../shifts/types.js'
import { createCalDAVWriter } from './caldav-client.js'
import type { CalendarTarget, CalendarWriter, SyncReport } from './types.js'

export const CALENDAR_CONTENT_TYPE = 'text/calendar; charset=utf-8'

const SUCCESS_STATUSES = new Set([200, 201, 204])
const MAX_BODY_LENGTH = 200

export interface SyncOptions {
  writer?: CalendarWriter
  logger?: Logger
}

/**
 * `<collection>/<identity>.ics`, tolerating a trailing slash on the collection
 */
export function eventUrl(collectionUrl: string, identity: string): string {
  return `${collectionUrl.replace(/\/+$/, '')}/${identity}.ics`
}

function truncate(text: string): string {
  return text.length > MAX_BODY_LENGTH ? `${text.slice(0, MAX_BODY_LENGTH)}…` : text
}

/**
 * Upsert every record into the target collection.
 *
 * @throws InsecureTransportError when the collection URL is not https
 */
export async function syncShifts(
  records: readonly ShiftRecord[],
  target: CalendarTarget,
  options: SyncOptions = {},
): Promise<SyncReport> {
  if (!target.collectionUrl.startsWith('https://')) {
    throw new InsecureTransportError(target.collectionUrl)
  }

  const writer = options.writer ?? createCalDAVWriter()
  const log = (options.logger ?? silentLogger).child({ component: 'sync' })
  const report: SyncReport = { total: records.length, succeeded: [], failed: [] }

  for (const record of records) {
    const identity = shiftIdentity(record)
    const url = eventUrl(target.collectionUrl, identity)
    const payload = encodeEvent(record, identity)

    log.debug({ url }, 'PUT')
    try {
      const result = await writer.put(url, payload, {
        contentType: CALENDAR_CONTENT_TYPE,
        credentials: target.credentials,
      })
      if (SUCCESS_STATUSES.has(result.status)) {
        report.succeeded.push({ identity, url, status: result.status })
        log.info({ url, status: result.status }, 'Event synced')
      } else {
        const failure = new SyncEventError(url, result.status, truncate(result.body))
        report.failed.push(failure)
        log.warn({ url, status: result.status }, failure.message)
      }
    } catch (err) {
      const failure = new SyncEventError(url, null, truncate(errorMessage(err)), { cause: err })
      report.failed.push(failure)
      log.warn({ url, err }, failure.message)
    }
  }

  return report
}
