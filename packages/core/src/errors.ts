/**
 * Error Taxonomy
 *
 * Extraction errors are all-or-nothing: a MarkupStructureError or
 * DateParseError aborts the whole page. SyncEventError is never thrown by
 * the engine; it is collected in the SyncReport while the batch continues.
 */

export type ShiftSyncErrorCode =
  | 'MARKUP_STRUCTURE'
  | 'DATE_PARSE'
  | 'TRANSPORT'
  | 'SYNC_EVENT'
  | 'INSECURE_TRANSPORT'
  | 'CONFIG'

export abstract class ShiftSyncError extends Error {
  abstract readonly code: ShiftSyncErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Expected heading/table structure is missing from the schedule page */
export class MarkupStructureError extends ShiftSyncError {
  readonly code = 'MARKUP_STRUCTURE' as const
}

/** A worked row carries date or time text outside the known grammar */
export class DateParseError extends ShiftSyncError {
  readonly code = 'DATE_PARSE' as const

  constructor(
    message: string,
    readonly text: string,
  ) {
    super(`${message}: ${JSON.stringify(text)}`)
  }
}

/** Network or HTTP failure while talking to ShiftWeb or during CalDAV discovery */
export class TransportError extends ShiftSyncError {
  readonly code = 'TRANSPORT' as const

  constructor(
    message: string,
    readonly url?: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** One event's upsert did not succeed */
export class SyncEventError extends ShiftSyncError {
  readonly code = 'SYNC_EVENT' as const

  constructor(
    readonly url: string,
    readonly status: number | null,
    readonly body: string,
    options?: { cause?: unknown },
  ) {
    super(
      status === null ? `PUT ${url} failed: ${body}` : `PUT ${url} status=${status} body=${body}`,
      options,
    )
  }
}

export class InsecureTransportError extends ShiftSyncError {
  readonly code = 'INSECURE_TRANSPORT' as const

  constructor(readonly url: string) {
    super(`Calendar collection must use https: ${url}`)
  }
}

export class ConfigError extends ShiftSyncError {
  readonly code = 'CONFIG' as const
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
