/**
 * Calendar Types
 *
 * Remote side of the sync: where shifts are written and what came back.
 */

import type { SyncEventError } from '../errors.js'

/**
 * Credentials for CalDAV authentication (account id + app-specific password).
 * Opaque to the sync engine: passed through to the writer, never stored.
 */
export interface CalendarCredentials {
  username: string
  password: string
}

/** A calendar collection to publish shifts into */
export interface CalendarTarget {
  /** Collection URL, must be https */
  collectionUrl: string
  credentials: CalendarCredentials
}

export interface PutOptions {
  contentType: string
  credentials: CalendarCredentials
}

export interface PutResult {
  status: number
  body: string
}

/**
 * Writes one calendar object. PUT semantics: creates the resource or
 * overwrites it in place.
 */
export interface CalendarWriter {
  put(url: string, body: string, options: PutOptions): Promise<PutResult>
}

/** A calendar collection found during discovery */
export interface CalendarInfo {
  displayName: string
  url: string
}

export interface DiscoveryResult {
  principalUrl: string
  homeUrl: string
  calendars: CalendarInfo[]
}

export interface SyncedEvent {
  identity: string
  url: string
  /** 200, 201 or 204 */
  status: number
}

/** Outcome of one sync batch */
export interface SyncReport {
  total: number
  succeeded: SyncedEvent[]
  failed: SyncEventError[]
}
