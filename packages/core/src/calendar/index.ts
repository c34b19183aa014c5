/**
 * Calendar System
 *
 * CalDAV publishing of shift records, plus discovery of the target
 * calendar collection.
 */

// Types
export type {
  CalendarCredentials,
  CalendarTarget,
  CalendarWriter,
  PutOptions,
  PutResult,
  CalendarInfo,
  DiscoveryResult,
  SyncedEvent,
  SyncReport,
} from './types.js'

// Implementation
export {
  createCalDAVWriter,
  discoverCalendars,
  createCalendar,
  DEFAULT_CALDAV_SERVER,
} from './caldav-client.js'
export { syncShifts, eventUrl, CALENDAR_CONTENT_TYPE } from './sync.js'
export type { SyncOptions } from './sync.js'
