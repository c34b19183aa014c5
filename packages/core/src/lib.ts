// Public API for consumption by other packages

export type { ShiftRecord, ExtractorConfig, OvernightPolicy } from './shifts/index.js'
export {
  DEFAULT_EXTRACTOR_CONFIG,
  DEFAULT_SHIFT_TITLE,
  FLOATING_ZONE,
  extractShifts,
  parseHeadingYearMonth,
  resolvePageMonth,
  parseDateCell,
  parseClock,
  splitTimeCell,
  shiftIdentity,
  encodeEvent,
  encodeCalendar,
  escapeICalText,
} from './shifts/index.js'
export type { ExtractOptions, YearMonth } from './shifts/index.js'

export {
  syncShifts,
  eventUrl,
  createCalDAVWriter,
  discoverCalendars,
  createCalendar,
  CALENDAR_CONTENT_TYPE,
  DEFAULT_CALDAV_SERVER,
} from './calendar/index.js'
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
  SyncOptions,
} from './calendar/index.js'

export {
  ShiftWebClient,
  DEFAULT_SHIFTWEB_URL,
  buildMonthRange,
  parseYearMonth,
  formatYearMonth,
  addMonths,
  compareYearMonth,
  MAX_MONTHS,
} from './source/index.js'
export type { ShiftWebClientOptions } from './source/index.js'

export { collectShifts, sortByStart, formatShiftLine, formatReport } from './pipeline.js'
export type { MonthPageSource, MonthShifts } from './pipeline.js'

export {
  loadConfig,
  parseConfig,
  loadSecrets,
  requireSecret,
  saveCalendarUrl,
  findConfigDir,
  configPath,
} from './config.js'
export type { ShiftSyncConfig, ShiftSyncSecrets } from './config.js'

export { createLogger, silentLogger } from './logger.js'
export type { Logger, LoggerOptions } from './logger.js'

export {
  ShiftSyncError,
  MarkupStructureError,
  DateParseError,
  TransportError,
  SyncEventError,
  InsecureTransportError,
  ConfigError,
} from './errors.js'
export type { ShiftSyncErrorCode } from './errors.js'
