export type { ShiftRecord, ExtractorConfig, OvernightPolicy } from './types.js'
export { DEFAULT_EXTRACTOR_CONFIG, DEFAULT_SHIFT_TITLE, FLOATING_ZONE } from './types.js'
export {
  extractShifts,
  parseHeadingYearMonth,
  resolvePageMonth,
  parseDateCell,
  parseClock,
  splitTimeCell,
} from './extractor.js'
export type { ExtractOptions, YearMonth } from './extractor.js'
export { shiftIdentity } from './identity.js'
export { encodeEvent, encodeCalendar, escapeICalText } from './ics.js'
