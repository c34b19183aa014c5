export { ShiftWebClient, DEFAULT_SHIFTWEB_URL } from './shiftweb-client.js'
export type { ShiftWebClientOptions } from './shiftweb-client.js'
export {
  buildMonthRange,
  parseYearMonth,
  formatYearMonth,
  addMonths,
  compareYearMonth,
  MAX_MONTHS,
} from './months.js'
