/**
 * Month abbreviations used by RFC 1123 dates, January first
 */
export const MONTH_ABBREVIATIONS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const

/**
 * RFC 1123 date as sent in HTTP headers: "Thu, 12 Dec 2019 00:01:00 GMT"
 * (strftime "%a, %d %b %Y %H:%M:%S GMT")
 */
export const RFC1123_PATTERN =
  /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun), (\d{2}) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/

/**
 * Display fields for infraction timestamps, rendered as "YYYY-MM-DD HH:MM"
 */
export const INFRACTION_FORMAT_OPTIONS: Readonly<Intl.DateTimeFormatOptions> = {
  timeZone: 'UTC',
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  hourCycle: 'h23',
}

/**
 * Zone of timestamps that carry no offset of their own
 */
export const DISPLAY_TIME_ZONE = 'UTC'

/**
 * Maximum number of unit phrases in a humanized delta
 */
export const DEFAULT_MAX_UNITS = 6

/**
 * Unit cap used for infraction durations and expirations
 */
export const DEFAULT_DURATION_MAX_UNITS = 2

/**
 * Waits at or below this delay return at once, so clock jitter
 * does not turn into rapid-fire re-checks (in milliseconds)
 * @default 1 second
 */
export const WAIT_THRESHOLD_MS = 1000

/**
 * Longest delay a single Node.js timer accepts (in milliseconds)
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647
