/**
 * Time Utilities
 *
 * Humanized deltas, infraction timestamp formatting and deadline waits.
 */

export { addUtcMonths, relativeDelta, absoluteDelta } from './calendar-delta';
export { stringifyTimeUnit, humanizeDelta } from './humanize';
export {
  parseRfc1123,
  parseIsoTimestamp,
  isoTimestampOffset,
  truncateMilliseconds,
  TimestampParseError,
} from './timestamp';
export {
  timeSince,
  formatInfraction,
  formatInfractionWithDuration,
  untilExpiration,
} from './format';
export { sleep, waitUntil } from './wait-until';
