import { isBefore } from 'date-fns';
import { getTimezoneOffset } from 'date-fns-tz';
import {
  DEFAULT_DURATION_MAX_UNITS,
  DEFAULT_MAX_UNITS,
  INFRACTION_FORMAT_OPTIONS,
  type TimeUnit,
} from '@chatclock/shared';
import { absoluteDelta, relativeDelta } from './calendar-delta';
import { humanizeDelta } from './humanize';
import {
  TimestampParseError,
  isoTimestampOffset,
  parseIsoTimestamp,
  truncateMilliseconds,
} from './timestamp';

const infractionFormatter = new Intl.DateTimeFormat('en-US', INFRACTION_FORMAT_OPTIONS);

/**
 * Render an ISO-8601 timestamp as "YYYY-MM-DD HH:MM" on the wall clock of
 * its own offset: "2019-12-12T02:01:30+02:00" renders "2019-12-12 02:01".
 *
 * The offset is applied to the instant and the result formatted in UTC,
 * so the host time zone plays no part.
 */
function renderInfraction(timestamp: string, parsed: Date): string {
  const offsetMs = getTimezoneOffset(isoTimestampOffset(timestamp), parsed);
  if (Number.isNaN(offsetMs)) {
    throw new TimestampParseError(timestamp, 'ISO-8601');
  }

  const parts = infractionFormatter.formatToParts(new Date(parsed.getTime() + offsetMs));
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}`;
}

/**
 * Describe how long ago a date was, e.g. "3 hours and 2 minutes ago".
 *
 * The delta is always taken as an absolute value, so a future date
 * reads "... ago" as well.
 */
export function timeSince(
  past: Date,
  precision: TimeUnit = 'seconds',
  maxUnits: number = DEFAULT_MAX_UNITS,
  now: Date = new Date()
): string {
  const delta = absoluteDelta(relativeDelta(now, past));
  return `${humanizeDelta(delta, precision, maxUnits)} ago`;
}

/**
 * Format an ISO-8601 infraction timestamp as "YYYY-MM-DD HH:MM" in the
 * offset it was written with (UTC when it has none)
 */
export function formatInfraction(timestamp: string): string {
  return renderInfraction(timestamp, parseIsoTimestamp(timestamp));
}

/**
 * Format `dateTo` with the humanized duration from `dateFrom` to it,
 * e.g. "2019-12-12 00:01 (1 day and 12 hours)".
 *
 * @param dateTo - ISO-8601 timestamp; empty values yield null
 * @param dateFrom - Start of the duration (default: now)
 * @param maxUnits - Maximum number of unit phrases in the duration
 * @param absolute - Drop the sign so a past `dateTo` still reads as a positive duration
 */
export function formatInfractionWithDuration(
  dateTo: string | null | undefined,
  dateFrom: Date = new Date(),
  maxUnits: number = DEFAULT_DURATION_MAX_UNITS,
  absolute = true
): string | null {
  if (!dateTo) {
    return null;
  }

  const parsed = parseIsoTimestamp(dateTo);
  const formatted = renderInfraction(dateTo, parsed);
  const end = truncateMilliseconds(parsed);

  const delta = relativeDelta(end, dateFrom);
  const duration = humanizeDelta(absolute ? absoluteDelta(delta) : delta, 'seconds', maxUnits);

  return `${formatted} (${duration})`;
}

/**
 * Remaining time until an infraction expires, e.g. "2 days and 4 hours".
 * Returns null when there is no expiry or it has already passed.
 *
 * @param expiry - ISO-8601 expiry timestamp
 * @param now - Reference time (default: now)
 * @param maxUnits - Maximum number of unit phrases
 */
export function untilExpiration(
  expiry: string | null | undefined,
  now: Date = new Date(),
  maxUnits: number = DEFAULT_DURATION_MAX_UNITS
): string | null {
  if (!expiry) {
    return null;
  }

  const expiresAt = truncateMilliseconds(parseIsoTimestamp(expiry));
  if (isBefore(expiresAt, now)) {
    return null;
  }

  return humanizeDelta(relativeDelta(expiresAt, now), 'seconds', maxUnits);
}
