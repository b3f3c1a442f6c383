import {
  DEFAULT_MAX_UNITS,
  TIME_UNITS,
  humanizeOptionsSchema,
  type CalendarDelta,
  type TimeUnit,
} from '@chatclock/shared';
import { parseOrThrow } from '../validation';

/**
 * Render a count with the right form of its unit
 *
 * @example
 * stringifyTimeUnit(1, 'seconds')  // "1 second"
 * stringifyTimeUnit(24, 'hours')   // "24 hours"
 * stringifyTimeUnit(0, 'minutes')  // "less than a minute"
 */
export function stringifyTimeUnit(value: number, unit: TimeUnit): string {
  const singular = unit.slice(0, -1);

  if (unit === 'seconds' && value === 0) {
    return '0 seconds';
  }
  if (value === 1) {
    return `${value} ${singular}`;
  }
  if (value === 0) {
    return `less than a ${singular}`;
  }
  return `${value} ${unit}`;
}

/**
 * Human-readable version of a calendar delta, e.g. "2 days and 3 hours".
 *
 * Units are walked from years down. Zero units are skipped. The walk stops at
 * `precision` (even when that unit was zero) or once `maxUnits` phrases have
 * been collected, whichever comes first. An empty result falls back to the
 * zero phrase for `precision`.
 *
 * @param delta - Delta to describe; missing fields count as zero
 * @param precision - Finest unit to include
 * @param maxUnits - Maximum number of unit phrases
 * @throws ValidationError if maxUnits is not a positive integer
 */
export function humanizeDelta(
  delta: Partial<CalendarDelta>,
  precision: TimeUnit = 'seconds',
  maxUnits: number = DEFAULT_MAX_UNITS
): string {
  const options = parseOrThrow(humanizeOptionsSchema, { precision, maxUnits });

  const phrases: string[] = [];
  for (const unit of TIME_UNITS) {
    const value = delta[unit] ?? 0;
    if (value) {
      phrases.push(stringifyTimeUnit(value, unit));
    }

    if (unit === options.precision || phrases.length >= options.maxUnits) {
      break;
    }
  }

  // Join the last two with "and": "a, b and c"
  if (phrases.length > 1) {
    phrases.push(phrases.splice(-2, 2).join(' and '));
  }

  if (phrases.length === 0) {
    return stringifyTimeUnit(0, options.precision);
  }
  return phrases.join(', ');
}
