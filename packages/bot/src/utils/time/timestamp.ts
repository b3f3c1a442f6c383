import { isValid, setMilliseconds } from 'date-fns';
import { toDate } from 'date-fns-tz';
import { DISPLAY_TIME_ZONE, MONTH_ABBREVIATIONS, RFC1123_PATTERN } from '@chatclock/shared';
import { timeLogger } from '../logger';

/**
 * Raised when a timestamp string does not match the expected format
 */
export class TimestampParseError extends Error {
  public readonly input: string;
  public readonly format: string;

  constructor(input: string, format: string) {
    super(`Invalid ${format} timestamp: "${input}"`);
    this.name = 'TimestampParseError';
    this.input = input;
    this.format = format;
  }
}

/**
 * Parse an RFC 1123 string (e.g. "Thu, 12 Dec 2019 00:01:00 GMT") into a UTC Date
 *
 * @param stamp - RFC 1123 date string
 * @returns Parsed date
 * @throws TimestampParseError if the string does not match the format
 */
export function parseRfc1123(stamp: string): Date {
  const match = stamp.match(RFC1123_PATTERN);
  const monthIndex = MONTH_ABBREVIATIONS.findIndex((name) => name === match?.[2]);

  if (!match || monthIndex === -1) {
    timeLogger.debug({ stamp, format: 'RFC 1123' }, 'Failed to parse timestamp');
    throw new TimestampParseError(stamp, 'RFC 1123');
  }

  const day = match[1] ?? '';
  const year = match[3] ?? '';
  const month = String(monthIndex + 1).padStart(2, '0');
  const time = `${match[4] ?? ''}:${match[5] ?? ''}:${match[6] ?? ''}`;

  // Fields are UTC; rebuilding them as ISO keeps the host zone out of the parse
  const date = toDate(`${year}-${month}-${day}T${time}Z`);

  if (!isValid(date) || date.getUTCDate() !== Number(day)) {
    timeLogger.debug({ stamp, format: 'RFC 1123' }, 'Failed to parse timestamp');
    throw new TimestampParseError(stamp, 'RFC 1123');
  }

  return date;
}

/**
 * Parse an ISO-8601 string into a Date.
 * Strings without an offset are read as UTC.
 *
 * @param stamp - ISO-8601 date string
 * @returns Parsed date
 * @throws TimestampParseError if the string is not ISO-8601
 */
export function parseIsoTimestamp(stamp: string): Date {
  const date = toDate(stamp, { timeZone: DISPLAY_TIME_ZONE });

  if (!isValid(date)) {
    timeLogger.debug({ stamp, format: 'ISO-8601' }, 'Failed to parse timestamp');
    throw new TimestampParseError(stamp, 'ISO-8601');
  }

  return date;
}

const ISO_OFFSET_PATTERN = /[T ]\d{2}(?::?\d{2}){0,2}(?:[.,]\d+)?(Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * The UTC offset written in an ISO-8601 string ("+02:00", "Z"), or
 * DISPLAY_TIME_ZONE when the string has none
 */
export function isoTimestampOffset(stamp: string): string {
  return stamp.trim().match(ISO_OFFSET_PATTERN)?.[1]?.toUpperCase() ?? DISPLAY_TIME_ZONE;
}

/**
 * Drop the sub-second component of a date
 */
export function truncateMilliseconds(date: Date): Date {
  return setMilliseconds(date, 0);
}
