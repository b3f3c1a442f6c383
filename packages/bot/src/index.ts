/**
 * @chatclock/bot
 * Time formatting and scheduling helpers for the chat bot
 */

export {
  addUtcMonths,
  relativeDelta,
  absoluteDelta,
  stringifyTimeUnit,
  humanizeDelta,
  parseRfc1123,
  parseIsoTimestamp,
  isoTimestampOffset,
  truncateMilliseconds,
  TimestampParseError,
  timeSince,
  formatInfraction,
  formatInfractionWithDuration,
  untilExpiration,
  sleep,
  waitUntil,
} from './utils/time';

export { ValidationError, parseOrThrow } from './utils/validation';
export { logger, createChildLogger, buildLoggerOptions } from './utils/logger';
export { config, loadConfig, type Config, type LogLevel } from './config';
