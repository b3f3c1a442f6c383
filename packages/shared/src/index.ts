/**
 * @chatclock/shared
 * Shared types, schemas, and constants for the chat-bot time utilities
 */

// Export all time types
export type {
  TimeUnit,
  CalendarDelta,
  HumanizeOptions,
} from './types/time.types'

export { TIME_UNITS } from './types/time.types'

// Export all schemas
export {
  timeUnitSchema,
  humanizeOptionsSchema,
  type HumanizeOptionsInput,
} from './schemas/humanize.schema'

// Export all constants
export {
  MONTH_ABBREVIATIONS,
  RFC1123_PATTERN,
  INFRACTION_FORMAT_OPTIONS,
  DISPLAY_TIME_ZONE,
  DEFAULT_MAX_UNITS,
  DEFAULT_DURATION_MAX_UNITS,
  WAIT_THRESHOLD_MS,
  MAX_TIMER_DELAY_MS,
} from './constants'
