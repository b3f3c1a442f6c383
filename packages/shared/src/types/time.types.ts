/**
 * Calendar delta types
 */

/**
 * Units a delta is broken into, from coarsest to finest.
 * The plural label doubles as the precision name.
 */
export const TIME_UNITS = ['years', 'months', 'days', 'hours', 'minutes', 'seconds'] as const

export type TimeUnit = (typeof TIME_UNITS)[number]

/**
 * Calendar-aware difference between two instants.
 *
 * Fields are independent of each other: 45 days stay 45 days and are never
 * folded into months, since month lengths vary.
 */
export type CalendarDelta = Record<TimeUnit, number>

export interface HumanizeOptions {
  precision: TimeUnit
  maxUnits: number
}
