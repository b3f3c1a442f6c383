import { z } from 'zod'
import { TIME_UNITS } from '../types/time.types'
import { DEFAULT_MAX_UNITS } from '../constants'

/**
 * Zod schema for a precision unit
 */
export const timeUnitSchema = z.enum(TIME_UNITS)

/**
 * Zod schema for humanize options
 */
export const humanizeOptionsSchema = z.object({
  precision: timeUnitSchema.default('seconds'),
  maxUnits: z
    .number()
    .int('maxUnits must be an integer')
    .positive('maxUnits must be positive')
    .default(DEFAULT_MAX_UNITS),
})

/**
 * TypeScript type inferred from the schema
 */
export type HumanizeOptionsInput = z.input<typeof humanizeOptionsSchema>
