import dotenv from 'dotenv'
import { z } from 'zod'

// Load environment variables
dotenv.config()

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Parse a boolean flag such as PRETTY_LOGS=false
 */
const parseFlag = (value: string | undefined): boolean | undefined => {
  if (value === undefined || value === '') {
    return undefined
  }
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase())
}

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(LOG_LEVELS).optional(),
  prettyLogs: z.boolean().optional(),
})

export interface Config {
  nodeEnv: 'development' | 'production' | 'test'
  logLevel: LogLevel
  prettyLogs: boolean
}

/**
 * Load and validate configuration from environment variables
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const rawConfig = {
    nodeEnv: env['NODE_ENV'] || undefined,
    logLevel: env['LOG_LEVEL']?.toLowerCase() || undefined,
    prettyLogs: parseFlag(env['PRETTY_LOGS']),
  }

  try {
    const validated = configSchema.parse(rawConfig)
    const production = validated.nodeEnv === 'production'

    return {
      nodeEnv: validated.nodeEnv,
      logLevel: validated.logLevel ?? (production ? 'info' : 'debug'),
      // pino-pretty runs in a worker thread; only development gets it by default
      prettyLogs: validated.prettyLogs ?? validated.nodeEnv === 'development',
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('[Config] Validation failed:')
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`)
      })
      throw new Error('Configuration validation failed')
    }
    throw error
  }
}

/**
 * Export singleton configuration instance
 */
export const config = loadConfig()

