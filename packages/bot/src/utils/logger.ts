import pino from 'pino';
import { config, type Config } from '../config';

/**
 * Pino options for a configuration: level names as labels, ISO timestamps,
 * and pino-pretty when pretty logs are on
 */
export const buildLoggerOptions = (
  options: Pick<Config, 'logLevel' | 'prettyLogs'>
): pino.LoggerOptions => ({
  level: options.logLevel,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(options.prettyLogs && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

/**
 * Root logger of the bot
 */
export const logger = pino(buildLoggerOptions(config));

/**
 * Create child logger with additional context
 */
export const createChildLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

/**
 * Logger of the time utilities (parse failures, waits)
 */
export const timeLogger = createChildLogger({ service: 'time' });
