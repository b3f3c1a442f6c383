/**
 * Tests for logger options
 *
 * Tests for:
 * - Level and formatters from configuration
 * - pino-pretty transport only when pretty logs are on
 */

import type * as LoggerModule from '../logger';

const { buildLoggerOptions } = jest.requireActual<typeof LoggerModule>('../logger');

describe('buildLoggerOptions', () => {
  it('should use the configured level and label levels by name', () => {
    const options = buildLoggerOptions({ logLevel: 'warn', prettyLogs: false });

    expect(options.level).toBe('warn');
    expect(options.formatters?.level?.('info', 30)).toEqual({ level: 'info' });
  });

  it('should write plain JSON when pretty logs are off', () => {
    expect(buildLoggerOptions({ logLevel: 'info', prettyLogs: false }).transport).toBeUndefined();
  });

  it('should route through pino-pretty when pretty logs are on', () => {
    const options = buildLoggerOptions({ logLevel: 'debug', prettyLogs: true });

    expect(options.transport).toEqual({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  });
});
