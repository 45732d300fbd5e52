// src/lib/logger.ts
import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Build the application logger.
 * Development gets pino-pretty output; everything else logs JSON.
 */
export function createLogger(
  level: string = process.env.LOG_LEVEL || 'info',
  nodeEnv: string = process.env.NODE_ENV || 'development'
): Logger {
  const options: LoggerOptions =
    nodeEnv === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  return pino(options);
}

/**
 * Logger that drops everything (used as the default in library code and tests)
 */
export const silentLogger: Logger = pino({ level: 'silent' });
