/**
 * Logger for errstack, built on pino
 *
 * Output goes to stderr unless a destination is given. The core never
 * logs on its own; callers log chains at their boundaries.
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import type { ErrorChain, ErrorStacks } from './contract.js';
import { DEFAULT_LOGGER_NAME, type LogLevel } from './schemas.js';

export type { Logger } from 'pino';

export type LoggerOptions = {
  level?: LogLevel;
  name?: string;
  destination?: DestinationStream;
};

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? DEFAULT_LOGGER_NAME,
    level: options.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: [
        'password',
        'token',
        'apiKey',
        'secret',
        'authorization',
        '*.password',
        '*.token',
        '*.apiKey',
        '*.secret',
        '*.authorization',
        'headers.authorization',
        'headers.cookie'
      ],
      censor: '[REDACTED]'
    }
  };

  return pino(baseOptions, options.destination ?? pino.destination(2));
}

/**
 * Create a logger that writes nothing
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

type LoggableError = ErrorChain & Pick<ErrorStacks<unknown, unknown>, 'code' | 'uri'>;

/**
 * Log a chain at error level with its code, URI and messages (root first)
 */
export function logStackError(logger: Logger, error: LoggableError, msg = 'stack error'): void {
  logger.error(
    {
      code: error.code,
      uri: error.uri,
      chain: error.messages()
    },
    msg
  );
}
