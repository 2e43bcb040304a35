/**
 * Process-wide pino logger. Services take a child bound to their component.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  readonly level: LevelWithSilent;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    base: { service: 'stream-keeper' },
    redact: {
      paths: ['req.headers.authorization', 'key'],
      censor: '[REDACTED]'
    }
  });
}

/**
 * Logger for tests and for code paths that must stay quiet
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
