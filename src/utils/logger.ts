/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../config.js';

export type { Logger } from 'pino';

/**
 * Create a logger at the given level. Pretty-printed outside production.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name: 'snowcache',
    level,
    transport:
      process.env.NODE_ENV !== 'production'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}

/**
 * Logger that discards everything.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
