/**
 * Logger factory.
 *
 * Logs go to stderr so that stdout carries only command output.
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'partition-distance', level }, pino.destination(2));
}

/**
 * Logger used when the caller does not pass one.
 */
export const silentLogger: Logger = pino({ level: 'silent' });
