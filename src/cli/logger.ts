/**
 * pino logger for the mua-codec CLI
 *
 * Writes to stderr so stdout carries only command output.
 */

import pino from 'pino';
import type { LogLevel } from './config.js';

export type Logger = pino.Logger;

export function createLogger(level: LogLevel): Logger {
  return pino(
    {
      name: 'mua-codec',
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true })
  );
}
