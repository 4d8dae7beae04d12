/**
 * Environment configuration for the mua-codec CLI
 */

import { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const schema = z.object({
  MUA_TIME_ZONE: z
    .string()
    .refine(isValidTimeZone, { message: 'Unknown IANA time zone' })
    .default('Europe/Rome'),
  MUA_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface CliConfig {
  /** Zone dates are written in (date-encode, message-encode) */
  timeZone: string;
  logLevel: LogLevel;
}

/**
 * Reads the CLI configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Result<CliConfig> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    return err(new ValidationError(`Invalid ${field}: ${issue.message}`, field));
  }
  return ok({
    timeZone: parsed.data.MUA_TIME_ZONE,
    logLevel: parsed.data.MUA_LOG_LEVEL,
  });
}
