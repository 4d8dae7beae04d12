#!/usr/bin/env node

/**
 * mua-codec CLI
 *
 * Reads one value from stdin, encodes or decodes it, and prints the result.
 *
 * Usage:
 *   mua-codec address-encode < address.txt
 *   mua-codec date-encode --zone Europe/Rome <<< "2020 12 3"
 *   mua-codec message-decode < stored.eml
 */

import { text } from 'node:stream/consumers';
import { Command } from 'commander';
import { COMMANDS, type CommandContext, type CommandDefinition } from './commands.js';
import { loadConfig, isValidTimeZone } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { decodeDate, nowInZone } from '../mime/date-codec.js';
import { ValidationError } from '../types/errors.js';
import { ok, err, unwrap, type Result } from '../types/result.js';

interface GlobalOptions {
  zone?: string;
  date?: string;
  verbose?: boolean;
}

function buildContext(options: GlobalOptions, defaultZone: string): Result<CommandContext> {
  const timeZone = options.zone ?? defaultZone;
  if (!isValidTimeZone(timeZone)) {
    return err(new ValidationError(`Unknown IANA time zone "${timeZone}"`, 'zone'));
  }
  if (options.date === undefined) {
    return ok({ timeZone, date: nowInZone(timeZone) });
  }
  const date = decodeDate(options.date);
  if (!date.ok) return date;
  return ok({ timeZone, date: date.value });
}

async function runCommand(
  definition: CommandDefinition,
  options: GlobalOptions,
  defaultZone: string,
  logger: Logger
): Promise<void> {
  if (options.verbose) {
    logger.level = 'debug';
  }
  const context = buildContext(options, defaultZone);
  if (!context.ok) {
    logger.error({ code: context.error.code }, context.error.message);
    process.exitCode = 1;
    return;
  }

  const input = await text(process.stdin);
  logger.debug({ command: definition.name, bytes: input.length, timeZone: context.value.timeZone }, 'Dispatching');

  const result = definition.run(input, context.value);
  if (!result.ok) {
    logger.error({ command: definition.name, code: result.error.code }, result.error.message);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`${result.value}\n`);
}

async function main(): Promise<void> {
  const config = unwrap(loadConfig());
  const logger = createLogger(config.logLevel);

  const program = new Command();
  program
    .name('mua-codec')
    .description('Encode and decode the parts of a mail user agent message')
    .version('1.0.0')
    .option('-z, --zone <zone>', 'IANA time zone for new dates', config.timeZone)
    .option('-d, --date <date>', 'RFC 1123 date stamped on composed messages (default: now)')
    .option('-v, --verbose', 'Log at debug level')
    .showHelpAfterError(true);

  for (const definition of COMMANDS) {
    program
      .command(definition.name)
      .description(definition.description)
      .action(async () => {
        await runCommand(definition, program.opts<GlobalOptions>(), config.timeZone, logger);
      });
  }

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`mua-codec: ${message}\n`);
  process.exit(1);
});
