/**
 * mua-codec command and configuration tests
 */

import { describe, it, expect } from 'vitest';
import {
  addressDecode,
  addressEncode,
  COMMANDS,
  dateDecode,
  dateEncode,
  inputLines,
  messageDecode,
  messageEncode,
  recipientsDecode,
  recipientsEncode,
  subjectDecode,
  subjectEncode,
  type CommandContext,
} from '../../src/cli/commands.js';
import { isValidTimeZone, loadConfig } from '../../src/cli/config.js';
import { createLogger } from '../../src/cli/logger.js';
import { ValidationError } from '../../src/types/errors.js';
import { expectErr, expectOk } from '../support/result.js';

const context: CommandContext = {
  timeZone: 'Europe/Rome',
  date: { epochMillis: 1606950000000, offsetMinutes: 60 },
};

const COMPOSE_INPUT = [
  'Daniele Buondonno', 'danibond', 'gmail.com',
  '', 'marcorossi', 'mail.it',
  'Ann', 'ann', 'a.it',
  'Hello',
  'Hi',
  '<b>Hi</b>',
].join('\n');

const COMPOSED = [
  'From: Daniele Buondonno <danibond@gmail.com>',
  'To: marcorossi@mail.it, Ann <ann@a.it>',
  'Subject: Hello',
  'Date: Thu, 3 Dec 2020 00:00:00 +0100',
  '',
  'MIME-Version: 1.0',
  'Content-Type: multipart/alternative; boundary=frontier',
  '',
  'This is a message with multiple parts in MIME format.',
  '--frontier',
  'Content-Type: text/plain; charset="us-ascii"',
  '',
  'Hi',
  '--frontier',
  'Content-Type: text/html; charset="utf-8"',
  'Content-Transfer-Encoding: base64',
  '',
  'PGI+SGk8L2I+',
  '--frontier--',
].join('\n');

describe('mua-codec commands', () => {
  it('should register every command once', () => {
    expect(COMMANDS.map(command => command.name)).toEqual([
      'address-encode',
      'address-decode',
      'recipients-encode',
      'recipients-decode',
      'subject-encode',
      'subject-decode',
      'date-encode',
      'date-decode',
      'message-encode',
      'message-decode',
    ]);
  });

  it('should split stdin into lines without the final newline', () => {
    expect(inputLines('a\r\nb\n')).toEqual(['a', 'b']);
    expect(inputLines('a\n\n')).toEqual(['a', '']);
  });

  describe('addresses', () => {
    it('should encode an address from three lines', () => {
      expect(expectOk(addressEncode('Daniele Buondonno\ndanibond\ngmail.com\n'))).toBe('Daniele Buondonno <danibond@gmail.com>');
      expect(expectOk(addressEncode('\nmarcorossi\nmail.it'))).toBe('marcorossi@mail.it');
    });

    it('should complain about missing lines', () => {
      const error = expectErr(addressEncode('a\nb'));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe('Expected 3 lines (display name, local, domain), got 2');
    });

    it('should decode an address into three lines', () => {
      expect(expectOk(addressDecode('"Marco De Rossi" <mdr@mail.it>\n'))).toBe('Marco De Rossi\nmdr\nmail.it');
    });

    it('should encode a To header from triples', () => {
      expect(expectOk(recipientsEncode('Ann, ann, a.it\n, bob, b.it\n'))).toBe('To: Ann <ann@a.it>, bob@b.it');
    });

    it('should reject a malformed triple', () => {
      expect(expectErr(recipientsEncode('Ann ann a.it')).message)
        .toBe('Expected "display, local, domain", got "Ann ann a.it"');
    });

    it('should decode a To header into triples', () => {
      expect(expectOk(recipientsDecode('To: Ann <ann@a.it>, bob@b.it'))).toBe('Ann, ann, a.it\n, bob, b.it');
    });
  });

  describe('subjects', () => {
    it('should encode non-ASCII subjects only', () => {
      expect(expectOk(subjectEncode('Caffè\n'))).toBe('=?utf-8?B?Q2FmZsOo?=');
      expect(expectOk(subjectEncode('Hello'))).toBe('Hello');
    });

    it('should decode an encoded subject', () => {
      expect(expectOk(subjectDecode('=?utf-8?B?Q2Fmw6k=?='))).toBe('Café');
    });
  });

  describe('dates', () => {
    it('should encode local midnight in the configured zone', () => {
      expect(expectOk(dateEncode('2020 12 3\n', context))).toBe('Thu, 3 Dec 2020 00:00:00 +0100');
      expect(expectOk(dateEncode('2020 12 3', { ...context, timeZone: 'UTC' }))).toBe('Thu, 3 Dec 2020 00:00:00 GMT');
    });

    it('should reject incomplete dates', () => {
      expect(expectErr(dateEncode('2020 12', context)).message).toBe('Expected "year month day"');
      expect(expectErr(dateEncode('2020 13 1', context)).message).toBe('Date month is out of range');
    });

    it('should print the weekday of a date', () => {
      expect(expectOk(dateDecode('Thu, 3 Dec 2020 00:00:00 +0100'))).toBe('THURSDAY');
    });
  });

  describe('messages', () => {
    it('should compose and render a multipart message', () => {
      expect(expectOk(messageEncode(COMPOSE_INPUT, context))).toBe(COMPOSED);
    });

    it('should compose a single part when the html line is missing', () => {
      const input = COMPOSE_INPUT.split('\n').slice(0, 11).join('\n');
      expect(expectOk(messageEncode(input, context)).endsWith('Content-Type: text/plain; charset="us-ascii"\n\nHi')).toBe(true);
    });

    it('should print the headers and bodies of a stored message', () => {
      expect(expectOk(messageDecode(COMPOSED))).toBe([
        'From: Daniele Buondonno <danibond@gmail.com>',
        'To: marcorossi@mail.it, Ann <ann@a.it>',
        'Subject: Hello',
        'Date: 2020-12-03T00:00:00+01:00',
        '',
        '[text/plain us-ascii]',
        'Hi',
        '',
        '[text/html utf-8]',
        '<b>Hi</b>',
      ].join('\n'));
    });

    it('should report a message without essential headers', () => {
      expect(expectErr(messageDecode('Subject: Hi\n\nbody')).message).toBe('Message is missing the "from" header');
    });
  });
});

describe('CLI configuration', () => {
  it('should fall back to defaults', () => {
    expect(expectOk(loadConfig({}))).toEqual({ timeZone: 'Europe/Rome', logLevel: 'warn' });
  });

  it('should read the environment', () => {
    expect(expectOk(loadConfig({ MUA_TIME_ZONE: 'UTC', MUA_LOG_LEVEL: 'debug' })))
      .toEqual({ timeZone: 'UTC', logLevel: 'debug' });
  });

  it('should reject an unknown time zone', () => {
    const error = expectErr(loadConfig({ MUA_TIME_ZONE: 'Mars/Olympus_Mons' }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Invalid MUA_TIME_ZONE: Unknown IANA time zone');
    expect(error).toHaveProperty('field', 'MUA_TIME_ZONE');
  });

  it('should reject an unknown log level', () => {
    expect(expectErr(loadConfig({ MUA_LOG_LEVEL: 'loud' }))).toHaveProperty('field', 'MUA_LOG_LEVEL');
  });

  it('should recognise IANA zones', () => {
    expect(isValidTimeZone('America/New_York')).toBe(true);
    expect(isValidTimeZone('Nowhere/Special')).toBe(false);
  });

  it('should build a logger at the configured level', () => {
    const logger = createLogger('error');
    expect(logger.level).toBe('error');
    expect(logger.isLevelEnabled('warn')).toBe(false);
  });
});
