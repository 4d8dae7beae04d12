/**
 * mua-codec commands
 *
 * Each command turns the text read from stdin into the text written to
 * stdout; the commander wiring lives in `index.ts`.
 */

import { dayOfWeek, decodeDate, encodeDate, zonedDateTimeInZone } from '../mime/date-codec.js';
import { Address } from '../message/address.js';
import { composeMessage } from '../message/compose.js';
import {
  dateHeader,
  encodeSubject,
  fromHeader,
  headerValue,
  parseRecipientsHeader,
  recipientsHeader,
  renderHeader,
  subjectHeader,
} from '../message/headers.js';
import { Message } from '../message/message.js';
import { ValidationError } from '../types/errors.js';
import { ok, err, all, type Result } from '../types/result.js';
import type { ZonedDateTime } from '../types/message.js';

export interface CommandContext {
  /** IANA zone new dates are written in */
  timeZone: string;
  /** Date stamped on composed messages */
  date: ZonedDateTime;
}

export interface CommandDefinition {
  name: string;
  description: string;
  run(input: string, context: CommandContext): Result<string>;
}

/**
 * Splits stdin into lines, dropping a single trailing newline
 */
export function inputLines(input: string): string[] {
  return input.replace(/\r?\n$/, '').split(/\r?\n/);
}

function requireLines(input: string, count: number, what: string): Result<string[]> {
  const lines = inputLines(input);
  if (lines.length < count) {
    return err(new ValidationError(`Expected ${count} lines (${what}), got ${lines.length}`, 'stdin'));
  }
  return ok(lines);
}

function addressTriple(address: Address): string {
  return `${address.displayName}, ${address.local}, ${address.domain}`;
}

export function addressEncode(input: string): Result<string> {
  const lines = requireLines(input, 3, 'display name, local, domain');
  if (!lines.ok) return lines;

  const [displayName, local, domain] = lines.value;
  const address = Address.create(displayName, local, domain);
  if (!address.ok) return address;
  return ok(address.value.toString());
}

export function addressDecode(input: string): Result<string> {
  const address = Address.parse(inputLines(input)[0]);
  if (!address.ok) return address;

  const { displayName, local, domain } = address.value;
  return ok([displayName, local, domain].join('\n'));
}

export function recipientsEncode(input: string): Result<string> {
  const addresses = all(
    inputLines(input)
      .filter(line => line !== '')
      .map(line => {
        const parts = line.split(', ');
        if (parts.length !== 3) {
          return err(new ValidationError(`Expected "display, local, domain", got "${line}"`, 'stdin'));
        }
        return Address.create(parts[0], parts[1], parts[2]);
      })
  );
  if (!addresses.ok) return addresses;

  const header = recipientsHeader(addresses.value);
  if (!header.ok) return header;
  return ok(renderHeader(header.value));
}

export function recipientsDecode(input: string): Result<string> {
  const value = inputLines(input)[0].replace(/^To:\s*/i, '');
  const header = parseRecipientsHeader(value);
  if (!header.ok) return header;
  return ok(header.value.recipients.map(addressTriple).join('\n'));
}

export function subjectEncode(input: string): Result<string> {
  const header = subjectHeader(inputLines(input)[0]);
  if (!header.ok) return header;
  return ok(encodeSubject(header.value.subject));
}

export function subjectDecode(input: string): Result<string> {
  const header = subjectHeader(inputLines(input)[0]);
  if (!header.ok) return header;
  return ok(header.value.subject);
}

export function dateEncode(input: string, context: CommandContext): Result<string> {
  const fields = inputLines(input)[0].trim().split(/\s+/).map(Number);
  if (fields.length !== 3 || fields.some(field => !Number.isInteger(field))) {
    return err(new ValidationError('Expected "year month day"', 'stdin'));
  }

  const [year, month, day] = fields;
  const date = zonedDateTimeInZone({ year, month, day }, context.timeZone);
  if (!date.ok) return date;
  return ok(encodeDate(date.value));
}

export function dateDecode(input: string): Result<string> {
  const date = decodeDate(inputLines(input)[0]);
  if (!date.ok) return date;
  return ok(dayOfWeek(date.value).toUpperCase());
}

/**
 * Composes a message from sender (3 lines), two recipients (3 lines each),
 * subject, text body and HTML body
 */
export function messageEncode(input: string, context: CommandContext): Result<string> {
  const lines = requireLines(input, 11, 'sender, two recipients, subject, text, html');
  if (!lines.ok) return lines;
  const [
    senderName, senderLocal, senderDomain,
    firstName, firstLocal, firstDomain,
    secondName, secondLocal, secondDomain,
    subjectLine, text, html = '',
  ] = lines.value;

  const sender = Address.create(senderName, senderLocal, senderDomain);
  if (!sender.ok) return sender;
  const recipients = all([
    Address.create(firstName, firstLocal, firstDomain),
    Address.create(secondName, secondLocal, secondDomain),
  ]);
  if (!recipients.ok) return recipients;

  const from = fromHeader(sender.value);
  if (!from.ok) return from;
  const to = recipientsHeader(recipients.value);
  if (!to.ok) return to;
  const subject = subjectHeader(subjectLine);
  if (!subject.ok) return subject;
  const date = dateHeader(context.date);
  if (!date.ok) return date;

  const message = composeMessage({
    from: from.value,
    to: to.value,
    subject: subject.value,
    date: date.value,
    text,
    html,
  });
  if (!message.ok) return message;
  return ok(message.value.render());
}

/**
 * Prints the header values and part bodies of a stored message
 */
export function messageDecode(input: string): Result<string> {
  const message = Message.parse(input);
  if (!message.ok) return message;

  const { from, to, subject, date } = message.value.headers;
  const lines = [
    `From: ${headerValue(from)}`,
    `To: ${to.recipients.map(recipient => recipient.toString()).join(', ')}`,
    `Subject: ${headerValue(subject)}`,
    `Date: ${headerValue(date)}`,
  ];
  for (const part of message.value.parts) {
    if (part.isEnvelope) continue;
    lines.push('', `[${headerValue(part.contentType)}]`, part.body);
  }
  return ok(lines.join('\n'));
}

export const COMMANDS: readonly CommandDefinition[] = [
  {
    name: 'address-encode',
    description: 'Encode an address from display name, local and domain lines',
    run: addressEncode,
  },
  {
    name: 'address-decode',
    description: 'Print the display name, local and domain of an address',
    run: addressDecode,
  },
  {
    name: 'recipients-encode',
    description: 'Encode a To header from "display, local, domain" lines',
    run: recipientsEncode,
  },
  {
    name: 'recipients-decode',
    description: 'Print "display, local, domain" for every address of a To header',
    run: recipientsDecode,
  },
  {
    name: 'subject-encode',
    description: 'Print a subject as written on the wire',
    run: subjectEncode,
  },
  {
    name: 'subject-decode',
    description: 'Print the decoded text of a subject',
    run: subjectDecode,
  },
  {
    name: 'date-encode',
    description: 'Encode local midnight of "year month day" in the configured zone',
    run: dateEncode,
  },
  {
    name: 'date-decode',
    description: 'Print the upper-case weekday of an RFC 1123 date',
    run: dateDecode,
  },
  {
    name: 'message-encode',
    description: 'Compose a message and print its stored form',
    run: messageEncode,
  },
  {
    name: 'message-decode',
    description: 'Print the headers and bodies of a stored message',
    run: messageDecode,
  },
];

