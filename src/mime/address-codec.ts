/**
 * Address Codec
 *
 * Parses and renders address lists of the form
 * - `local@domain`
 * - `Display Name <local@domain>` / `<local@domain>`
 * - `"Display Name With Spaces" <local@domain>`
 * separated by commas.
 *
 * @packageDocumentation
 */

import { isAscii } from '../encoding/ascii.js';
import { FormatError } from '../types/errors.js';
import { ok, err, all, type Result } from '../types/result.js';
import type { AddressParts } from '../types/message.js';

const ADDRESS_PART_PATTERN = /^[A-Za-z0-9.!$%&'*+/=?^_`{|}~-]+$/;

/**
 * Tests a local or domain part against the address token grammar
 *
 * @param part - Local or domain text
 * @returns true if non-empty, ASCII and made only of token characters
 */
export function isValidAddressPart(part: string): boolean {
  return ADDRESS_PART_PATTERN.test(part);
}

/**
 * Whether a display name must be double-quoted on the wire
 *
 * Counts single spaces followed by a non-space; a space in the last
 * position is never counted.
 */
export function needsQuoting(displayName: string): boolean {
  let separators = 0;
  for (let i = 0; i < displayName.length - 1; i++) {
    if (displayName[i] === ' ' && displayName[i + 1] !== ' ') {
      separators++;
    }
  }
  return separators >= 2;
}

/**
 * Renders one address
 *
 * Names with two or more word separators are quoted, and so are names
 * holding `,` or `@`, which the list splitter would otherwise read as the
 * end of an address.
 */
export function encodeAddress(address: AddressParts): string {
  const mailbox = `${address.local}@${address.domain}`;
  if (address.displayName === '') {
    return mailbox;
  }
  const name = needsQuoting(address.displayName) || /[,@]/.test(address.displayName)
    ? `"${address.displayName}"`
    : address.displayName;
  return `${name} <${mailbox}>`;
}

/**
 * Renders an address list separated by `, `
 */
export function encodeAddresses(addresses: readonly AddressParts[]): string {
  return addresses.map(encodeAddress).join(', ');
}

/**
 * Splits an address list on the commas that end an address
 *
 * Commas inside quotes or angle brackets never split; outside them a comma
 * splits only once the current segment holds a complete address, so an
 * unquoted display name may contain commas.
 */
function splitAddressList(text: string): string[] {
  const segments: string[] = [];
  let current = '';
  let inQuotes = false;
  let inAngle = false;

  for (const char of text) {
    if (char === '"' && !inAngle) {
      inQuotes = !inQuotes;
    } else if (char === '<' && !inQuotes) {
      inAngle = true;
    } else if (char === '>' && !inQuotes) {
      inAngle = false;
    } else if (char === ',' && !inQuotes && !inAngle && isCompleteAddress(current)) {
      segments.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  segments.push(current);

  return segments;
}

function isCompleteAddress(segment: string): boolean {
  const trimmed = segment.trim();
  if (trimmed.endsWith('>')) return true;
  return !trimmed.includes('<') && trimmed.includes('@');
}

function parseMailbox(mailbox: string, raw: string): Result<{ local: string; domain: string }> {
  const at = mailbox.indexOf('@');
  if (at === -1 || at !== mailbox.lastIndexOf('@')) {
    return err(new FormatError('Address must contain exactly one "@"', raw));
  }
  const local = mailbox.substring(0, at);
  const domain = mailbox.substring(at + 1);
  if (!isValidAddressPart(local)) {
    return err(new FormatError(`Invalid local part "${local}"`, raw));
  }
  if (!isValidAddressPart(domain)) {
    return err(new FormatError(`Invalid domain "${domain}"`, raw));
  }
  return ok({ local, domain });
}

function decodeSegment(segment: string): Result<AddressParts> {
  const text = segment.trim();
  if (text === '') {
    return err(new FormatError('Empty address', segment));
  }

  const angled = text.match(/^(.*?)\s*<([^<>]*)>$/s);
  if (!angled) {
    const mailbox = parseMailbox(text, segment);
    if (!mailbox.ok) return mailbox;
    return ok({ displayName: '', ...mailbox.value });
  }

  const [, rawName, rawMailbox] = angled;
  let displayName = rawName.trim();
  if (displayName.length >= 2 && displayName.startsWith('"') && displayName.endsWith('"')) {
    displayName = displayName.slice(1, -1);
  }
  if (/["<>]/.test(displayName)) {
    return err(new FormatError(`Invalid display name "${displayName}"`, segment));
  }

  const mailbox = parseMailbox(rawMailbox.trim(), segment);
  if (!mailbox.ok) return mailbox;
  return ok({ displayName, ...mailbox.value });
}

/**
 * Parses a comma-separated address list
 *
 * @param text - Header value such as `Ann <ann@mail.it>, bob@mail.it`
 * @returns The display name, local and domain of each address, in order
 */
export function decodeAddresses(text: string): Result<AddressParts[]> {
  if (!isAscii(text)) {
    return err(new FormatError('Addresses must be ASCII', text));
  }
  if (text.trim() === '') {
    return err(new FormatError('Address list is empty', text));
  }
  return all(splitAddressList(text).map(decodeSegment));
}

/**
 * Parses exactly one address
 */
export function decodeAddress(text: string): Result<AddressParts> {
  const decoded = decodeAddresses(text);
  if (!decoded.ok) return decoded;
  if (decoded.value.length !== 1) {
    return err(new FormatError(`Expected one address, found ${decoded.value.length}`, text));
  }
  return ok(decoded.value[0]);
}
