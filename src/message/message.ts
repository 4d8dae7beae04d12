/**
 * Message - the top-level aggregate of the codec
 *
 * Holds the four essential headers as a fixed record and an ordered list
 * of parts: either a single text/plain part, or a multipart/alternative
 * envelope followed by a text/plain and a text/html part.
 *
 * @packageDocumentation
 */

import type { Address } from './address.js';
import {
  compareDateHeaders,
  compareSubjectHeaders,
  headersEqual,
  parseContentTypeHeader,
  parseDateHeader,
  parseFromHeader,
  parseRecipientsHeader,
  renderHeader,
  subjectHeader,
  type DateHeader,
  type FromHeader,
  type Header,
  type RecipientsHeader,
  type SubjectHeader,
} from './headers.js';
import { Part } from './part.js';
import { base64Decode } from '../encoding/base64.js';
import { decodeFragments, encodeFragments, MULTIPART_KIND } from '../mime/message-framer.js';
import { FormatError, ValidationError } from '../types/errors.js';
import { ok, err, requirePresent, type Result } from '../types/result.js';
import type { Fragment, HeaderType, RawHeader, ZonedDateTime } from '../types/message.js';

/**
 * The headers every message carries exactly once
 */
export interface EssentialHeaders {
  from: FromHeader;
  to: RecipientsHeader;
  subject: SubjectHeader;
  date: DateHeader;
}

const ESSENTIAL_FIELDS = ['from', 'to', 'subject', 'date'] as const;

const ESSENTIAL_TYPES: Record<keyof EssentialHeaders, HeaderType> = {
  from: 'From',
  to: 'To',
  subject: 'Subject',
  date: 'Date',
};

/**
 * Checks the part layout: one text/plain part, or envelope + text/plain +
 * text/html in that order
 */
function validateLayout(parts: readonly Part[]): Result<void> {
  if (parts.length === 0) {
    return err(new ValidationError('A message needs at least one part', 'parts'));
  }
  if (parts.length === 1) {
    if (parts[0].contentType.kind !== 'text/plain') {
      return err(new ValidationError('A single-part message must be text/plain', 'parts'));
    }
    return ok(undefined);
  }

  const kinds = parts.map(part => part.contentType.kind);
  const expected = [MULTIPART_KIND, 'text/plain', 'text/html'];
  if (kinds.length !== expected.length || kinds.some((kind, i) => kind !== expected[i])) {
    return err(new ValidationError(
      `A multipart message must be ${expected.join(', ')}; found ${kinds.join(', ')}`,
      'parts'
    ));
  }
  return ok(undefined);
}

/**
 * Converts one fragment into a part, decoding a utf-8 body from base64
 *
 * Only the first fragment may carry message headers; later fragments
 * contribute their Content-Type alone.
 */
function partFromFragment(fragment: Fragment, headers: Header[], first: boolean): Result<Part> {
  const partHeaders: Header[] = [];

  for (const raw of fragment.rawHeaders) {
    if (!first && raw.name !== 'content-type') continue;
    const header = routeHeader(raw);
    if (header === undefined) continue;
    if (!header.ok) return header;

    if (header.value.type === 'Content-Type') {
      partHeaders.push(header.value);
    } else {
      headers.push(header.value);
    }
  }

  let body = fragment.rawBody;
  const utf8 = partHeaders.some(header => header.type === 'Content-Type' && header.charset === 'utf-8');
  if (utf8) {
    const decoded = base64Decode(fragment.rawBody);
    if (!decoded.ok) return decoded;
    body = decoded.value;
  }

  const part = Part.create(partHeaders, body);
  if (!part.ok) {
    return err(new FormatError(part.error.message, fragment.rawBody));
  }
  return part;
}

/**
 * Builds the header a raw `name: value` pair stands for; unknown names
 * yield undefined
 */
function routeHeader(raw: RawHeader): Result<Header> | undefined {
  switch (raw.name) {
    case 'from':
      return parseFromHeader(raw.value);
    case 'to':
      return parseRecipientsHeader(raw.value);
    case 'subject':
      return subjectHeader(raw.value);
    case 'date':
      return parseDateHeader(raw.value);
    case 'content-type':
      return parseContentTypeHeader(raw.value);
    default:
      return undefined;
  }
}

export class Message {
  readonly headers: Readonly<EssentialHeaders>;
  readonly parts: readonly Part[];

  private constructor(headers: EssentialHeaders, parts: readonly Part[]) {
    this.headers = Object.freeze({ ...headers });
    this.parts = Object.freeze([...parts]);
    Object.freeze(this);
  }

  /**
   * Assembles a message from its essential headers and parts
   */
  static create(headers: EssentialHeaders, parts: readonly Part[]): Result<Message> {
    const present = requirePresent({ headers, parts });
    if (!present.ok) return present;

    for (const field of ESSENTIAL_FIELDS) {
      const type = ESSENTIAL_TYPES[field];
      const header: unknown = headers[field];
      if (typeof header !== 'object' || header === null || !('type' in header) || header.type !== type) {
        return err(new ValidationError(`Message is missing the essential "${type}" header`, type));
      }
    }

    const layout = validateLayout(parts);
    if (!layout.ok) return layout;
    return ok(new Message(headers, parts));
  }

  /**
   * Assembles a message from an unordered header list
   *
   * Headers other than From, To, Subject and Date are rejected; a repeated
   * header replaces the earlier one.
   */
  static fromHeaders(headers: readonly Header[], parts: readonly Part[]): Result<Message> {
    const present = requirePresent({ headers, parts });
    if (!present.ok) return present;

    const collected: Partial<EssentialHeaders> = {};
    for (const header of headers) {
      switch (header.type) {
        case 'From':
          collected.from = header;
          break;
        case 'To':
          collected.to = header;
          break;
        case 'Subject':
          collected.subject = header;
          break;
        case 'Date':
          collected.date = header;
          break;
        case 'Content-Type':
          return err(new ValidationError('Content-Type belongs to a part, not the message', 'headers'));
      }
    }

    const { from, to, subject, date } = collected;
    if (from === undefined || to === undefined || subject === undefined || date === undefined) {
      const missing = ESSENTIAL_FIELDS
        .filter(field => collected[field] === undefined)
        .map(field => ESSENTIAL_TYPES[field]);
      return err(new ValidationError(
        `Message is missing the essential headers: ${missing.join(', ')}`,
        missing[0]
      ));
    }
    return Message.create({ from, to, subject, date }, parts);
  }

  /**
   * Parses a stored message
   *
   * @param text - Raw message text, as produced by `render()`
   */
  static parse(text: string): Result<Message> {
    const present = requirePresent({ text });
    if (!present.ok) return present;

    const fragments = decodeFragments(text);
    if (!fragments.ok) return fragments;

    const headers: Header[] = [];
    const parts: Part[] = [];
    for (const [index, fragment] of fragments.value.entries()) {
      const part = partFromFragment(fragment, headers, index === 0);
      if (!part.ok) return part;
      parts.push(part.value);
    }
    return Message.fromHeaders(headers, parts);
  }

  get from(): FromHeader {
    return this.headers.from;
  }

  get to(): RecipientsHeader {
    return this.headers.to;
  }

  get subject(): SubjectHeader {
    return this.headers.subject;
  }

  get date(): DateHeader {
    return this.headers.date;
  }

  get sender(): Address {
    return this.headers.from.sender;
  }

  get recipients(): readonly Address[] {
    return this.headers.to.recipients;
  }

  get subjectText(): string {
    return this.headers.subject.subject;
  }

  get sentAt(): ZonedDateTime {
    return this.headers.date.date;
  }

  get isMultipart(): boolean {
    return this.parts.length > 1;
  }

  /** Body of the text/plain part */
  get textBody(): string {
    return this.parts.find(part => part.contentType.kind === 'text/plain')?.body ?? '';
  }

  /** Body of the text/html part, if any */
  get htmlBody(): string | undefined {
    return this.parts.find(part => part.contentType.kind === 'text/html')?.body;
  }

  /**
   * Renders the message in its stored text form
   */
  render(): string {
    const { from, to, subject, date } = this.headers;
    return encodeFragments(
      [from, to, subject, date].map(renderHeader),
      this.parts.map(part => part.render())
    );
  }

  /**
   * Text form for persistence
   */
  toSequence(): string {
    return this.render();
  }

  /**
   * Fragments of the rendered message, as a stored copy would decode
   */
  fragments(): Result<Fragment[]> {
    return decodeFragments(this.render());
  }

  equals(other: Message): boolean {
    const { from, to, subject, date } = this.headers;
    return headersEqual(from, other.headers.from)
      && headersEqual(to, other.headers.to)
      && headersEqual(subject, other.headers.subject)
      && headersEqual(date, other.headers.date)
      && this.parts.length === other.parts.length
      && this.parts.every((part, i) => part.equals(other.parts[i]));
  }

  toString(): string {
    return this.render();
  }
}

export function compareMessagesByDate(a: Message, b: Message): number {
  return compareDateHeaders(a.date, b.date);
}

export function compareMessagesBySubject(a: Message, b: Message): number {
  return compareSubjectHeaders(a.subject, b.subject);
}
