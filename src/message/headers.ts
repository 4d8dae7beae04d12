/**
 * Header family
 *
 * The five headers of the dialect as a closed union discriminated by
 * `type`. Every header is a frozen value with a display value
 * (`headerValue`) and a canonical wire rendering (`renderHeader`).
 *
 * @packageDocumentation
 */

import { Address } from './address.js';
import { isAscii } from '../encoding/ascii.js';
import { decodeWord, encodeWord, isEncodedWord } from '../encoding/encoded-word.js';
import { decodeAddresses, encodeAddresses } from '../mime/address-codec.js';
import {
  compareZonedDateTimes,
  decodeDate,
  encodeDate,
  formatIsoOffset,
  isEncodableDate,
  truncateToSeconds,
} from '../mime/date-codec.js';
import { parseContentType } from '../mime/header-parser.js';
import { BOUNDARY, MULTIPART_KIND } from '../mime/message-framer.js';
import { FormatError, ValidationError } from '../types/errors.js';
import { ok, err, all, requirePresent, type Result } from '../types/result.js';
import {
  CHARSETS,
  CONTENT_KINDS,
  type Charset,
  type ContentKind,
  type ZonedDateTime,
} from '../types/message.js';

export interface FromHeader {
  readonly type: 'From';
  readonly sender: Address;
}

export interface RecipientsHeader {
  readonly type: 'To';
  readonly recipients: readonly Address[];
}

export interface SubjectHeader {
  readonly type: 'Subject';
  /** Decoded subject text */
  readonly subject: string;
}

export interface DateHeader {
  readonly type: 'Date';
  readonly date: ZonedDateTime;
}

export interface ContentTypeHeader {
  readonly type: 'Content-Type';
  readonly kind: ContentKind;
  /** `''` exactly when kind is multipart/alternative */
  readonly charset: Charset;
}

export type Header = FromHeader | RecipientsHeader | SubjectHeader | DateHeader | ContentTypeHeader;

// From

export function fromHeader(sender: Address): Result<FromHeader> {
  const present = requirePresent({ sender });
  if (!present.ok) return present;
  const header: FromHeader = Object.freeze({ type: 'From', sender });
  return ok(header);
}

/**
 * Parses the value of a From header (one address)
 */
export function parseFromHeader(value: string): Result<FromHeader> {
  const present = requirePresent({ value });
  if (!present.ok) return present;

  const sender = Address.parse(value);
  if (!sender.ok) return sender;
  return fromHeader(sender.value);
}

// To

export function recipientsHeader(recipients: readonly Address[]): Result<RecipientsHeader> {
  const present = requirePresent({ recipients });
  if (!present.ok) return present;
  if (recipients.length === 0) {
    return err(new ValidationError('At least one recipient is required', 'recipients'));
  }
  const header: RecipientsHeader = Object.freeze({
    type: 'To',
    recipients: Object.freeze([...recipients]),
  });
  return ok(header);
}

/**
 * Parses the value of a To header (comma-separated addresses)
 */
export function parseRecipientsHeader(value: string): Result<RecipientsHeader> {
  const present = requirePresent({ value });
  if (!present.ok) return present;

  const parts = decodeAddresses(value);
  if (!parts.ok) return parts;
  const recipients = all(parts.value.map(Address.fromParts));
  if (!recipients.ok) return recipients;
  return recipientsHeader(recipients.value);
}

// Subject

/**
 * Builds a Subject header; an encoded word is decoded first
 *
 * @param subject - Plain subject text or an `=?utf-8?B?...?=` word
 */
export function subjectHeader(subject: string): Result<SubjectHeader> {
  const present = requirePresent({ subject });
  if (!present.ok) return present;
  if (subject === '') {
    return err(new ValidationError('Subject must not be empty', 'subject'));
  }

  const decoded = decodeWord(subject);
  if (!decoded.ok) {
    return err(new FormatError(`Malformed encoded subject: ${decoded.error.message}`, subject));
  }
  if (decoded.value === '') {
    return err(new ValidationError('Subject must not be empty', 'subject'));
  }
  if (/[\r\n]/.test(decoded.value)) {
    return err(new ValidationError('Subject must be a single line', 'subject'));
  }
  const header: SubjectHeader = Object.freeze({ type: 'Subject', subject: decoded.value });
  return ok(header);
}

/**
 * Subject text as written on the wire
 *
 * Text that would not survive a plain round trip (non-ASCII, padded with
 * whitespace, or shaped like an encoded word) goes out as an encoded word.
 */
export function encodeSubject(subject: string): string {
  const plain = isAscii(subject) && subject === subject.trim() && !isEncodedWord(subject);
  return plain ? subject : encodeWord(subject);
}

// Date

/**
 * Builds a Date header; sub-second precision is dropped
 */
export function dateHeader(date: ZonedDateTime): Result<DateHeader> {
  const present = requirePresent({ date });
  if (!present.ok) return present;
  if (!Number.isFinite(date.epochMillis) || !Number.isInteger(date.offsetMinutes)) {
    return err(new ValidationError('Date is not a valid instant', 'date'));
  }
  const truncated = truncateToSeconds(date);
  if (!isEncodableDate(truncated)) {
    return err(new ValidationError('Date has no RFC 1123 form (year 1000-9999, offset under 24h)', 'date'));
  }
  const header: DateHeader = Object.freeze({ type: 'Date', date: truncated });
  return ok(header);
}

/**
 * Parses the value of a Date header (RFC 1123)
 */
export function parseDateHeader(value: string): Result<DateHeader> {
  const present = requirePresent({ value });
  if (!present.ok) return present;

  const date = decodeDate(value);
  if (!date.ok) return date;
  return dateHeader(date.value);
}

// Content-Type

function isContentKind(kind: string): kind is ContentKind {
  return CONTENT_KINDS.some(candidate => candidate === kind);
}

function isCharset(charset: string): charset is Charset {
  return CHARSETS.some(candidate => candidate === charset);
}

/**
 * Builds a validated Content-Type header
 *
 * @param kind - multipart/alternative, text/plain or text/html
 * @param charset - `''` for multipart/alternative, otherwise us-ascii or utf-8
 */
export function contentTypeHeader(kind: string, charset: string): Result<ContentTypeHeader> {
  const present = requirePresent({ kind, charset });
  if (!present.ok) return present;

  if (!isContentKind(kind)) {
    return err(new ValidationError(`Unsupported content type "${kind}"`, 'kind'));
  }
  if (!isCharset(charset)) {
    return err(new ValidationError(`Unsupported charset "${charset}"`, 'charset'));
  }
  if ((kind === MULTIPART_KIND) !== (charset === '')) {
    return err(new ValidationError(
      kind === MULTIPART_KIND
        ? 'multipart/alternative takes no charset'
        : `${kind} requires a charset`,
      'charset'
    ));
  }
  const header: ContentTypeHeader = Object.freeze({ type: 'Content-Type', kind, charset });
  return ok(header);
}

/**
 * Parses the value of a Content-Type header
 *
 * @param value - e.g. `text/plain; charset="utf-8"` or
 *   `multipart/alternative; boundary=frontier`
 */
export function parseContentTypeHeader(value: string): Result<ContentTypeHeader> {
  const present = requirePresent({ value });
  if (!present.ok) return present;

  const parsed = parseContentType(value);
  if (!parsed.ok) return parsed;

  const { kind, params } = parsed.value;
  const charset = kind === MULTIPART_KIND ? '' : (params['charset'] ?? '').toLowerCase();
  const header = contentTypeHeader(kind, charset);
  if (!header.ok) {
    return err(new FormatError(header.error.message, value));
  }
  return header;
}

// Shared contract

/**
 * Display value of a header
 */
export function headerValue(header: Header): string {
  switch (header.type) {
    case 'From':
      return header.sender.toString();
    case 'To':
      return header.recipients.map(recipient => recipient.toString()).join('\n');
    case 'Subject':
      return header.subject;
    case 'Date':
      return formatIsoOffset(header.date);
    case 'Content-Type':
      return header.kind === MULTIPART_KIND ? header.kind : `${header.kind} ${header.charset}`;
  }
}

/**
 * Canonical wire rendering of a header (one or two lines, no trailing newline)
 */
export function renderHeader(header: Header): string {
  switch (header.type) {
    case 'From':
      return `From: ${header.sender.toString()}`;
    case 'To':
      return `To: ${encodeAddresses(header.recipients)}`;
    case 'Subject':
      return `Subject: ${encodeSubject(header.subject)}`;
    case 'Date':
      return `Date: ${encodeDate(header.date)}`;
    case 'Content-Type':
      if (header.kind === MULTIPART_KIND) {
        return `MIME-Version: 1.0\nContent-Type: ${MULTIPART_KIND}; boundary=${BOUNDARY}`;
      }
      return header.charset === 'us-ascii'
        ? `Content-Type: ${header.kind}; charset="${header.charset}"`
        : `Content-Type: ${header.kind}; charset="${header.charset}"\nContent-Transfer-Encoding: base64`;
  }
}

// Ordering and equality

export function compareFromHeaders(a: FromHeader, b: FromHeader): number {
  return a.sender.compareTo(b.sender);
}

/**
 * Lexicographic order: the first differing address decides, otherwise the
 * shorter list sorts first
 */
export function compareRecipientsHeaders(a: RecipientsHeader, b: RecipientsHeader): number {
  const shared = Math.min(a.recipients.length, b.recipients.length);
  for (let i = 0; i < shared; i++) {
    const order = a.recipients[i].compareTo(b.recipients[i]);
    if (order !== 0) return order;
  }
  return Math.sign(a.recipients.length - b.recipients.length);
}

export function compareSubjectHeaders(a: SubjectHeader, b: SubjectHeader): number {
  if (a.subject === b.subject) return 0;
  return a.subject < b.subject ? -1 : 1;
}

export function compareDateHeaders(a: DateHeader, b: DateHeader): number {
  return compareZonedDateTimes(a.date, b.date);
}

/**
 * Structural equality; addresses compare by local and domain
 */
export function headersEqual(a: Header, b: Header): boolean {
  switch (a.type) {
    case 'From':
      return b.type === 'From' && compareFromHeaders(a, b) === 0;
    case 'To':
      return b.type === 'To'
        && a.recipients.length === b.recipients.length
        && compareRecipientsHeaders(a, b) === 0;
    case 'Subject':
      return b.type === 'Subject' && a.subject === b.subject;
    case 'Date':
      return b.type === 'Date' && compareDateHeaders(a, b) === 0;
    case 'Content-Type':
      return b.type === 'Content-Type' && a.kind === b.kind && a.charset === b.charset;
  }
}
