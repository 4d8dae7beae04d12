/**
 * Message value types for mua-mime-codec
 */

/**
 * The three parts of an email address, as written on the wire
 */
export interface AddressParts {
  /** Display name (empty when absent) */
  displayName: string;
  /** Mailbox part (before @) */
  local: string;
  /** Host part (after @) */
  domain: string;
}

/**
 * An instant together with the UTC offset it was written in
 */
export interface ZonedDateTime {
  /** Milliseconds since the Unix epoch */
  readonly epochMillis: number;
  /** Offset east of UTC, in minutes (e.g. 60 for +0100) */
  readonly offsetMinutes: number;
}

/**
 * Local calendar fields used to build a ZonedDateTime
 */
export interface LocalDateTimeFields {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

export const CONTENT_KINDS = ['multipart/alternative', 'text/plain', 'text/html'] as const;
export type ContentKind = (typeof CONTENT_KINDS)[number];

export const CHARSETS = ['', 'us-ascii', 'utf-8'] as const;
export type Charset = (typeof CHARSETS)[number];

/**
 * Header names as rendered on the wire
 */
export type HeaderType = 'From' | 'To' | 'Subject' | 'Date' | 'Content-Type';

/**
 * A `name: value` pair from a header block (name lower-cased)
 */
export interface RawHeader {
  name: string;
  value: string;
}

/**
 * One decoded unit of a stored message: its raw headers plus the body
 * still in transfer encoding
 */
export interface Fragment {
  rawHeaders: RawHeader[];
  rawBody: string;
}
