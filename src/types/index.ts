/**
 * Type exports for mua-mime-codec
 */

// Message value types
export type {
  AddressParts,
  ZonedDateTime,
  LocalDateTimeFields,
  ContentKind,
  Charset,
  HeaderType,
  RawHeader,
  Fragment
} from './message.js';

export { CONTENT_KINDS, CHARSETS } from './message.js';

// Outcome type
export type { Result } from './result.js';
export { ok, err, unwrap, all, isAbsent, requirePresent } from './result.js';

// Error types
export {
  MailCodecError,
  FormatError,
  ValidationError,
  NullInputError
} from './errors.js';

export type { ErrorSource } from './errors.js';
