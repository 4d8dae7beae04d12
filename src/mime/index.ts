/**
 * MIME Codec Module
 *
 * Provides the wire-level codecs the message model is built on:
 * - Address list parsing and rendering with the display-name quoting rule
 * - RFC 1123 date-time parsing and rendering
 * - Header block and Content-Type parsing
 * - Message framing with the fixed `frontier` boundary
 *
 * @packageDocumentation
 */

// Address codec
export {
  isValidAddressPart,
  needsQuoting,
  encodeAddress,
  encodeAddresses,
  decodeAddresses,
  decodeAddress,
} from './address-codec.js';

// Date codec
export {
  zonedDateTime,
  zonedDateTimeInZone,
  offsetMinutesAt,
  decodeDate,
  encodeDate,
  formatIsoOffset,
  isEncodableDate,
  dayOfWeek,
  compareZonedDateTimes,
  truncateToSeconds,
  nowInZone,
} from './date-codec.js';

// Header parsing
export {
  splitHeaderBlock,
  parseHeaderBlock,
  findHeader,
  parseContentType,
} from './header-parser.js';

// Message framing
export {
  BOUNDARY,
  MULTIPART_KIND,
  ESSENTIAL_HEADER_NAMES,
  splitMultipartBody,
  decodeFragments,
  encodeFragments,
} from './message-framer.js';
