/**
 * Message model: addresses, the header family, parts and messages
 *
 * @packageDocumentation
 */

export { Address, compareAddresses } from './address.js';

export {
  fromHeader,
  parseFromHeader,
  recipientsHeader,
  parseRecipientsHeader,
  subjectHeader,
  encodeSubject,
  dateHeader,
  parseDateHeader,
  contentTypeHeader,
  parseContentTypeHeader,
  headerValue,
  renderHeader,
  compareFromHeaders,
  compareRecipientsHeaders,
  compareSubjectHeaders,
  compareDateHeaders,
  headersEqual,
} from './headers.js';

export type {
  Header,
  FromHeader,
  RecipientsHeader,
  SubjectHeader,
  DateHeader,
  ContentTypeHeader,
} from './headers.js';

export { Part } from './part.js';

export { Message, compareMessagesByDate, compareMessagesBySubject } from './message.js';
export type { EssentialHeaders } from './message.js';

export { composeMessage, MULTIPART_PLACEHOLDER } from './compose.js';
export type { ComposeOptions } from './compose.js';
