/**
 * Compose policy for new messages
 *
 * @packageDocumentation
 */

import { contentTypeHeader, type ContentTypeHeader } from './headers.js';
import { Message, type EssentialHeaders } from './message.js';
import { Part } from './part.js';
import { isAscii } from '../encoding/ascii.js';
import { MULTIPART_KIND } from '../mime/message-framer.js';
import { ValidationError } from '../types/errors.js';
import { all, err, requirePresent, type Result } from '../types/result.js';

/** Body of the multipart/alternative envelope part */
export const MULTIPART_PLACEHOLDER = 'This is a message with multiple parts in MIME format.';

export interface ComposeOptions extends EssentialHeaders {
  /** Plain-text body */
  text: string;
  /** HTML body; absent or empty for a plain-text message */
  html?: string;
}

function textPart(kind: 'text/plain' | 'text/html', body: string): Result<Part> {
  const charset = kind === 'text/html' || !isAscii(body) ? 'utf-8' : 'us-ascii';
  const header = contentTypeHeader(kind, charset);
  if (!header.ok) return header;
  return Part.create([header.value], body);
}

function envelopePart(): Result<Part> {
  const header: Result<ContentTypeHeader> = contentTypeHeader(MULTIPART_KIND, '');
  if (!header.ok) return header;
  return Part.create([header.value], MULTIPART_PLACEHOLDER);
}

/**
 * Builds a new message from headers and raw bodies
 *
 * A text body alone gives a single text/plain part (us-ascii when 7-bit
 * clean, utf-8 otherwise). A text and an HTML body give a
 * multipart/alternative envelope, the text/plain part and a utf-8
 * text/html part.
 */
export function composeMessage(options: ComposeOptions): Result<Message> {
  const present = requirePresent({ options });
  if (!present.ok) return present;
  const { from, to, subject, date, text, html } = options;
  const fields = requirePresent({ text });
  if (!fields.ok) return fields;

  const headers = { from, to, subject, date };
  if (html === undefined || html === '') {
    const part = textPart('text/plain', text);
    if (!part.ok) return part;
    return Message.create(headers, [part.value]);
  }

  if (text === '') {
    return err(new ValidationError('An HTML body needs a plain-text alternative', 'text'));
  }
  const parts = all([envelopePart(), textPart('text/plain', text), textPart('text/html', html)]);
  if (!parts.ok) return parts;
  return Message.create(headers, parts.value);
}
