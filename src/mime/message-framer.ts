/**
 * Message Framer
 *
 * Splits raw message text into a top-level header block plus one or more
 * boundary-delimited parts, and joins rendered headers and parts back
 * together. The boundary is the fixed literal `frontier`; part bodies are
 * assumed never to contain a `--frontier` line.
 *
 * @packageDocumentation
 */

import { findHeader, parseContentType, parseHeaderBlock, splitHeaderBlock } from './header-parser.js';
import { FormatError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';
import type { Fragment, RawHeader } from '../types/message.js';

/** Multipart boundary written by the encoder */
export const BOUNDARY = 'frontier';

export const MULTIPART_KIND = 'multipart/alternative';

/** Header names every stored message must carry */
export const ESSENTIAL_HEADER_NAMES = ['from', 'to', 'subject', 'date'] as const;

/** Header names that belong to a part rather than to the message */
const PART_HEADER_NAMES = new Set(['content-type', 'content-transfer-encoding', 'mime-version']);

/**
 * Splits a multipart section on boundary delimiter lines
 *
 * @param section - Text from the first part's body to the close delimiter
 * @param boundary - Boundary string (without --)
 * @returns One raw block per part, the first being the envelope body
 */
export function splitMultipartBody(section: string, boundary: string): Result<string[]> {
  const delimiter = `\n--${boundary}\n`;
  const closeDelimiter = `\n--${boundary}--`;

  const content = section.replace(/\s+$/, '');
  if (!content.endsWith(closeDelimiter)) {
    return err(new FormatError(`Missing closing boundary "--${boundary}--"`, section));
  }

  const blocks = content.slice(0, -closeDelimiter.length).split(delimiter);
  if (blocks.length < 2) {
    return err(new FormatError(`Missing boundary "--${boundary}" between parts`, section));
  }
  return ok(blocks);
}

function requireContentType(headers: readonly RawHeader[], raw: string): Result<string> {
  const contentType = findHeader(headers, 'content-type');
  if (contentType === undefined) {
    return err(new FormatError('Part has no Content-Type header', raw));
  }
  return ok(contentType);
}

/**
 * Parses one sub-block of a multipart section (headers, blank line, body)
 */
function decodePartBlock(block: string): Result<Fragment> {
  const { headerBlock, body } = splitHeaderBlock(block);
  if (body === undefined) {
    return err(new FormatError('Part has no blank line after its headers', block));
  }
  const headers = parseHeaderBlock(headerBlock);
  if (!headers.ok) return headers;

  const contentType = requireContentType(headers.value, block);
  if (!contentType.ok) return contentType;
  return ok({ rawHeaders: headers.value, rawBody: body });
}

/**
 * Decodes raw message text into an ordered fragment list
 *
 * The first fragment carries the message headers followed by the first
 * part's own headers; every later fragment carries only its part headers.
 * Bodies are returned still transfer-encoded.
 *
 * @param text - Raw stored message
 */
export function decodeFragments(text: string): Result<Fragment[]> {
  const top = splitHeaderBlock(text);
  if (top.body === undefined) {
    return err(new FormatError('Message has no blank line after its headers', text));
  }
  const topHeaders = parseHeaderBlock(top.headerBlock);
  if (!topHeaders.ok) return topHeaders;

  const messageHeaders = topHeaders.value.filter(header => !PART_HEADER_NAMES.has(header.name));
  for (const name of ESSENTIAL_HEADER_NAMES) {
    if (findHeader(messageHeaders, name) === undefined) {
      return err(new FormatError(`Message is missing the "${name}" header`, text));
    }
  }

  // Legacy layout puts the first part's headers, Content-Type included, in the top block
  let firstPartHeaders = topHeaders.value.filter(header => PART_HEADER_NAMES.has(header.name));
  let remainder = top.body;
  if (findHeader(firstPartHeaders, 'content-type') === undefined) {
    const part = splitHeaderBlock(top.body);
    if (part.body === undefined) {
      return err(new FormatError('First part has no blank line after its headers', top.body));
    }
    const partHeaders = parseHeaderBlock(part.headerBlock);
    if (!partHeaders.ok) return partHeaders;
    firstPartHeaders = [...firstPartHeaders, ...partHeaders.value];
    remainder = part.body;
  }

  const contentTypeValue = requireContentType(firstPartHeaders, text);
  if (!contentTypeValue.ok) return contentTypeValue;
  const contentType = parseContentType(contentTypeValue.value);
  if (!contentType.ok) return contentType;

  const rawHeaders = [...messageHeaders, ...firstPartHeaders];
  if (contentType.value.kind !== MULTIPART_KIND) {
    return ok([{ rawHeaders, rawBody: remainder }]);
  }

  const boundary = contentType.value.params['boundary'];
  if (boundary === undefined || boundary === '') {
    return err(new FormatError('Multipart content type has no boundary', contentTypeValue.value));
  }
  const blocks = splitMultipartBody(remainder, boundary);
  if (!blocks.ok) return blocks;

  const [envelopeBody, ...partBlocks] = blocks.value;
  const fragments: Fragment[] = [{ rawHeaders, rawBody: envelopeBody }];
  for (const block of partBlocks) {
    const fragment = decodePartBlock(block);
    if (!fragment.ok) return fragment;
    fragments.push(fragment.value);
  }
  return ok(fragments);
}

/**
 * Joins rendered message headers and part renderings into message text
 *
 * @param headerLines - Rendered From, To, Subject and Date lines
 * @param parts - Rendered parts, envelope first when more than one
 */
export function encodeFragments(headerLines: readonly string[], parts: readonly string[]): string {
  const head = `${headerLines.join('\n')}\n\n`;
  if (parts.length === 1) {
    return head + parts[0];
  }
  return `${head}${parts.join(`\n--${BOUNDARY}\n`)}\n--${BOUNDARY}--`;
}
