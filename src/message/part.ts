/**
 * Part - one body of a message together with its Content-Type
 *
 * @packageDocumentation
 */

import { headersEqual, renderHeader, type ContentTypeHeader, type Header } from './headers.js';
import { isAscii } from '../encoding/ascii.js';
import { base64Encode } from '../encoding/base64.js';
import { MULTIPART_KIND } from '../mime/message-framer.js';
import { ValidationError } from '../types/errors.js';
import { ok, err, requirePresent, type Result } from '../types/result.js';

export class Part {
  /** Part-local headers, in order; exactly one Content-Type */
  readonly headers: readonly ContentTypeHeader[];
  /** Decoded body text */
  readonly body: string;

  private constructor(headers: readonly ContentTypeHeader[], body: string) {
    this.headers = Object.freeze([...headers]);
    this.body = body;
    Object.freeze(this);
  }

  /**
   * Builds a part from its headers and decoded body
   *
   * A body that is not 7-bit clean, and any text/html body, must declare
   * charset utf-8 since it travels base64-encoded.
   *
   * @param headers - Must hold exactly one Content-Type header and nothing else
   * @param body - Decoded body text
   */
  static create(headers: readonly Header[], body: string): Result<Part> {
    const present = requirePresent({ headers, body });
    if (!present.ok) return present;

    const contentTypes: ContentTypeHeader[] = [];
    for (const header of headers) {
      if (header.type !== 'Content-Type') {
        return err(new ValidationError(
          `Header "${header.type}" does not belong in a message part`,
          'headers'
        ));
      }
      contentTypes.push(header);
    }
    if (contentTypes.length !== 1) {
      return err(new ValidationError(
        'A part must carry exactly one Content-Type header',
        'Content-Type'
      ));
    }

    const [contentType] = contentTypes;
    if ((!isAscii(body) || contentType.kind === 'text/html') && contentType.charset !== 'utf-8') {
      return err(new ValidationError(
        `A ${contentType.kind} body that is base64-transported must declare charset utf-8`,
        'charset'
      ));
    }
    return ok(new Part(contentTypes, body));
  }

  get contentType(): ContentTypeHeader {
    return this.headers[0];
  }

  /** Whether this is the multipart/alternative envelope of a message */
  get isEnvelope(): boolean {
    return this.contentType.kind === MULTIPART_KIND;
  }

  /** Whether the body goes out base64-encoded */
  get isBase64(): boolean {
    return this.contentType.charset === 'utf-8'
      || this.contentType.kind === 'text/html'
      || !isAscii(this.body);
  }

  /**
   * Content-Type rendering, a blank line, then the body
   */
  render(): string {
    const body = this.isBase64 ? base64Encode(this.body) : this.body;
    return `${renderHeader(this.contentType)}\n\n${body}`;
  }

  equals(other: Part): boolean {
    return this.body === other.body
      && this.headers.length === other.headers.length
      && this.headers.every((header, i) => headersEqual(header, other.headers[i]));
  }

  toString(): string {
    return this.render();
  }
}
