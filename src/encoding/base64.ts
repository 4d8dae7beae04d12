/**
 * Base64 encoding/decoding using Node.js Buffer
 *
 * Transports part bodies that are not 7-bit clean (and every HTML body)
 * as UTF-8 bytes in standard Base64.
 */

import { FormatError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Encodes the UTF-8 bytes of a string to base64
 *
 * @param text - The text to encode
 * @returns Base64 encoded string, without line breaks
 */
export function base64Encode(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

/**
 * Decodes a base64 string holding UTF-8 text
 *
 * Whitespace is ignored (MIME base64 can have line breaks). Anything
 * outside the standard alphabet, bad padding, or bytes that are not valid
 * UTF-8 fail with a FormatError.
 *
 * @param encoded - The base64 encoded string
 * @returns The decoded text
 */
export function base64Decode(encoded: string): Result<string> {
  const cleaned = encoded.replace(/\s/g, '');
  if (!BASE64_PATTERN.test(cleaned)) {
    return err(new FormatError('Body is not valid base64', encoded));
  }

  try {
    return ok(utf8.decode(Buffer.from(cleaned, 'base64')));
  } catch (cause) {
    const error = new FormatError('Base64 payload is not valid UTF-8', encoded);
    error.cause = cause;
    return err(error);
  }
}
