/**
 * RFC 2047 encoded words, restricted to the single form this dialect
 * emits: `=?utf-8?B?<base64>?=`. Used only for the Subject header.
 */

import { base64Decode, base64Encode } from './base64.js';
import { ok, type Result } from '../types/result.js';

const WORD_PREFIX = '=?utf-8?B?';
const WORD_SUFFIX = '?=';

/**
 * Tests whether text is wrapped exactly in `=?utf-8?B?` ... `?=`
 */
export function isEncodedWord(text: string): boolean {
  return (
    text.length >= WORD_PREFIX.length + WORD_SUFFIX.length &&
    text.startsWith(WORD_PREFIX) &&
    text.endsWith(WORD_SUFFIX)
  );
}

/**
 * Wraps text as a base64 encoded word
 *
 * @param text - The text to encode
 * @returns `=?utf-8?B?<base64(text)>?=`
 */
export function encodeWord(text: string): string {
  return `${WORD_PREFIX}${base64Encode(text)}${WORD_SUFFIX}`;
}

/**
 * Unwraps a base64 encoded word
 *
 * Text that does not carry exactly the `=?utf-8?B?` prefix and `?=` suffix
 * is returned as-is.
 *
 * @param text - Header value potentially holding an encoded word
 * @returns The decoded text
 */
export function decodeWord(text: string): Result<string> {
  if (!isEncodedWord(text)) {
    return ok(text);
  }
  return base64Decode(text.slice(WORD_PREFIX.length, text.length - WORD_SUFFIX.length));
}
