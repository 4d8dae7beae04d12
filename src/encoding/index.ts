/**
 * Content encoding utilities for the message codec
 *
 * Implements the ASCII check, base64 body transport and RFC 2047 encoded
 * words using only Node.js built-in modules.
 *
 * @packageDocumentation
 */

export { isAscii } from './ascii.js';
export { base64Encode, base64Decode } from './base64.js';
export { encodeWord, decodeWord, isEncodedWord } from './encoded-word.js';
