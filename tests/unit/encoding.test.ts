/**
 * ASCII check, base64 transport and encoded-word tests
 */

import { describe, it, expect } from 'vitest';
import {
  base64Decode,
  base64Encode,
  decodeWord,
  encodeWord,
  isAscii,
  isEncodedWord,
} from '../../src/encoding/index.js';
import { FormatError } from '../../src/types/errors.js';
import { expectErr, expectOk } from '../support/result.js';

describe('isAscii', () => {
  it('should accept the empty string', () => {
    expect(isAscii('')).toBe(true);
  });

  it('should accept control characters and DEL', () => {
    expect(isAscii('tab\there\r\n\x7f')).toBe(true);
  });

  it('should reject the first character past 0x7F', () => {
    expect(isAscii('\x80')).toBe(false);
    expect(isAscii('Café')).toBe(false);
  });

  it('should reject astral characters', () => {
    expect(isAscii('hi 😀')).toBe(false);
  });
});

describe('base64', () => {
  it('should encode the UTF-8 bytes of the text', () => {
    expect(base64Encode('Café')).toBe('Q2Fmw6k=');
    expect(base64Encode('<p>Hi!</p>')).toBe('PHA+SGkhPC9wPg==');
    expect(base64Encode('')).toBe('');
  });

  it('should decode to the original text', () => {
    expect(expectOk(base64Decode('UsOpc3Vtw6k='))).toBe('Résumé');
    expect(expectOk(base64Decode(''))).toBe('');
  });

  it('should ignore line breaks inside the payload', () => {
    expect(expectOk(base64Decode('Q2Fm\r\nw6k=\n'))).toBe('Café');
  });

  it('should reject characters outside the alphabet', () => {
    const error = expectErr(base64Decode('Q2F*w6k='));
    expect(error).toBeInstanceOf(FormatError);
    expect(error.message).toBe('Body is not valid base64');
  });

  it('should reject a truncated quantum', () => {
    expect(expectErr(base64Decode('Q2Fmw6')).message).toBe('Body is not valid base64');
  });

  it('should reject bytes that are not UTF-8', () => {
    // 0xFF 0xFE
    expect(expectErr(base64Decode('//4=')).message).toBe('Base64 payload is not valid UTF-8');
  });
});

describe('encoded words', () => {
  it('should wrap text in the utf-8 B form', () => {
    expect(encodeWord('Café')).toBe('=?utf-8?B?Q2Fmw6k=?=');
  });

  it('should recognise only the exact prefix and suffix', () => {
    expect(isEncodedWord('=?utf-8?B?Q2Fmw6k=?=')).toBe(true);
    expect(isEncodedWord('=?utf-8?B??=')).toBe(true);
    expect(isEncodedWord('=?UTF-8?B?Q2Fmw6k=?=')).toBe(false);
    expect(isEncodedWord('=?utf-8?Q?Caf=C3=A9?=')).toBe(false);
    expect(isEncodedWord('Re: =?utf-8?B?Q2Fmw6k=?=')).toBe(false);
  });

  it('should decode a word', () => {
    expect(expectOk(decodeWord('=?utf-8?B?Q2lhbyDDqA==?='))).toBe('Ciao è');
  });

  it('should pass plain text through unchanged', () => {
    expect(expectOk(decodeWord('Hello'))).toBe('Hello');
  });

  it('should fail on a word with a broken payload', () => {
    expect(expectErr(decodeWord('=?utf-8?B?%%%?=')).message).toBe('Body is not valid base64');
  });
});
