import { describe, it, expect } from 'vitest';
import { Address } from '../../src/message/address.js';
import { composeMessage, MULTIPART_PLACEHOLDER } from '../../src/message/compose.js';
import {
  dateHeader,
  fromHeader,
  headerValue,
  recipientsHeader,
  subjectHeader,
} from '../../src/message/headers.js';
import type { EssentialHeaders } from '../../src/message/message.js';
import { ValidationError } from '../../src/types/errors.js';
import { expectErr, expectOk } from '../support/result.js';

const headers: EssentialHeaders = {
  from: expectOk(fromHeader(expectOk(Address.create('Ann', 'ann', 'a.it')))),
  to: expectOk(recipientsHeader([expectOk(Address.create('', 'bob', 'b.it'))])),
  subject: expectOk(subjectHeader('Greetings')),
  date: expectOk(dateHeader({ epochMillis: 1606950000000, offsetMinutes: 60 })),
};

describe('composeMessage', () => {
  it('should build a us-ascii single part from ASCII text', () => {
    const message = expectOk(composeMessage({ ...headers, text: 'Hi!' }));
    expect(message.parts).toHaveLength(1);
    expect(headerValue(message.parts[0].contentType)).toBe('text/plain us-ascii');
    expect(message.textBody).toBe('Hi!');
  });

  it('should pick utf-8 for non-ASCII text', () => {
    const message = expectOk(composeMessage({ ...headers, text: 'Ciao è' }));
    expect(message.parts[0].contentType.charset).toBe('utf-8');
  });

  it('should treat an empty html body as absent', () => {
    expect(expectOk(composeMessage({ ...headers, text: 'Hi!', html: '' })).parts).toHaveLength(1);
  });

  it('should build envelope, text and utf-8 html parts', () => {
    const message = expectOk(composeMessage({ ...headers, text: 'Grazie, a presto!', html: '<p>Caffè</p>' }));
    expect(message.parts.map(part => headerValue(part.contentType))).toEqual([
      'multipart/alternative',
      'text/plain us-ascii',
      'text/html utf-8',
    ]);
    expect(message.parts.map(part => part.body)).toEqual([
      MULTIPART_PLACEHOLDER,
      'Grazie, a presto!',
      '<p>Caffè</p>',
    ]);
    expect(message.render().endsWith('\n\nPHA+Q2FmZsOoPC9wPg==\n--frontier--')).toBe(true);
  });

  it('should refuse an html body without a text alternative', () => {
    const error = expectErr(composeMessage({ ...headers, text: '', html: '<p>Hi</p>' }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('An HTML body needs a plain-text alternative');
  });

  it('should allow an empty text-only message', () => {
    const message = expectOk(composeMessage({ ...headers, text: '' }));
    expect(message.render().endsWith('Content-Type: text/plain; charset="us-ascii"\n\n')).toBe(true);
  });
});
