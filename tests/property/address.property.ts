/**
 * Property-based tests for the address codec
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { decodeAddresses, encodeAddress, encodeAddresses, needsQuoting } from '../../src/mime/address-codec.js';
import { Address } from '../../src/message/address.js';
import { expectOk } from '../support/result.js';
import { addressPartsArb, displayNameArb } from './arbitraries.js';

describe('Address round trips', () => {
  it('decode(encode(list)) returns every part unchanged', () => {
    fc.assert(
      fc.property(fc.array(addressPartsArb, { minLength: 1, maxLength: 6 }), (addresses) => {
        expect(expectOk(decodeAddresses(encodeAddresses(addresses)))).toEqual(addresses);
      }),
      { numRuns: 200 }
    );
  });

  it('Address.parse(address.toString()) equals the address', () => {
    fc.assert(
      fc.property(addressPartsArb, ({ displayName, local, domain }) => {
        const address = expectOk(Address.create(displayName, local, domain));
        const parsed = expectOk(Address.parse(address.toString()));
        expect(parsed.equals(address)).toBe(true);
        expect(parsed.displayName).toBe(displayName);
      }),
      { numRuns: 200 }
    );
  });

  it('a display name is quoted exactly when it has three or more words or holds , or @', () => {
    fc.assert(
      fc.property(displayNameArb.filter(name => name !== ''), (displayName) => {
        const quoted = encodeAddress({ displayName, local: 'a', domain: 'b' }).startsWith('"');
        expect(needsQuoting(displayName)).toBe(displayName.split(' ').length >= 3);
        expect(quoted).toBe(needsQuoting(displayName) || /[,@]/.test(displayName));
      }),
      { numRuns: 200 }
    );
  });
});
