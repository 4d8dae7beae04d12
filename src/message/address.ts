/**
 * Address - an email address with an optional display name
 *
 * Equality and ordering consider only the local and domain parts.
 *
 * @packageDocumentation
 */

import { isAscii } from '../encoding/ascii.js';
import { decodeAddress, encodeAddress, isValidAddressPart } from '../mime/address-codec.js';
import { ValidationError } from '../types/errors.js';
import { ok, err, requirePresent, type Result } from '../types/result.js';
import type { AddressParts } from '../types/message.js';

export class Address implements AddressParts {
  readonly displayName: string;
  readonly local: string;
  readonly domain: string;

  private constructor(displayName: string, local: string, domain: string) {
    this.displayName = displayName;
    this.local = local;
    this.domain = domain;
    Object.freeze(this);
  }

  /**
   * Builds an address from its three parts
   *
   * @param displayName - Display name, or `''` when there is none
   * @param local - Part before the `@`
   * @param domain - Part after the `@`
   */
  static create(displayName: string, local: string, domain: string): Result<Address> {
    const present = requirePresent({ displayName, local, domain });
    if (!present.ok) return present;

    if (!isValidAddressPart(local)) {
      return err(new ValidationError(`Local part "${local}" is not a valid address token`, 'local'));
    }
    if (!isValidAddressPart(domain)) {
      return err(new ValidationError(`Domain "${domain}" is not a valid address token`, 'domain'));
    }
    if (!isAscii(displayName) || /["<>\r\n]/.test(displayName)) {
      return err(new ValidationError(
        'Display name must be ASCII without quotes, angle brackets or line breaks',
        'displayName'
      ));
    }
    return ok(new Address(displayName, local, domain));
  }

  /**
   * Builds an address from parsed parts
   */
  static fromParts(parts: AddressParts): Result<Address> {
    const present = requirePresent({ parts });
    if (!present.ok) return present;
    return Address.create(parts.displayName, parts.local, parts.domain);
  }

  /**
   * Parses a single rendered address (`Name <local@domain>` or `local@domain`)
   */
  static parse(text: string): Result<Address> {
    const present = requirePresent({ text });
    if (!present.ok) return present;

    const parts = decodeAddress(text);
    if (!parts.ok) return parts;
    return Address.fromParts(parts.value);
  }

  /** `local@domain` */
  get mailbox(): string {
    return `${this.local}@${this.domain}`;
  }

  compareTo(other: Address): number {
    if (this.local !== other.local) {
      return this.local < other.local ? -1 : 1;
    }
    if (this.domain !== other.domain) {
      return this.domain < other.domain ? -1 : 1;
    }
    return 0;
  }

  equals(other: Address): boolean {
    return this.local === other.local && this.domain === other.domain;
  }

  /** The wire rendering, quoting the display name when needed */
  toString(): string {
    return encodeAddress(this);
  }
}

/**
 * Orders addresses by local part, then domain
 */
export function compareAddresses(a: Address, b: Address): number {
  return a.compareTo(b);
}
