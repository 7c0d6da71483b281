import bs58 from 'bs58';

import {isOnCurve} from './utils/ed25519';

/**
 * Size of an address in bytes
 */
export const ADDRESS_LENGTH = 32;

/**
 * Value to be converted into an address
 */
export type AddressInitData = number | string | Uint8Array | Array<number>;

// local counter used by Address.unique()
let uniqueAddressCounter = 1;

function toAddressBytes(value: AddressInitData): Uint8Array {
  if (typeof value === 'string') {
    // assume base 58 encoding by default
    const decoded = bs58.decodeUnsafe(value);
    if (decoded === undefined || decoded.length != ADDRESS_LENGTH) {
      throw new Error(`Invalid address input`);
    }
    return Uint8Array.from(decoded);
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new Error(`Invalid address input`);
    }
    // big endian, right aligned
    const bytes = new Uint8Array(ADDRESS_LENGTH);
    let remaining = value;
    for (let i = ADDRESS_LENGTH - 1; i >= 0 && remaining > 0; i--) {
      bytes[i] = remaining % 256;
      remaining = Math.floor(remaining / 256);
    }
    return bytes;
  }

  if (value.length > ADDRESS_LENGTH) {
    throw new Error(`Invalid address input`);
  }
  // Shorter inputs are treated as big endian numbers and left padded.
  const bytes = new Uint8Array(ADDRESS_LENGTH);
  bytes.set(value, ADDRESS_LENGTH - value.length);
  return bytes;
}

/**
 * A 32 byte account or program identifier. Equality is byte-wise.
 */
export class Address {
  /** @internal */
  private readonly _bytes: Uint8Array;

  /**
   * Create a new Address object
   * @param value address as bytes or base-58 encoded string
   */
  constructor(value: AddressInitData) {
    this._bytes = toAddressBytes(value);
  }

  /**
   * Returns a unique Address for tests and benchmarks using a counter
   */
  static unique(): Address {
    const address = new Address(uniqueAddressCounter);
    uniqueAddressCounter += 1;
    return address;
  }

  /**
   * Default address value. The base58-encoded string representation is all
   * ones; the underlying bytes are all zeros.
   */
  static default: Address = new Address('11111111111111111111111111111111');

  /**
   * Checks if two addresses are equal
   */
  equals(address: Address): boolean {
    const other = address._bytes;
    for (let i = 0; i < ADDRESS_LENGTH; i++) {
      if (this._bytes[i] !== other[i]) {
        return false;
      }
    }
    return true;
  }

  /**
   * Return the base-58 representation of the address
   */
  toBase58(): string {
    return bs58.encode(this._bytes);
  }

  toJSON(): string {
    return this.toBase58();
  }

  /**
   * Return a copy of the raw address bytes
   */
  toBytes(): Uint8Array {
    return new Uint8Array(this._bytes);
  }

  get [Symbol.toStringTag](): string {
    return `Address(${this.toString()})`;
  }

  /**
   * Return the base-58 representation of the address
   */
  toString(): string {
    return this.toBase58();
  }

  /**
   * Check that an address is on the ed25519 curve, i.e. that it can be a
   * public key with a matching secret key.
   */
  static isOnCurve(addressData: AddressInitData): boolean {
    const address = new Address(addressData);
    return isOnCurve(address._bytes);
  }
}
