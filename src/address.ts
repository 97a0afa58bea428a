import bs58 from 'bs58';
import {Buffer} from 'buffer';

import {isOnCurve} from './utils/ed25519';

/**
 * Size of an address in bytes
 */
export const ADDRESS_LENGTH = 32;

/**
 * Value to be converted into an address
 */
export type AddressInitData = string | Uint8Array | Array<number>;

// local counter used by Address.unique()
let uniqueAddressCounter = 1;

/**
 * A 32 byte account or program address. Equality is byte-exact.
 */
export class Address {
  /** @internal */
  private readonly _bytes: Uint8Array;

  /**
   * @param value 32 raw bytes or their base-58 encoding
   */
  constructor(value: AddressInitData) {
    // assume base 58 encoding for strings
    const bytes = typeof value === 'string' ? bs58.decode(value) : value;
    if (bytes.length !== ADDRESS_LENGTH) {
      throw new Error(`Invalid address input`);
    }
    this._bytes = Uint8Array.from(bytes);
  }

  /**
   * Returns a unique Address for tests and benchmarks using a counter
   */
  static unique(): Address {
    const bytes = Buffer.alloc(ADDRESS_LENGTH);
    bytes.writeUInt32BE(uniqueAddressCounter, ADDRESS_LENGTH - 4);
    uniqueAddressCounter += 1;
    return new Address(bytes);
  }

  /**
   * The all-zero address, `11111111111111111111111111111111` in base-58
   */
  static default: Address = new Address(new Uint8Array(ADDRESS_LENGTH));

  equals(address: Address): boolean {
    const other = address._bytes;
    for (let i = 0; i < ADDRESS_LENGTH; i++) {
      if (this._bytes[i] !== other[i]) {
        return false;
      }
    }
    return true;
  }

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

  toBuffer(): Buffer {
    return Buffer.from(this._bytes);
  }

  get [Symbol.toStringTag](): string {
    return `Address(${this.toString()})`;
  }

  toString(): string {
    return this.toBase58();
  }

  /**
   * Check that an address is a point on the ed25519 curve
   */
  static isOnCurve(addressData: AddressInitData | Address): boolean {
    const address =
      addressData instanceof Address ? addressData : new Address(addressData);
    return isOnCurve(address._bytes);
  }
}
