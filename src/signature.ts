import bs58 from 'bs58';

import {SIGNATURE_LENGTH_IN_BYTES} from './transaction/constants';

/**
 * A 64 byte transaction signature. The all-zero value is the placeholder
 * of a slot that has not been signed yet.
 */
export class Signature {
  /** @internal */
  private readonly _bytes: Uint8Array;

  constructor(value: string | Uint8Array | Array<number>) {
    const bytes = typeof value === 'string' ? bs58.decode(value) : value;
    if (bytes.length !== SIGNATURE_LENGTH_IN_BYTES) {
      throw new Error(`Invalid signature input`);
    }
    this._bytes = Uint8Array.from(bytes);
  }

  /**
   * An unsigned placeholder
   */
  static default(): Signature {
    return new Signature(new Uint8Array(SIGNATURE_LENGTH_IN_BYTES));
  }

  isDefault(): boolean {
    return this._bytes.every(byte => byte === 0);
  }

  equals(signature: Signature): boolean {
    return this._bytes.every((byte, i) => byte === signature._bytes[i]);
  }

  toBytes(): Uint8Array {
    return new Uint8Array(this._bytes);
  }

  toBase58(): string {
    return bs58.encode(this._bytes);
  }

  toJSON(): string {
    return this.toBase58();
  }

  toString(): string {
    return this.toBase58();
  }
}
