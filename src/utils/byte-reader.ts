import {DecodeError} from '../errors';
import {decodeLength} from './shortvec-encoding';

/**
 * Sequential reader over an encoded transaction or message. Every read is
 * bounds-checked and reports the offset it failed at.
 */
export class ByteReader {
  private bytes: Uint8Array;
  private offset: number = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  peekU8(): number {
    this.ensure(1);
    return this.bytes[this.offset];
  }

  readU8(): number {
    this.ensure(1);
    return this.bytes[this.offset++];
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length);
    // copy into a plain Uint8Array even when reading from a Buffer
    const slice = new Uint8Array(
      this.bytes.subarray(this.offset, this.offset + length),
    );
    this.offset += length;
    return slice;
  }

  /**
   * Read a compact-u16 length and check that at least `length * itemSize`
   * bytes follow it
   */
  readLength(itemSize: number = 1): number {
    const [length, size] = decodeLength(this.bytes, this.offset);
    this.offset += size;
    this.ensure(length * itemSize);
    return length;
  }

  assertEnd(): void {
    if (this.remaining > 0) {
      throw new DecodeError(
        'TrailingBytes',
        'Unexpected bytes after the last instruction',
        {offset: this.offset, expected: 0, found: this.remaining},
      );
    }
  }

  private ensure(length: number): void {
    if (this.remaining < length) {
      throw new DecodeError('TruncatedInput', 'Input ended early', {
        offset: this.offset,
        expected: length,
        found: this.remaining,
      });
    }
  }
}
