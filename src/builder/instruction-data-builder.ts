import {Buffer} from 'buffer';
import * as BufferLayout from '@solana/buffer-layout';

import {Address} from '../address';

/**
 * Little-endian instruction payload writer
 */
export class InstructionDataBuilder {
  private chunks: Array<Buffer> = [];

  private write<T>(layout: BufferLayout.Layout<T>, value: T): this {
    const chunk = Buffer.alloc(layout.span);
    layout.encode(value, chunk);
    this.chunks.push(chunk);
    return this;
  }

  /**
   * Single byte instruction discriminant
   */
  instruction(discriminant: number): this {
    return this.u8(discriminant);
  }

  u8(value: number): this {
    return this.write(BufferLayout.u8(), value);
  }

  u16(value: number): this {
    return this.write(BufferLayout.u16(), value);
  }

  u32(value: number): this {
    return this.write(BufferLayout.u32(), value);
  }

  u64(value: number | bigint): this {
    const chunk = Buffer.alloc(8);
    chunk.writeBigUInt64LE(BigInt(value));
    this.chunks.push(chunk);
    return this;
  }

  i64(value: number | bigint): this {
    const chunk = Buffer.alloc(8);
    chunk.writeBigInt64LE(BigInt(value));
    this.chunks.push(chunk);
    return this;
  }

  bool(value: boolean): this {
    return this.u8(value ? 1 : 0);
  }

  bytes(bytes: Uint8Array | Array<number>): this {
    this.chunks.push(Buffer.from(bytes));
    return this;
  }

  address(address: Address): this {
    return this.bytes(address.toBytes());
  }

  /**
   * `0` for none, otherwise `1` followed by the address
   */
  optionAddress(address: Address | null | undefined): this {
    if (address == null) {
      return this.u8(0);
    }
    return this.u8(1).address(address);
  }

  /**
   * UTF-8 bytes behind a u32 length prefix
   */
  string(value: string): this {
    const bytes = Buffer.from(value, 'utf8');
    return this.u32(bytes.length).bytes(bytes);
  }

  build(): Uint8Array {
    return new Uint8Array(Buffer.concat(this.chunks));
  }
}
