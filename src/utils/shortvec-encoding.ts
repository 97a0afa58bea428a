import {DecodeError} from '../errors';

/**
 * A compact-u16 length never needs more than three bytes: 3 x 7 bits
 * covers every 16-bit value
 */
export const MAX_ENCODED_LENGTH_SIZE = 3;

export const MAX_ENCODABLE_LENGTH = 0xffff;

/**
 * Append the compact-u16 encoding of `len` to `bytes`
 */
export function encodeLength(bytes: Array<number>, len: number): void {
  if (!Number.isInteger(len) || len < 0 || len > MAX_ENCODABLE_LENGTH) {
    throw new RangeError(`Length ${len} cannot be encoded as a compact-u16`);
  }
  let remLen = len;
  for (;;) {
    let elem = remLen & 0x7f;
    remLen >>= 7;
    if (remLen == 0) {
      bytes.push(elem);
      break;
    } else {
      elem |= 0x80;
      bytes.push(elem);
    }
  }
}

/**
 * Number of bytes the compact-u16 encoding of `len` occupies
 */
export function encodedLengthSize(len: number): number {
  const bytes: Array<number> = [];
  encodeLength(bytes, len);
  return bytes.length;
}

/**
 * Decode a compact-u16 length starting at `offset`.
 *
 * Only the canonical encoding is accepted: a multi-byte encoding whose last
 * byte is zero could have been written shorter and is rejected, as is any
 * encoding that needs a fourth byte or overflows 16 bits.
 *
 * @returns the decoded length and the number of bytes it occupied
 */
export function decodeLength(
  bytes: Uint8Array,
  offset: number = 0,
): [length: number, size: number] {
  let len = 0;
  for (let size = 0; ; size++) {
    if (size >= MAX_ENCODED_LENGTH_SIZE) {
      throw new DecodeError(
        'MalformedLength',
        'Compact-u16 length continues past its third byte',
        {offset},
      );
    }
    const position = offset + size;
    if (position >= bytes.length) {
      throw new DecodeError(
        'TruncatedInput',
        'Input ended inside a compact-u16 length',
        {offset: position, expected: 1, found: 0},
      );
    }
    const elem = bytes[position];
    if (size > 0 && elem === 0) {
      throw new DecodeError(
        'MalformedLength',
        'Compact-u16 length is not canonically encoded',
        {offset},
      );
    }
    len |= (elem & 0x7f) << (size * 7);
    if ((elem & 0x80) === 0) {
      if (len > MAX_ENCODABLE_LENGTH) {
        throw new DecodeError(
          'MalformedLength',
          'Compact-u16 length overflows 16 bits',
          {offset},
        );
      }
      return [len, size + 1];
    }
  }
}
