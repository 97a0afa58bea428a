import bs58 from 'bs58';

import {CompileError} from './errors';

/**
 * Base-58 encoded 32 byte hash of a recent ledger block
 */
export type Blockhash = string;

export const BLOCKHASH_LENGTH = 32;

/**
 * Decode a blockhash, failing unless it is exactly 32 bytes of base-58
 */
export function blockhashToBytes(blockhash: Blockhash): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(blockhash);
  } catch (err) {
    throw new CompileError(
      'InvalidBlockhash',
      `Blockhash ${blockhash} is not valid base-58: ${err}`,
    );
  }
  if (bytes.length !== BLOCKHASH_LENGTH) {
    throw new CompileError(
      'InvalidBlockhash',
      `Blockhash must be ${BLOCKHASH_LENGTH} bytes, got ${bytes.length}`,
    );
  }
  return bytes;
}
