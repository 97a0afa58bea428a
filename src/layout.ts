import * as BufferLayout from '@solana/buffer-layout';

import {ADDRESS_LENGTH} from './address';
import {BLOCKHASH_LENGTH} from './blockhash';
import {SIGNATURE_LENGTH_IN_BYTES} from './transaction/constants';

/**
 * Layout for an address
 */
export const address = (property: string = 'address') => {
  return BufferLayout.blob(ADDRESS_LENGTH, property);
};

/**
 * Layout for a signature
 */
export const signature = (property: string = 'signature') => {
  return BufferLayout.blob(SIGNATURE_LENGTH_IN_BYTES, property);
};

/**
 * Layout for a recent blockhash
 */
export const blockhash = (property: string = 'recentBlockhash') => {
  return BufferLayout.blob(BLOCKHASH_LENGTH, property);
};

