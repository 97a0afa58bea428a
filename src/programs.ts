import {Address} from './address';

/**
 * Addresses of the well-known on-chain programs
 */
export const PROGRAM_IDS = Object.freeze({
  system: new Address('11111111111111111111111111111111'),
  token: new Address('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA'),
  token2022: new Address('TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb'),
  associatedToken: new Address('ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL'),
  memo: new Address('MemoSq4gqABAXKb96qnH8TysNcWxMyWCqXgDLGmfcHr'),
  bpfLoaderUpgradeable: new Address(
    'BPFLoaderUpgradeab1e11111111111111111111111',
  ),
  computeBudget: new Address('ComputeBudget111111111111111111111111111111'),
  addressLookupTable: new Address(
    'AddressLookupTab1e1111111111111111111111111',
  ),
});

export type ProgramName = keyof typeof PROGRAM_IDS;
