import {Buffer} from 'buffer';
import {sha256} from '@noble/hashes/sha256';

import {Address} from './address';
import {DerivationError} from './errors';
import {PROGRAM_IDS} from './programs';
import {isOnCurve} from './utils/ed25519';

/**
 * Maximum length of a single derivation seed in bytes
 */
export const MAX_SEED_LENGTH = 32;

/**
 * Maximum number of seed segments, the bump seed included
 */
export const MAX_SEEDS = 16;

const PDA_MARKER = Buffer.from('ProgramDerivedAddress');

/**
 * Hash function and curve predicate used for address derivation
 */
export interface DerivationPrimitives {
  hash: (data: Uint8Array) => Uint8Array;
  isOnCurve: (bytes: Uint8Array) => boolean;
}

export const defaultDerivationPrimitives: DerivationPrimitives = {
  hash: data => sha256(data),
  isOnCurve,
};

/**
 * Derive a program address from seed segments that already end with the
 * bump seed.
 */
export function createProgramAddressSync(
  seeds: Array<Buffer | Uint8Array>,
  programId: Address,
  primitives: DerivationPrimitives = defaultDerivationPrimitives,
): Address {
  if (seeds.length > MAX_SEEDS) {
    throw new DerivationError(
      'TooManySeeds',
      `At most ${MAX_SEEDS} seeds are allowed, got ${seeds.length}`,
    );
  }
  let buffer = Buffer.alloc(0);
  seeds.forEach(function (seed, index) {
    if (seed.length > MAX_SEED_LENGTH) {
      throw new DerivationError(
        'SeedTooLong',
        `Seed ${index} is ${seed.length} bytes, max is ${MAX_SEED_LENGTH}`,
      );
    }
    buffer = Buffer.concat([buffer, seed]);
  });
  buffer = Buffer.concat([buffer, programId.toBuffer(), PDA_MARKER]);
  const addressBytes = primitives.hash(buffer);
  if (primitives.isOnCurve(addressBytes)) {
    throw new DerivationError(
      'AddressOnCurve',
      `Invalid seeds, address must fall off the curve`,
    );
  }
  return new Address(addressBytes);
}

/**
 * Derive a program address from caller seeds and an explicit bump seed
 */
export function createProgramAddress(
  seeds: Array<Buffer | Uint8Array>,
  bump: number,
  programId: Address,
  primitives: DerivationPrimitives = defaultDerivationPrimitives,
): Address {
  if (!Number.isInteger(bump) || bump < 0 || bump > 255) {
    throw new DerivationError(
      'InvalidBump',
      `Bump seed must be an integer between 0 and 255, got ${bump}`,
    );
  }
  return createProgramAddressSync(
    [...seeds, Uint8Array.of(bump)],
    programId,
    primitives,
  );
}

/**
 * Find a valid program address
 *
 * Valid program addresses must fall off the ed25519 curve. This function
 * iterates the bump seed from 255 down to 0 and returns the first address
 * that is off the curve, together with that bump.
 */
export function findProgramAddress(
  seeds: Array<Buffer | Uint8Array>,
  programId: Address,
  primitives: DerivationPrimitives = defaultDerivationPrimitives,
): [Address, number] {
  for (let bump = 255; bump >= 0; bump--) {
    try {
      const address = createProgramAddress(seeds, bump, programId, primitives);
      return [address, bump];
    } catch (err) {
      if (err instanceof DerivationError && err.kind === 'AddressOnCurve') {
        continue;
      }
      throw err;
    }
  }
  throw new DerivationError(
    'BumpSeedExhausted',
    `Unable to find a viable program address bump seed`,
  );
}

/**
 * Derive an address from a base address, a text seed and a program id
 */
export function createWithSeed(
  fromAddress: Address,
  seed: string,
  programId: Address,
): Address {
  const seedBytes = Buffer.from(seed);
  if (seedBytes.length > MAX_SEED_LENGTH) {
    throw new DerivationError('SeedTooLong', `Max seed length exceeded`);
  }
  const buffer = Buffer.concat([
    fromAddress.toBuffer(),
    seedBytes,
    programId.toBuffer(),
  ]);
  return new Address(sha256(buffer));
}

/**
 * Associated token account of `wallet` for `mint`
 */
export function findAssociatedTokenAddress(
  wallet: Address,
  mint: Address,
  tokenProgramId: Address = PROGRAM_IDS.token,
): [Address, number] {
  return findProgramAddress(
    [wallet.toBuffer(), tokenProgramId.toBuffer(), mint.toBuffer()],
    PROGRAM_IDS.associatedToken,
  );
}

export const seedFromString = (seed: string): Buffer => Buffer.from(seed);

export function seedFromU32(value: number): Buffer {
  const seed = Buffer.alloc(4);
  seed.writeUInt32LE(value);
  return seed;
}

export function seedFromU64(value: number | bigint): Buffer {
  const seed = Buffer.alloc(8);
  seed.writeBigUInt64LE(BigInt(value));
  return seed;
}
