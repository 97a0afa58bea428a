import {Address} from './address';
import {Signature} from './signature';
import {
  generateKeypair,
  getPublicKey,
  keypairFromSeed,
  sign,
  Ed25519Keypair,
} from './utils/ed25519';

/**
 * Anything that can produce a signature on behalf of an address
 */
export interface Signer {
  publicKey: Address;
  signMessage(message: Uint8Array): Signature;
}

const SEED_LENGTH = 32;
const SECRET_KEY_LENGTH = 64;

/**
 * In-memory ed25519 signer
 */
export class Keypair implements Signer {
  readonly publicKey: Address;
  private readonly keys: Ed25519Keypair;

  private constructor(keys: Ed25519Keypair) {
    this.keys = keys;
    this.publicKey = new Address(keys.publicKey);
  }

  static generate(): Keypair {
    return new Keypair(generateKeypair());
  }

  static fromSeed(seed: Uint8Array): Keypair {
    if (seed.length !== SEED_LENGTH) {
      throw new Error(
        `Seed must be ${SEED_LENGTH} bytes, got ${seed.length}`,
      );
    }
    return new Keypair(keypairFromSeed(seed));
  }

  /**
   * Load a 64 byte secret key (seed followed by public key). Unless
   * `skipValidation` is set, the public half must match the seed.
   */
  static fromSecretKey(
    secretKey: Uint8Array,
    {skipValidation = false}: {skipValidation?: boolean} = {},
  ): Keypair {
    if (secretKey.length !== SECRET_KEY_LENGTH) {
      throw new Error(
        `Secret key must be ${SECRET_KEY_LENGTH} bytes, got ${secretKey.length}`,
      );
    }
    const publicKey = secretKey.slice(SEED_LENGTH);
    if (
      !skipValidation &&
      !new Address(getPublicKey(secretKey.slice(0, SEED_LENGTH))).equals(
        new Address(publicKey),
      )
    ) {
      throw new Error('Secret key does not match its public key');
    }
    return new Keypair({publicKey, secretKey: secretKey.slice()});
  }

  get secretKey(): Uint8Array {
    return this.keys.secretKey.slice();
  }

  signMessage(message: Uint8Array): Signature {
    return new Signature(sign(message, this.keys.secretKey));
  }
}
