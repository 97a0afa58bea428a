import {sha512} from '@noble/hashes/sha512';
import * as ed25519 from '@noble/ed25519';

/**
 * A 64 byte secret key: the 32 byte private scalar seed followed by the
 * 32 byte public key
 */
export type Ed25519SecretKey = Uint8Array;

export interface Ed25519Keypair {
  publicKey: Uint8Array;
  secretKey: Ed25519SecretKey;
}

// the sync API needs a sha512 implementation supplied up front
ed25519.utils.sha512Sync = (...m) => sha512(ed25519.utils.concatBytes(...m));

export const getPublicKey = (seed: Uint8Array): Uint8Array =>
  ed25519.sync.getPublicKey(seed);

export function keypairFromSeed(seed: Uint8Array): Ed25519Keypair {
  const publicKey = getPublicKey(seed);
  const secretKey = new Uint8Array(64);
  secretKey.set(seed);
  secretKey.set(publicKey, 32);
  return {publicKey, secretKey};
}

export const generateKeypair = (): Ed25519Keypair =>
  keypairFromSeed(ed25519.utils.randomPrivateKey());

/**
 * True when the 32 bytes decompress to a point on the ed25519 curve, i.e.
 * when some private key could produce signatures for them
 */
export function isOnCurve(bytes: Uint8Array): boolean {
  try {
    ed25519.Point.fromHex(bytes, true /* strict */);
    return true;
  } catch {
    return false;
  }
}

export const sign = (
  message: Uint8Array,
  secretKey: Ed25519SecretKey,
): Uint8Array => ed25519.sync.sign(message, secretKey.slice(0, 32));

export const verify = (
  signature: Uint8Array,
  message: Uint8Array,
  publicKey: Uint8Array,
): boolean => ed25519.sync.verify(signature, message, publicKey);
