import * as BufferLayout from '@solana/buffer-layout';

import {Address} from '../address';
import {
  ComputeBudgetProgram,
  decodeComputeUnitLimit,
  decodeComputeUnitPrice,
} from '../compute-budget';
import {CompileError, DecodeError, SigningError} from '../errors';
import {TransactionInstruction} from '../instruction';
import {Signer} from '../keypair';
import * as Layout from '../layout';
import {Message} from '../message/legacy';
import {VersionedMessage} from '../message/versioned';
import {Signature} from '../signature';
import assert from '../utils/assert';
import {ByteReader} from '../utils/byte-reader';
import {verify} from '../utils/ed25519';
import * as shortvec from '../utils/shortvec-encoding';
import {SIGNATURE_LENGTH_IN_BYTES} from './constants';
import {CompileConfig} from './size';

export type TransactionVersion = 'legacy' | 0;

/**
 * Configuration object for VersionedTransaction.serialize()
 */
export type SerializeConfig = {
  /** Require all transaction signatures be present (default: false) */
  requireAllSignatures?: boolean;
  /** Verify provided signatures (default: false) */
  verifySignatures?: boolean;
};

type SignatureErrors = {
  invalid: Array<Address>;
  missing: Array<Address>;
};

/**
 * Versioned transaction class
 */
export class VersionedTransaction {
  signatures: Array<Signature>;
  message: VersionedMessage;

  get version(): TransactionVersion {
    return this.message.version;
  }

  constructor(message: VersionedMessage, signatures?: Array<Signature>) {
    if (signatures !== undefined) {
      assert(
        signatures.length === message.header.numRequiredSignatures,
        'Expected signatures length to be equal to the number of required signatures',
      );
      this.signatures = signatures;
    } else {
      const defaultSignatures = [];
      for (let i = 0; i < message.header.numRequiredSignatures; i++) {
        defaultSignatures.push(Signature.default());
      }
      this.signatures = defaultSignatures;
    }
    this.message = message;
  }

  /**
   * Addresses whose signatures this transaction requires, in slot order
   */
  get signerKeys(): Array<Address> {
    return this.message.staticAccountKeys.slice(
      0,
      this.message.header.numRequiredSignatures,
    );
  }

  serialize(config?: SerializeConfig): Uint8Array {
    const {requireAllSignatures = false, verifySignatures = false} =
      config ?? {};
    const serializedMessage = this.message.serialize();

    const sigErrors = this.getSignatureErrors(
      serializedMessage,
      requireAllSignatures,
      verifySignatures,
    );
    if (sigErrors) {
      let errorMessage = 'Signature verification failed.';
      if (sigErrors.invalid.length > 0) {
        errorMessage += `\nInvalid signature for address${
          sigErrors.invalid.length === 1 ? '' : '(es)'
        } [\`${sigErrors.invalid.map(a => a.toBase58()).join('`, `')}\`].`;
      }
      if (sigErrors.missing.length > 0) {
        errorMessage += `\nMissing signature for address${
          sigErrors.missing.length === 1 ? '' : '(es)'
        } [\`${sigErrors.missing.map(a => a.toBase58()).join('`, `')}\`].`;
      }
      throw new SigningError(
        sigErrors.invalid.length > 0 ? 'InvalidSignature' : 'MissingSignature',
        errorMessage,
      );
    }

    const encodedSignaturesLength = Array<number>();
    shortvec.encodeLength(encodedSignaturesLength, this.signatures.length);

    const transactionLayout = BufferLayout.struct<{
      encodedSignaturesLength: Uint8Array;
      signatures: Array<Uint8Array>;
      serializedMessage: Uint8Array;
    }>([
      BufferLayout.blob(
        encodedSignaturesLength.length,
        'encodedSignaturesLength',
      ),
      BufferLayout.seq(
        Layout.signature(),
        this.signatures.length,
        'signatures',
      ),
      BufferLayout.blob(serializedMessage.length, 'serializedMessage'),
    ]);

    const serializedTransaction = new Uint8Array(transactionLayout.span);
    const serializedTransactionLength = transactionLayout.encode(
      {
        encodedSignaturesLength: new Uint8Array(encodedSignaturesLength),
        signatures: this.signatures.map(signature => signature.toBytes()),
        serializedMessage,
      },
      serializedTransaction,
    );

    return serializedTransaction.slice(0, serializedTransactionLength);
  }

  /**
   * Decode a wire-format transaction of either message version
   */
  static deserialize(serializedTransaction: Uint8Array): VersionedTransaction {
    const reader = new ByteReader(serializedTransaction);

    const signatures: Array<Signature> = [];
    const signaturesLength = reader.readLength(SIGNATURE_LENGTH_IN_BYTES);
    for (let i = 0; i < signaturesLength; i++) {
      signatures.push(
        new Signature(reader.readBytes(SIGNATURE_LENGTH_IN_BYTES)),
      );
    }

    const messageOffset = reader.position;
    const message = VersionedMessage.decode(reader);
    reader.assertEnd();

    if (signatures.length !== message.header.numRequiredSignatures) {
      throw new DecodeError(
        'InconsistentHeader',
        'Signature count does not match the number of required signatures',
        {
          offset: messageOffset,
          expected: message.header.numRequiredSignatures,
          found: signatures.length,
        },
      );
    }
    return new VersionedTransaction(message, signatures);
  }

  /**
   * Fill the slot of each signer with its signature over the message
   */
  sign(signers: Array<Signer>): void {
    const messageData = this.message.serialize();
    for (const signer of signers) {
      const signerIndex = this.getSignerIndex(signer.publicKey);
      this.signatures[signerIndex] = signer.signMessage(messageData);
    }
  }

  /**
   * Add an externally created signature to the transaction
   */
  addSignature(address: Address, signature: Signature): void {
    const signerIndex = this.getSignerIndex(address);
    this.signatures[signerIndex] = signature;
  }

  /**
   * Verify every present signature against the message
   *
   * @param requireAllSignatures also fail when a slot is unsigned
   */
  verifySignatures(requireAllSignatures: boolean = true): boolean {
    return (
      this.getSignatureErrors(
        this.message.serialize(),
        requireAllSignatures,
        true,
      ) === undefined
    );
  }

  /**
   * True once every required signature slot is filled. Signatures are not
   * verified.
   */
  isSigned(): boolean {
    return this.signatures.every(signature => !signature.isDefault());
  }

  /**
   * Append an instruction to a compiled legacy transaction. Signatures are
   * cleared since the message changes.
   *
   * @throws CompileError (`UnsupportedVersion`) for a v0 transaction
   */
  addInstruction(
    instruction: TransactionInstruction,
    config?: CompileConfig,
  ): void {
    if (!(this.message instanceof Message)) {
      throw new CompileError(
        'UnsupportedVersion',
        'Instructions can only be appended to legacy transactions',
      );
    }
    this.message = this.message.withInstruction(instruction, config);
    this.clearSignatures();
  }

  /**
   * Micro-lamport price set by the first SetComputeUnitPrice instruction
   */
  getComputeUnitPrice(): bigint | undefined {
    return this.findComputeBudgetValue(decodeComputeUnitPrice);
  }

  /**
   * Rewrite the first SetComputeUnitPrice instruction. Returns false, leaving
   * the transaction untouched, when there is none.
   */
  setComputeUnitPrice(microLamports: number | bigint): boolean {
    return this.replaceComputeBudgetData(
      decodeComputeUnitPrice,
      ComputeBudgetProgram.setComputeUnitPrice({microLamports}).data,
    );
  }

  getComputeUnitLimit(): number | undefined {
    return this.findComputeBudgetValue(decodeComputeUnitLimit);
  }

  /**
   * Rewrite the first SetComputeUnitLimit instruction. Returns false, leaving
   * the transaction untouched, when there is none.
   */
  setComputeUnitLimit(units: number): boolean {
    return this.replaceComputeBudgetData(
      decodeComputeUnitLimit,
      ComputeBudgetProgram.setComputeUnitLimit({units}).data,
    );
  }

  /** @internal */
  private computeBudgetPosition<T>(
    decode: (data: Uint8Array) => T | undefined,
  ): number {
    const {staticAccountKeys, compiledInstructions} = this.message;
    return compiledInstructions.findIndex(
      ({programIndex, data}) =>
        programIndex < staticAccountKeys.length &&
        staticAccountKeys[programIndex].equals(ComputeBudgetProgram.programId) &&
        decode(data) !== undefined,
    );
  }

  /** @internal */
  private findComputeBudgetValue<T>(
    decode: (data: Uint8Array) => T | undefined,
  ): T | undefined {
    const position = this.computeBudgetPosition(decode);
    if (position < 0) {
      return undefined;
    }
    return decode(this.message.compiledInstructions[position].data);
  }

  /** @internal */
  private replaceComputeBudgetData<T>(
    decode: (data: Uint8Array) => T | undefined,
    data: Uint8Array,
  ): boolean {
    const position = this.computeBudgetPosition(decode);
    if (position < 0) {
      return false;
    }
    this.message.compiledInstructions = this.message.compiledInstructions.map(
      (instruction, index) =>
        index === position ? {...instruction, data} : instruction,
    );
    this.clearSignatures();
    return true;
  }

  /** @internal */
  private clearSignatures(): void {
    this.signatures = this.signatures.map(() => Signature.default());
  }

  /** @internal */
  private getSignerIndex(address: Address): number {
    const signerIndex = this.signerKeys.findIndex(key => key.equals(address));
    if (signerIndex < 0) {
      throw new SigningError(
        'UnknownSigner',
        `Cannot sign with non signer key ${address.toBase58()}`,
      );
    }
    return signerIndex;
  }

  /** @internal */
  private getSignatureErrors(
    message: Uint8Array,
    requireAllSignatures: boolean,
    verifySignatures: boolean,
  ): SignatureErrors | undefined {
    const errors: SignatureErrors = {invalid: [], missing: []};
    const signerKeys = this.signerKeys;
    this.signatures.forEach((signature, index) => {
      const address = signerKeys[index];
      if (signature.isDefault()) {
        if (requireAllSignatures) {
          errors.missing.push(address);
        }
      } else if (
        verifySignatures &&
        !verify(signature.toBytes(), message, address.toBytes())
      ) {
        errors.invalid.push(address);
      }
    });
    return errors.invalid.length > 0 || errors.missing.length > 0
      ? errors
      : undefined;
  }
}
