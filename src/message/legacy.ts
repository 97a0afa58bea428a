import {Address} from '../address';
import type {Blockhash} from '../blockhash';
import {CompileError, DecodeError} from '../errors';
import {TransactionInstruction} from '../instruction';
import {
  MAX_LEGACY_REQUIRED_SIGNATURES,
  VERSION_PREFIX_MASK,
} from '../transaction/constants';
import {assertTransactionFitsInPacket, CompileConfig} from '../transaction/size';
import {ByteReader} from '../utils/byte-reader';
import {indexInstructions} from './account-table';
import {compileMessageParts, CompileMessageArgs} from './compile';
import {decodeMessageBody, serializeMessageBody} from './encoding';
import {isSignerIndex, isWritableStaticIndex, programIndices} from './header';
import type {
  CompiledInstruction,
  MessageAddressTableLookup,
  MessageHeader,
} from './index';

export type MessageArgs = {
  header: MessageHeader;
  /** Every account the message uses, in header order */
  staticAccountKeys: Array<string | Address>;
  recentBlockhash: Blockhash;
  compiledInstructions: Array<CompiledInstruction>;
};

export type CompileLegacyArgs = CompileMessageArgs;

/**
 * A message without lookup tables: every account is stored inline
 */
export class Message {
  header: MessageHeader;
  staticAccountKeys: Array<Address>;
  recentBlockhash: Blockhash;
  compiledInstructions: Array<CompiledInstruction>;

  constructor(args: MessageArgs) {
    this.header = args.header;
    this.staticAccountKeys = args.staticAccountKeys.map(key =>
      typeof key === 'string' ? new Address(key) : key,
    );
    this.recentBlockhash = args.recentBlockhash;
    this.compiledInstructions = args.compiledInstructions;
  }

  get version(): 'legacy' {
    return 'legacy';
  }

  get addressTableLookups(): Array<MessageAddressTableLookup> {
    return [];
  }

  /**
   * The full key list instructions index into. For a legacy message this is
   * the static list.
   */
  accountKeys(): Array<Address> {
    return [...this.staticAccountKeys];
  }

  /**
   * Order, deduplicate and index every account the instructions reference.
   * The signature count shares its byte with the version flag, so at most
   * 127 signers fit.
   */
  static compile(args: CompileLegacyArgs, config?: CompileConfig): Message {
    const message = new Message(
      compileMessageParts(args, {
        tables: [],
        maxSignatures: MAX_LEGACY_REQUIRED_SIGNATURES,
        config,
      }),
    );
    assertTransactionFitsInPacket(message, config);
    return message;
  }

  isAccountSigner(index: number): boolean {
    return isSignerIndex(this.header, index);
  }

  isAccountWritable(index: number): boolean {
    return isWritableStaticIndex(
      this.header,
      this.staticAccountKeys.length,
      index,
    );
  }

  isProgramId(index: number): boolean {
    return programIndices(
      this.compiledInstructions,
      this.staticAccountKeys.length,
    ).includes(index);
  }

  programIds(): Array<Address> {
    return programIndices(
      this.compiledInstructions,
      this.staticAccountKeys.length,
    ).map(index => this.staticAccountKeys[index]);
  }

  nonProgramIds(): Array<Address> {
    const programs = programIndices(
      this.compiledInstructions,
      this.staticAccountKeys.length,
    );
    return this.staticAccountKeys.filter(
      (_, index) => !programs.includes(index),
    );
  }

  /**
   * A copy of this message with `instruction` appended. Accounts it adds are
   * placed without moving any signer: writable ones at the end of the
   * writable unsigned group, read-only ones at the very end. Existing
   * instructions are re-indexed.
   *
   * @throws CompileError (`AccountRoleConflict`) when the instruction needs a
   * new signer or a wider role for an account already in the message
   */
  withInstruction(
    instruction: TransactionInstruction,
    config?: CompileConfig,
  ): Message {
    const {numReadonlyUnsigned} = this.header;
    const positions = new Map<string, number>();
    this.staticAccountKeys.forEach((key, position) =>
      positions.set(key.toBase58(), position),
    );

    const additions = new Map<
      string,
      {address: Address; isWritable: boolean}
    >();
    const admit = (
      address: Address,
      isSigner: boolean,
      isWritable: boolean,
    ): void => {
      const key = address.toBase58();
      const position = positions.get(key);
      if (position !== undefined) {
        if (
          (isSigner && !this.isAccountSigner(position)) ||
          (isWritable && !this.isAccountWritable(position))
        ) {
          throw new CompileError(
            'AccountRoleConflict',
            `Account ${key} is compiled with a narrower role than the new instruction needs`,
          );
        }
        return;
      }
      if (isSigner) {
        throw new CompileError(
          'AccountRoleConflict',
          `Account ${key} would add a signer to an already compiled message`,
        );
      }
      const addition = additions.get(key) ?? {address, isWritable: false};
      addition.isWritable ||= isWritable;
      additions.set(key, addition);
    };

    for (const meta of instruction.accounts) {
      admit(meta.address, meta.isSigner, meta.isWritable);
    }
    admit(instruction.programAddress, false, false);

    const added = [...additions.values()];
    const writable = added.filter(a => a.isWritable).map(a => a.address);
    const readonly = added.filter(a => !a.isWritable).map(a => a.address);

    const insertAt = this.staticAccountKeys.length - numReadonlyUnsigned;
    const shift = (index: number): number =>
      index < insertAt ? index : index + writable.length;
    const staticAccountKeys = [
      ...this.staticAccountKeys.slice(0, insertAt),
      ...writable,
      ...this.staticAccountKeys.slice(insertAt),
      ...readonly,
    ];
    const compiledInstructions = [
      ...this.compiledInstructions.map(ix => ({
        programIndex: shift(ix.programIndex),
        accountIndices: ix.accountIndices.map(shift),
        data: ix.data,
      })),
      ...indexInstructions(staticAccountKeys, [instruction]),
    ];

    const message = new Message({
      header: {
        ...this.header,
        numReadonlyUnsigned: numReadonlyUnsigned + readonly.length,
      },
      staticAccountKeys,
      recentBlockhash: this.recentBlockhash,
      compiledInstructions,
    });
    assertTransactionFitsInPacket(message, config);
    return message;
  }

  serialize(): Uint8Array {
    return serializeMessageBody(this);
  }

  /**
   * Decode a legacy message, rejecting any bytes left over after it
   */
  static deserialize(serializedMessage: Uint8Array): Message {
    const reader = new ByteReader(serializedMessage);
    const message = Message.decode(reader);
    reader.assertEnd();
    return message;
  }

  /** @internal */
  static decode(reader: ByteReader): Message {
    const offset = reader.position;
    const prefix = reader.peekU8();
    if ((prefix & VERSION_PREFIX_MASK) !== prefix) {
      throw new DecodeError(
        'UnsupportedVersion',
        'Found a versioned message where a legacy message was expected',
        {offset, found: prefix & VERSION_PREFIX_MASK},
      );
    }
    return new Message(decodeMessageBody(reader));
  }
}
