import {Address} from '../address';
import type {Blockhash} from '../blockhash';
import {CompileError, DecodeError} from '../errors';
import {AddressLookupTableAccount, loadAddresses} from '../lookup-table';
import {
  MAX_REQUIRED_SIGNATURES,
  MESSAGE_VERSION_0_PREFIX,
} from '../transaction/constants';
import {assertTransactionFitsInPacket, CompileConfig} from '../transaction/size';
import {ByteReader} from '../utils/byte-reader';
import type {LoadedAddresses} from './account-table';
import {compileMessageParts, CompileMessageArgs} from './compile';
import {
  concatBytes,
  decodeAddressTableLookups,
  decodeMessageBody,
  serializeAddressTableLookups,
  serializeMessageBody,
} from './encoding';
import {isSignerIndex, isWritableStaticIndex, programIndices} from './header';
import type {
  CompiledInstruction,
  MessageAddressTableLookup,
  MessageHeader,
} from './index';

export type MessageV0Args = {
  header: MessageHeader;
  /** Accounts stored in the message itself, in header order */
  staticAccountKeys: Array<Address>;
  recentBlockhash: Blockhash;
  compiledInstructions: Array<CompiledInstruction>;
  /** Where the remaining accounts are loaded from */
  addressTableLookups: Array<MessageAddressTableLookup>;
};

export type CompileV0Args = CompileMessageArgs & {
  addressLookupTableAccounts?: Array<AddressLookupTableAccount>;
};

/**
 * A version 0 message. Non-signer accounts found in the given lookup tables
 * are referenced by table position instead of being stored inline.
 */
export class MessageV0 {
  header: MessageHeader;
  staticAccountKeys: Array<Address>;
  recentBlockhash: Blockhash;
  compiledInstructions: Array<CompiledInstruction>;
  addressTableLookups: Array<MessageAddressTableLookup>;

  constructor(args: MessageV0Args) {
    this.header = args.header;
    this.staticAccountKeys = args.staticAccountKeys;
    this.recentBlockhash = args.recentBlockhash;
    this.compiledInstructions = args.compiledInstructions;
    this.addressTableLookups = args.addressTableLookups;
  }

  get version(): 0 {
    return 0;
  }

  get numLoadedWritable(): number {
    return this.addressTableLookups.reduce(
      (count, lookup) => count + lookup.writableIndexes.length,
      0,
    );
  }

  get numLoadedReadonly(): number {
    return this.addressTableLookups.reduce(
      (count, lookup) => count + lookup.readonlyIndexes.length,
      0,
    );
  }

  /**
   * Static keys followed by the loaded writable and loaded read-only keys,
   * the list compiled instructions index into
   *
   * @throws CompileError (`UnknownAccount`) when the message has lookups and
   * `loaded` is missing or does not match them in size
   */
  accountKeys(loaded?: LoadedAddresses): Array<Address> {
    if (loaded === undefined) {
      if (this.addressTableLookups.length > 0) {
        throw new CompileError(
          'UnknownAccount',
          'Addresses loaded through lookup tables must be supplied',
        );
      }
      return [...this.staticAccountKeys];
    }
    if (
      loaded.writable.length !== this.numLoadedWritable ||
      loaded.readonly.length !== this.numLoadedReadonly
    ) {
      throw new CompileError(
        'UnknownAccount',
        `Expected ${this.numLoadedWritable} writable and ${this.numLoadedReadonly} read-only loaded addresses`,
      );
    }
    return [...this.staticAccountKeys, ...loaded.writable, ...loaded.readonly];
  }

  /**
   * Resolve this message's lookups against fetched tables
   */
  loadAddresses(tables: Array<AddressLookupTableAccount>): LoadedAddresses {
    return loadAddresses(this.addressTableLookups, tables);
  }

  static compile(args: CompileV0Args, config?: CompileConfig): MessageV0 {
    const message = new MessageV0(
      compileMessageParts(args, {
        tables: args.addressLookupTableAccounts ?? [],
        maxSignatures: MAX_REQUIRED_SIGNATURES,
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
    const numStatic = this.staticAccountKeys.length;
    if (index < numStatic) {
      return isWritableStaticIndex(this.header, numStatic, index);
    }
    return index - numStatic < this.numLoadedWritable;
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

  serialize(): Uint8Array {
    return concatBytes([
      Uint8Array.of(MESSAGE_VERSION_0_PREFIX),
      serializeMessageBody(this),
      serializeAddressTableLookups(this.addressTableLookups),
    ]);
  }

  static deserialize(serializedMessage: Uint8Array): MessageV0 {
    const reader = new ByteReader(serializedMessage);
    const message = MessageV0.decode(reader);
    reader.assertEnd();
    return message;
  }

  /** @internal */
  static decode(reader: ByteReader): MessageV0 {
    const offset = reader.position;
    const prefix = reader.readU8();
    if (prefix !== MESSAGE_VERSION_0_PREFIX) {
      throw new DecodeError(
        'UnsupportedVersion',
        'Expected the version 0 message prefix',
        {offset, expected: MESSAGE_VERSION_0_PREFIX, found: prefix},
      );
    }
    const body = decodeMessageBody(reader);
    return new MessageV0({
      ...body,
      addressTableLookups: decodeAddressTableLookups(reader),
    });
  }
}
