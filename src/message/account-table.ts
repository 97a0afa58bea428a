import {Address} from '../address';
import {CompileError} from '../errors';
import {TransactionInstruction} from '../instruction';
import {AddressLookupTableAccount} from '../lookup-table';
import {
  MAX_ACCOUNT_KEYS,
  MAX_REQUIRED_SIGNATURES,
} from '../transaction/constants';
import assert from '../utils/assert';
import type {
  CompiledInstruction,
  MessageAddressTableLookup,
  MessageHeader,
} from './index';

/**
 * The merged role of one account across every instruction of a message
 */
export type AccountRole = {
  isSigner: boolean;
  isWritable: boolean;
  /** Referenced as the program of some instruction */
  isInvoked: boolean;
};

/**
 * Addresses a v0 message loads from its lookup tables, writable ones first
 */
export type LoadedAddresses = {
  writable: Array<Address>;
  readonly: Array<Address>;
};

/**
 * The static half of a compiled message
 */
export type AccountLayout = {
  header: MessageHeader;
  staticAccountKeys: Array<Address>;
};

type Entry = AccountRole & {address: Address};

/**
 * Every account a set of instructions touches, deduplicated by address. An
 * account's flags only ever widen: once a signer or writable, always so.
 */
export class AccountTable {
  readonly payer: Address;
  // Map iteration keeps first-seen order
  private entries = new Map<string, Entry>();

  private constructor(payer: Address) {
    this.payer = payer;
  }

  /**
   * Register the fee payer, then the accounts and program of each
   * instruction in turn
   */
  static collect(
    payer: Address,
    instructions: Array<TransactionInstruction>,
  ): AccountTable {
    const table = new AccountTable(payer);
    table.merge(payer, {isSigner: true, isWritable: true});
    for (const instruction of instructions) {
      for (const meta of instruction.accounts) {
        table.merge(meta.address, meta);
      }
      table.merge(instruction.programAddress, {isInvoked: true});
    }
    return table;
  }

  get size(): number {
    return this.entries.size;
  }

  role(address: Address): AccountRole | undefined {
    const entry = this.entries.get(address.toBase58());
    if (entry === undefined) {
      return undefined;
    }
    const {isSigner, isWritable, isInvoked} = entry;
    return {isSigner, isWritable, isInvoked};
  }

  addresses(): Array<Address> {
    return [...this.entries.values()].map(entry => entry.address);
  }

  /**
   * Take every account that may be loaded through a lookup table out of the
   * static set. Signers and programs always stay static. Tables are tried in
   * order and a table that holds none of the remaining accounts produces no
   * lookup.
   */
  drawFromTables(tables: Array<AddressLookupTableAccount>): {
    lookups: Array<MessageAddressTableLookup>;
    loaded: LoadedAddresses;
  } {
    const lookups: Array<MessageAddressTableLookup> = [];
    const loaded: LoadedAddresses = {writable: [], readonly: []};

    for (const table of tables) {
      const positions = new Map<string, number>();
      table.state.addresses.forEach((address, position) => {
        const key = address.toBase58();
        if (!positions.has(key)) {
          positions.set(key, position);
        }
      });

      const lookup: MessageAddressTableLookup = {
        accountKey: table.key,
        writableIndexes: [],
        readonlyIndexes: [],
      };
      const drawn = {writable: Array<Address>(), readonly: Array<Address>()};

      for (const [key, entry] of this.entries) {
        if (entry.isSigner || entry.isInvoked) {
          continue;
        }
        const position = positions.get(key);
        if (position === undefined) {
          continue;
        }
        if (position > 255) {
          throw new CompileError(
            'LookupTableIndexOverflow',
            `Account ${key} is entry ${position} of lookup table ${table.key.toBase58()}, only entries up to 255 can be referenced`,
          );
        }
        if (entry.isWritable) {
          lookup.writableIndexes.push(position);
          drawn.writable.push(entry.address);
        } else {
          lookup.readonlyIndexes.push(position);
          drawn.readonly.push(entry.address);
        }
        this.entries.delete(key);
      }

      if (drawn.writable.length + drawn.readonly.length > 0) {
        lookups.push(lookup);
        loaded.writable.push(...drawn.writable);
        loaded.readonly.push(...drawn.readonly);
      }
    }

    return {lookups, loaded};
  }

  /**
   * Order the static accounts into writable signers, read-only signers,
   * writable non-signers and read-only non-signers, and derive the header
   *
   * @param maxSignatures largest signature count the message format allows
   */
  layout(maxSignatures: number = MAX_REQUIRED_SIGNATURES): AccountLayout {
    const groups: [
      Array<Entry>,
      Array<Entry>,
      Array<Entry>,
      Array<Entry>,
    ] = [[], [], [], []];
    for (const entry of this.entries.values()) {
      const group = (entry.isSigner ? 0 : 2) + (entry.isWritable ? 0 : 1);
      groups[group].push(entry);
    }
    const [writableSigners, readonlySigners, , readonlyUnsigned] = groups;

    const numRequiredSignatures =
      writableSigners.length + readonlySigners.length;
    if (numRequiredSignatures > maxSignatures) {
      throw new CompileError(
        'TooManySignatures',
        `Message needs ${numRequiredSignatures} signatures but at most ${maxSignatures} fit`,
      );
    }
    if (this.entries.size > MAX_ACCOUNT_KEYS) {
      throw new CompileError(
        'AccountLimitExceeded',
        `Message keeps ${this.entries.size} static accounts but at most ${MAX_ACCOUNT_KEYS} can be indexed`,
      );
    }

    assert(
      writableSigners.length > 0 &&
        writableSigners[0].address.equals(this.payer),
      'Fee payer must be the first writable signer',
    );

    return {
      header: {
        numRequiredSignatures,
        numReadonlySigned: readonlySigners.length,
        numReadonlyUnsigned: readonlyUnsigned.length,
      },
      staticAccountKeys: groups.flat().map(entry => entry.address),
    };
  }

  private merge(address: Address, flags: Partial<AccountRole>): void {
    const key = address.toBase58();
    let entry = this.entries.get(key);
    if (entry === undefined) {
      entry = {address, isSigner: false, isWritable: false, isInvoked: false};
      this.entries.set(key, entry);
    }
    entry.isSigner ||= flags.isSigner === true;
    entry.isWritable ||= flags.isWritable === true;
    entry.isInvoked ||= flags.isInvoked === true;
  }
}

/**
 * Replace the addresses of each instruction with positions in `keys`, the
 * full key list of the message (static keys, then loaded writable, then
 * loaded read-only)
 */
export function indexInstructions(
  keys: Array<Address>,
  instructions: Array<TransactionInstruction>,
): Array<CompiledInstruction> {
  if (keys.length > MAX_ACCOUNT_KEYS) {
    throw new CompileError(
      'AccountLimitExceeded',
      `Message references ${keys.length} accounts but at most ${MAX_ACCOUNT_KEYS} can be indexed`,
    );
  }

  const positions = new Map<string, number>();
  keys.forEach((key, position) => positions.set(key.toBase58(), position));
  const indexOf = (address: Address): number => {
    const position = positions.get(address.toBase58());
    if (position === undefined) {
      throw new CompileError(
        'UnknownAccount',
        `Account ${address.toBase58()} is missing from the message account table`,
      );
    }
    return position;
  };

  return instructions.map(instruction => ({
    programIndex: indexOf(instruction.programAddress),
    accountIndices: instruction.accounts.map(meta => indexOf(meta.address)),
    data: instruction.data,
  }));
}
