import {Address} from './address';
import {CompileError} from './errors';
import type {LoadedAddresses} from './message/account-table';
import type {MessageAddressTableLookup} from './message/index';

export type AddressLookupTableState = {
  addresses: Array<Address>;
};

/**
 * An on-chain address lookup table, as already fetched by the caller
 */
export class AddressLookupTableAccount {
  key: Address;
  state: AddressLookupTableState;

  constructor(args: {key: Address; state: AddressLookupTableState}) {
    this.key = args.key;
    this.state = args.state;
  }
}

/**
 * Resolve the table lookups of a v0 message against fetched tables
 *
 * @throws CompileError (`UnknownAccount`) when a table is missing or an
 * index points past its end
 */
export function loadAddresses(
  lookups: Array<MessageAddressTableLookup>,
  tables: Array<AddressLookupTableAccount>,
): LoadedAddresses {
  const loaded: LoadedAddresses = {writable: [], readonly: []};
  for (const lookup of lookups) {
    const table = tables.find(candidate =>
      candidate.key.equals(lookup.accountKey),
    );
    if (table === undefined) {
      throw new CompileError(
        'UnknownAccount',
        `Lookup table ${lookup.accountKey.toBase58()} was not provided`,
      );
    }
    const entry = (index: number): Address => {
      const address = table.state.addresses[index];
      if (address === undefined) {
        throw new CompileError(
          'UnknownAccount',
          `Lookup table ${table.key.toBase58()} has no entry ${index}`,
        );
      }
      return address;
    };
    loaded.writable.push(...lookup.writableIndexes.map(entry));
    loaded.readonly.push(...lookup.readonlyIndexes.map(entry));
  }
  return loaded;
}
