import {
  array,
  boolean,
  coerce,
  create,
  instance,
  integer,
  size,
  string,
  type,
} from 'superstruct';

import {Address} from './address';

/**
 * Account metadata used to define instructions
 */
export type AccountMeta = {
  /** An account's address */
  address: Address;
  /** True if an instruction requires a transaction signature matching `address` */
  isSigner: boolean;
  /** True if the `address` can be loaded as a read-write account. */
  isWritable: boolean;
};

/**
 * List of TransactionInstruction object fields that may be initialized at construction
 */
export type TransactionInstructionCtorFields = {
  programAddress: Address;
  accounts: Array<AccountMeta>;
  data?: Uint8Array;
};

export interface TransactionInstructionJSON {
  programAddress: string;
  accounts: {
    address: string;
    isSigner: boolean;
    isWritable: boolean;
  }[];
  data: number[];
}

const AddressFromString = coerce(
  instance(Address),
  string(),
  value => new Address(value),
);

const TransactionInstructionStruct = type({
  programAddress: AddressFromString,
  accounts: array(
    type({
      address: AddressFromString,
      isSigner: boolean(),
      isWritable: boolean(),
    }),
  ),
  data: array(size(integer(), 0, 255)),
});

/**
 * A program invocation before compilation: accounts are referenced by
 * address and keep the order the program expects them in
 */
export class TransactionInstruction {
  programAddress: Address;

  accounts: Array<AccountMeta>;

  /**
   * Program input, opaque to the compiler
   */
  data: Uint8Array = new Uint8Array(0);

  constructor(opts: TransactionInstructionCtorFields) {
    this.programAddress = opts.programAddress;
    this.accounts = opts.accounts;
    if (opts.data) {
      this.data = opts.data;
    }
  }

  toJSON(): TransactionInstructionJSON {
    return {
      programAddress: this.programAddress.toJSON(),
      accounts: this.accounts.map(({address, isSigner, isWritable}) => ({
        address: address.toJSON(),
        isSigner,
        isWritable,
      })),
      data: [...this.data],
    };
  }

  /**
   * Parse and validate an instruction from its JSON description
   *
   * @throws StructError when the value does not describe an instruction
   */
  static fromJSON(value: unknown): TransactionInstruction {
    const {programAddress, accounts, data} = create(
      value,
      TransactionInstructionStruct,
    );
    return new TransactionInstruction({
      programAddress,
      accounts,
      data: Uint8Array.from(data),
    });
  }
}
