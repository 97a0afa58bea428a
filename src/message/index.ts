import {Address} from '../address';

export * from './account-table';
export type {CompileMessageArgs} from './compile';
export * from './legacy';
export * from './versioned';
export * from './v0';

/**
 * The message header, identifying signed and read-only accounts
 */
export type MessageHeader = {
  /**
   * The number of signatures required for this message to be considered valid. The
   * signatures must match the first `numRequiredSignatures` of the account keys.
   */
  numRequiredSignatures: number;
  /** The last `numReadonlySigned` of the signed keys are read-only accounts */
  numReadonlySigned: number;
  /** The last `numReadonlyUnsigned` of the unsigned keys are read-only accounts */
  numReadonlyUnsigned: number;
};

/**
 * An address table lookup used to load additional accounts
 */
export type MessageAddressTableLookup = {
  accountKey: Address;
  writableIndexes: Array<number>;
  readonlyIndexes: Array<number>;
};

/**
 * An instruction rewritten to reference the account table by index
 */
export type CompiledInstruction = {
  /** Index of the program account that executes this instruction */
  programIndex: number;
  /** Ordered indices of the accounts passed to the program */
  accountIndices: Array<number>;
  /** The program input data */
  data: Uint8Array;
};
