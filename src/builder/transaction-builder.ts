import {Address} from '../address';
import {Blockhash} from '../blockhash';
import {ComputeBudgetProgram} from '../compute-budget';
import {CompileError} from '../errors';
import {
  TransactionInstruction,
  TransactionInstructionCtorFields,
} from '../instruction';
import {AddressLookupTableAccount} from '../lookup-table';
import {Message, MessageV0} from '../message';
import {VersionedTransaction} from '../transaction/versioned';
import {
  checkLogAllTransactions,
  inspectTransaction,
  Logger,
} from '../util/inspect-transaction';
import {InstructionBuilder} from './instruction-builder';

/**
 * Compute budget instructions placed ahead of the added instructions
 */
export type ComputeBudgetConfig = {
  computeUnitLimit?: number;
  /** Micro-lamports per compute unit */
  computeUnitPrice?: number | bigint;
  /** Program heap size in bytes */
  heapFrameSize?: number;
};

export type TransactionBuilderConfig = {
  /** Account paying the fees; always the first signer */
  feePayer: Address;
  /** The hash of a recent ledger block */
  recentBlockhash: Blockhash;
  /** Ceiling for the encoded transaction size in bytes (default: 1232) */
  packetDataSize?: number;
  /** Where compiled transactions are logged, defaults to console.log */
  log?: Logger;
  computeBudget?: ComputeBudgetConfig;
};

/**
 * Accumulates instructions for one transaction. Not meant to be shared
 * between concurrent constructions.
 */
export class TransactionBuilder {
  feePayer: Address;
  recentBlockhash: Blockhash;
  instructions: Array<TransactionInstruction> = [];

  private packetDataSize?: number;
  private log: Logger;
  private computeBudget: ComputeBudgetConfig;

  constructor(config: TransactionBuilderConfig) {
    this.feePayer = config.feePayer;
    this.recentBlockhash = config.recentBlockhash;
    this.packetDataSize = config.packetDataSize;
    this.log = config.log ?? console.log;
    this.computeBudget = config.computeBudget ?? {};
  }

  /**
   * Add one or more instructions
   */
  add(
    ...items: Array<
      | TransactionInstruction
      | TransactionInstructionCtorFields
      | InstructionBuilder
    >
  ): TransactionBuilder {
    if (items.length === 0) {
      throw new CompileError('NoInstructions', 'No instructions');
    }

    items.forEach(item => {
      if (item instanceof TransactionInstruction) {
        this.instructions.push(item);
      } else if (item instanceof InstructionBuilder) {
        this.instructions.push(item.build());
      } else {
        this.instructions.push(new TransactionInstruction(item));
      }
    });
    return this;
  }

  /**
   * Compile into an unsigned legacy transaction
   */
  build(): VersionedTransaction {
    this.assertHasInstructions();
    const message = Message.compile(
      {
        payerKey: this.feePayer,
        recentBlockhash: this.recentBlockhash,
        instructions: this.compileInstructions(),
      },
      {packetDataSize: this.packetDataSize},
    );
    return this.finish(new VersionedTransaction(message));
  }

  /**
   * Compile into an unsigned v0 transaction, loading eligible accounts
   * through the given lookup tables
   */
  buildVersioned(
    addressLookupTableAccounts: Array<AddressLookupTableAccount> = [],
  ): VersionedTransaction {
    this.assertHasInstructions();
    const message = MessageV0.compile(
      {
        payerKey: this.feePayer,
        recentBlockhash: this.recentBlockhash,
        instructions: this.compileInstructions(),
        addressLookupTableAccounts,
      },
      {packetDataSize: this.packetDataSize},
    );

    for (const table of addressLookupTableAccounts) {
      const used = message.addressTableLookups.some(lookup =>
        lookup.accountKey.equals(table.key),
      );
      if (!used) {
        console.warn(
          `Address lookup table ${table.key.toBase58()} contributes no accounts to the transaction`,
        );
      }
    }
    return this.finish(new VersionedTransaction(message));
  }

  private assertHasInstructions(): void {
    if (this.instructions.length === 0) {
      throw new CompileError(
        'NoInstructions',
        'Transaction needs at least one instruction',
      );
    }
  }

  /**
   * Requested compute budget instructions (limit, price, heap frame) followed
   * by the added instructions
   */
  private compileInstructions(): Array<TransactionInstruction> {
    const {computeUnitLimit, computeUnitPrice, heapFrameSize} =
      this.computeBudget;
    const budget: Array<TransactionInstruction> = [];
    if (computeUnitLimit !== undefined) {
      budget.push(
        ComputeBudgetProgram.setComputeUnitLimit({units: computeUnitLimit}),
      );
    }
    if (computeUnitPrice !== undefined) {
      budget.push(
        ComputeBudgetProgram.setComputeUnitPrice({
          microLamports: computeUnitPrice,
        }),
      );
    }
    if (heapFrameSize !== undefined) {
      budget.push(ComputeBudgetProgram.requestHeapFrame({bytes: heapFrameSize}));
    }
    return [...budget, ...this.instructions];
  }

  private finish(transaction: VersionedTransaction): VersionedTransaction {
    if (checkLogAllTransactions()) {
      inspectTransaction(transaction, this.log);
    }
    return transaction;
  }
}
