import {InstructionDataBuilder} from './builder/instruction-data-builder';
import {TransactionInstruction} from './instruction';
import {PROGRAM_IDS} from './programs';

/**
 * An enumeration of valid ComputeBudgetInstructionType's
 */
export type ComputeBudgetInstructionType =
  | 'RequestHeapFrame'
  | 'SetComputeUnitLimit'
  | 'SetComputeUnitPrice';

/**
 * Discriminant byte and total data length of each instruction
 */
export const COMPUTE_BUDGET_INSTRUCTION_LAYOUTS = Object.freeze({
  RequestHeapFrame: {index: 1, span: 5},
  SetComputeUnitLimit: {index: 2, span: 5},
  SetComputeUnitPrice: {index: 3, span: 9},
} satisfies Record<ComputeBudgetInstructionType, {index: number; span: number}>);

export type RequestHeapFrameParams = {
  /** Requested transaction-wide program heap size in bytes */
  bytes: number;
};

export type SetComputeUnitLimitParams = {
  /** Transaction-wide compute unit limit */
  units: number;
};

export type SetComputeUnitPriceParams = {
  /** Price of a compute unit in micro-lamports */
  microLamports: number | bigint;
};

const matches = (
  data: Uint8Array,
  type: ComputeBudgetInstructionType,
): boolean => {
  const {index, span} = COMPUTE_BUDGET_INSTRUCTION_LAYOUTS[type];
  return data.length === span && data[0] === index;
};

const view = (data: Uint8Array): DataView =>
  new DataView(data.buffer, data.byteOffset, data.byteLength);

/**
 * Compute unit limit carried by `data`, if it is a SetComputeUnitLimit
 * payload
 */
export function decodeComputeUnitLimit(data: Uint8Array): number | undefined {
  if (!matches(data, 'SetComputeUnitLimit')) {
    return undefined;
  }
  return view(data).getUint32(1, true);
}

/**
 * Compute unit price carried by `data`, if it is a SetComputeUnitPrice
 * payload
 */
export function decodeComputeUnitPrice(data: Uint8Array): bigint | undefined {
  if (!matches(data, 'SetComputeUnitPrice')) {
    return undefined;
  }
  return view(data).getBigUint64(1, true);
}

/**
 * Factory class for transaction instructions to interact with the Compute
 * Budget program
 */
export class ComputeBudgetProgram {
  /** @internal */
  constructor() {}

  static programId = PROGRAM_IDS.computeBudget;

  static requestHeapFrame(params: RequestHeapFrameParams): TransactionInstruction {
    return this.instruction(
      new InstructionDataBuilder()
        .instruction(COMPUTE_BUDGET_INSTRUCTION_LAYOUTS.RequestHeapFrame.index)
        .u32(params.bytes),
    );
  }

  static setComputeUnitLimit(
    params: SetComputeUnitLimitParams,
  ): TransactionInstruction {
    return this.instruction(
      new InstructionDataBuilder()
        .instruction(COMPUTE_BUDGET_INSTRUCTION_LAYOUTS.SetComputeUnitLimit.index)
        .u32(params.units),
    );
  }

  static setComputeUnitPrice(
    params: SetComputeUnitPriceParams,
  ): TransactionInstruction {
    return this.instruction(
      new InstructionDataBuilder()
        .instruction(COMPUTE_BUDGET_INSTRUCTION_LAYOUTS.SetComputeUnitPrice.index)
        .u64(params.microLamports),
    );
  }

  private static instruction(
    data: InstructionDataBuilder,
  ): TransactionInstruction {
    return new TransactionInstruction({
      programAddress: this.programId,
      accounts: [],
      data: data.build(),
    });
  }
}
