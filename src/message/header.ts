import type {CompiledInstruction, MessageHeader} from './index';

/**
 * Account roles implied by a header. `numStaticAccountKeys` covers only the
 * keys stored in the message itself.
 */
export function isSignerIndex(header: MessageHeader, index: number): boolean {
  return index >= 0 && index < header.numRequiredSignatures;
}

export function isWritableStaticIndex(
  header: MessageHeader,
  numStaticAccountKeys: number,
  index: number,
): boolean {
  if (index < 0 || index >= numStaticAccountKeys) {
    return false;
  }
  if (index < header.numRequiredSignatures) {
    return index < header.numRequiredSignatures - header.numReadonlySigned;
  }
  return index < numStaticAccountKeys - header.numReadonlyUnsigned;
}

/**
 * Distinct program positions used by `instructions`, in first-use order.
 * Positions outside the static keys are left out.
 */
export function programIndices(
  instructions: Array<CompiledInstruction>,
  numStaticAccountKeys: number,
): Array<number> {
  const indices: Array<number> = [];
  for (const {programIndex} of instructions) {
    if (
      programIndex < numStaticAccountKeys &&
      !indices.includes(programIndex)
    ) {
      indices.push(programIndex);
    }
  }
  return indices;
}
