import {CompileError} from '../errors';
import type {TransactionInstruction} from '../instruction';
import type {VersionedMessage} from '../message';
import * as shortvec from '../utils/shortvec-encoding';
import {PACKET_DATA_SIZE, SIGNATURE_LENGTH_IN_BYTES} from './constants';

/**
 * Options for message compilation
 */
export type CompileConfig = {
  /** Ceiling for the encoded transaction size in bytes (default: 1232) */
  packetDataSize?: number;
};

/**
 * Exact encoded length of a transaction carrying `message`
 */
export function getTransactionSize(message: VersionedMessage): number {
  const numSignatures = message.header.numRequiredSignatures;
  return (
    shortvec.encodedLengthSize(numSignatures) +
    numSignatures * SIGNATURE_LENGTH_IN_BYTES +
    message.serialize().length
  );
}

/**
 * Reject instructions that cannot fit in a packet on their own, before any
 * of them is encoded
 */
export function assertInstructionsFit(
  instructions: Array<TransactionInstruction>,
  config?: CompileConfig,
): void {
  const packetDataSize = config?.packetDataSize ?? PACKET_DATA_SIZE;
  instructions.forEach((instruction, index) => {
    const length = Math.max(
      instruction.data.length,
      instruction.accounts.length,
    );
    if (length > packetDataSize) {
      throw new CompileError(
        'MessageTooLarge',
        `Instruction ${index} alone exceeds the ${packetDataSize} byte packet limit`,
      );
    }
  });
}

export function assertTransactionFitsInPacket(
  message: VersionedMessage,
  config?: CompileConfig,
): void {
  const packetDataSize = config?.packetDataSize ?? PACKET_DATA_SIZE;
  const size = getTransactionSize(message);
  if (size > packetDataSize) {
    throw new CompileError(
      'MessageTooLarge',
      `Transaction too large: ${size} > ${packetDataSize}`,
    );
  }
}
