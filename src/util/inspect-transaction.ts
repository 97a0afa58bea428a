import {Buffer} from 'buffer';

import {TransactionInstruction} from '../instruction';
import type {VersionedTransaction} from '../transaction/versioned';

export type Logger = (...args: unknown[]) => void;

/**
 * Checks if all transactions should be logged
 * Returns true if the env variable `TXWIRE_LOG_ALL_TRANSACTIONS` is set
 */
export function checkLogAllTransactions(): boolean {
  return process.env['TXWIRE_LOG_ALL_TRANSACTIONS'] !== undefined;
}

const describeFlags = (isSigner: boolean, isWritable: boolean): string =>
  [isSigner ? 'signer' : undefined, isWritable ? 'writable' : 'readonly']
    .filter(flag => flag !== undefined)
    .join(', ');

const describeData = (data: Uint8Array): string =>
  `0x${Buffer.from(data).toString('hex')} (${data.length} bytes)`;

/**
 * Multi-line, human readable dump of a compiled transaction
 */
export function describeTransaction(transaction: VersionedTransaction): string {
  const {message, signatures} = transaction;
  const {header, staticAccountKeys} = message;
  const present = signatures.filter(signature => !signature.isDefault());

  const lines = [
    `Transaction (${message.version === 'legacy' ? 'legacy' : 'v0'})`,
    `Signatures: ${signatures.length} (${present.length} present)`,
    `Header: ${header.numRequiredSignatures} required signatures, ` +
      `${header.numReadonlySigned} readonly signed, ` +
      `${header.numReadonlyUnsigned} readonly unsigned`,
    'Account keys:',
    ...staticAccountKeys.map(
      (key, index) =>
        `  ${index}: ${key.toBase58()} [${describeFlags(
          message.isAccountSigner(index),
          message.isAccountWritable(index),
        )}]`,
    ),
    `Recent blockhash: ${message.recentBlockhash}`,
    'Instructions:',
    ...message.compiledInstructions.map((ix, index) => {
      // programs loaded through a lookup table have no static key to show
      const program =
        ix.programIndex < staticAccountKeys.length
          ? staticAccountKeys[ix.programIndex].toBase58()
          : `#${ix.programIndex}`;
      return (
        `  ${index}: program ${program}, ` +
        `accounts [${ix.accountIndices.join(', ')}], ` +
        `data ${describeData(ix.data)}`
      );
    }),
  ];

  if (message.addressTableLookups.length > 0) {
    lines.push('Address table lookups:');
    message.addressTableLookups.forEach((lookup, index) => {
      lines.push(
        `  ${index}: ${lookup.accountKey.toBase58()} ` +
          `writable [${lookup.writableIndexes.join(', ')}] ` +
          `readonly [${lookup.readonlyIndexes.join(', ')}]`,
      );
    });
  }

  return lines.join('\n');
}

/**
 * Multi-line, human readable dump of an uncompiled instruction
 */
export function describeInstruction(instruction: TransactionInstruction): string {
  const lines = [`Program: ${instruction.programAddress.toBase58()}`];
  if (instruction.accounts.length === 0) {
    lines.push('Accounts: none');
  } else {
    lines.push('Accounts:');
    instruction.accounts.forEach(({address, isSigner, isWritable}, index) => {
      lines.push(
        `  ${index}: ${address.toBase58()} [${describeFlags(
          isSigner,
          isWritable,
        )}]`,
      );
    });
  }
  lines.push(`Data: ${describeData(instruction.data)}`);
  return lines.join('\n');
}

/**
 * Log a transaction dump, defaults to console.log
 */
export function inspectTransaction(
  transaction: VersionedTransaction,
  log: Logger = console.log,
): void {
  log(describeTransaction(transaction));
}
