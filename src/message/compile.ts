import {Address} from '../address';
import {Blockhash, blockhashToBytes} from '../blockhash';
import {TransactionInstruction} from '../instruction';
import {AddressLookupTableAccount} from '../lookup-table';
import {assertInstructionsFit, CompileConfig} from '../transaction/size';
import {AccountTable, indexInstructions} from './account-table';
import type {
  CompiledInstruction,
  MessageAddressTableLookup,
  MessageHeader,
} from './index';

export type CompileMessageArgs = {
  payerKey: Address;
  instructions: Array<TransactionInstruction>;
  recentBlockhash: Blockhash;
};

type CompileOptions = {
  tables: Array<AddressLookupTableAccount>;
  maxSignatures: number;
  config?: CompileConfig;
};

export type CompiledMessageParts = {
  header: MessageHeader;
  staticAccountKeys: Array<Address>;
  recentBlockhash: Blockhash;
  compiledInstructions: Array<CompiledInstruction>;
  addressTableLookups: Array<MessageAddressTableLookup>;
};

/**
 * Steps shared by both message versions. The caller checks the encoded size,
 * which depends on the version.
 */
export function compileMessageParts(
  args: CompileMessageArgs,
  {tables, maxSignatures, config}: CompileOptions,
): CompiledMessageParts {
  blockhashToBytes(args.recentBlockhash);
  assertInstructionsFit(args.instructions, config);

  const accounts = AccountTable.collect(args.payerKey, args.instructions);
  const {lookups, loaded} = accounts.drawFromTables(tables);
  const {header, staticAccountKeys} = accounts.layout(maxSignatures);
  const compiledInstructions = indexInstructions(
    [...staticAccountKeys, ...loaded.writable, ...loaded.readonly],
    args.instructions,
  );

  return {
    header,
    staticAccountKeys,
    recentBlockhash: args.recentBlockhash,
    compiledInstructions,
    addressTableLookups: lookups,
  };
}
