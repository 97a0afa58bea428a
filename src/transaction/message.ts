import {Address} from '../address';
import {Blockhash} from '../blockhash';
import {CompileError} from '../errors';
import {TransactionInstruction} from '../instruction';
import {AddressLookupTableAccount} from '../lookup-table';
import {Message, MessageV0, VersionedMessage} from '../message';
import type {LoadedAddresses} from '../message/account-table';
import {CompileConfig} from './size';

export type TransactionMessageArgs = {
  payerKey: Address;
  instructions: Array<TransactionInstruction>;
  recentBlockhash: Blockhash;
};

/**
 * How to find the addresses a v0 message loads through lookup tables:
 * already resolved, or resolved here from fetched tables
 */
export type DecompileArgs =
  | {loadedAddresses: LoadedAddresses}
  | {addressLookupTableAccounts: Array<AddressLookupTableAccount>};

/**
 * A fee payer, blockhash and instructions that have not been compiled yet
 */
export class TransactionMessage {
  payerKey: Address;
  instructions: Array<TransactionInstruction>;
  recentBlockhash: Blockhash;

  constructor(args: TransactionMessageArgs) {
    this.payerKey = args.payerKey;
    this.instructions = args.instructions;
    this.recentBlockhash = args.recentBlockhash;
  }

  /**
   * Turn account positions back into addresses. Each account gets the
   * signer and writable flags of the header group it sits in, so flags
   * widened during compilation stay widened.
   */
  static decompile(
    message: VersionedMessage,
    args?: DecompileArgs,
  ): TransactionMessage {
    const keys =
      message instanceof MessageV0
        ? message.accountKeys(resolveLoaded(message, args))
        : message.accountKeys();

    const addressAt = (index: number): Address => {
      const address = keys[index];
      if (address === undefined) {
        throw new CompileError(
          'UnknownAccount',
          `Message has no account at position ${index}`,
        );
      }
      return address;
    };

    const instructions = message.compiledInstructions.map(
      compiled =>
        new TransactionInstruction({
          programAddress: addressAt(compiled.programIndex),
          accounts: compiled.accountIndices.map(index => ({
            address: addressAt(index),
            isSigner: message.isAccountSigner(index),
            isWritable: message.isAccountWritable(index),
          })),
          data: compiled.data,
        }),
    );

    return new TransactionMessage({
      payerKey: addressAt(0),
      instructions,
      recentBlockhash: message.recentBlockhash,
    });
  }

  compileToLegacyMessage(config?: CompileConfig): Message {
    return Message.compile(
      {
        payerKey: this.payerKey,
        recentBlockhash: this.recentBlockhash,
        instructions: this.instructions,
      },
      config,
    );
  }

  compileToV0Message(
    addressLookupTableAccounts?: Array<AddressLookupTableAccount>,
    config?: CompileConfig,
  ): MessageV0 {
    return MessageV0.compile(
      {
        payerKey: this.payerKey,
        recentBlockhash: this.recentBlockhash,
        instructions: this.instructions,
        addressLookupTableAccounts,
      },
      config,
    );
  }
}

function resolveLoaded(
  message: MessageV0,
  args: DecompileArgs | undefined,
): LoadedAddresses | undefined {
  if (args === undefined) {
    return undefined;
  }
  return 'loadedAddresses' in args
    ? args.loadedAddresses
    : message.loadAddresses(args.addressLookupTableAccounts);
}
