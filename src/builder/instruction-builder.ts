import {Address} from '../address';
import {AccountMeta, TransactionInstruction} from '../instruction';

/**
 * Fluent construction of a single instruction. Accounts keep the order
 * they are added in.
 */
export class InstructionBuilder {
  readonly programAddress: Address;
  private _accounts: Array<AccountMeta> = [];
  private _data: Uint8Array = new Uint8Array(0);

  constructor(programAddress: Address) {
    this.programAddress = programAddress;
  }

  account(
    address: Address,
    isSigner: boolean,
    isWritable: boolean,
  ): InstructionBuilder {
    this._accounts.push({address, isSigner, isWritable});
    return this;
  }

  accounts(accounts: Array<AccountMeta>): InstructionBuilder {
    this._accounts.push(...accounts);
    return this;
  }

  data(data: Uint8Array | Array<number>): InstructionBuilder {
    this._data = Uint8Array.from(data);
    return this;
  }

  getAccounts(): ReadonlyArray<AccountMeta> {
    return this._accounts;
  }

  getData(): Uint8Array {
    return this._data;
  }

  build(): TransactionInstruction {
    return new TransactionInstruction({
      programAddress: this.programAddress,
      accounts: [...this._accounts],
      data: this._data,
    });
  }
}
