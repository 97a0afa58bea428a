import bs58 from 'bs58';
import {expect} from 'chai';

import {Address} from '../../src/address';
import {CompileError} from '../../src/errors';
import {TransactionInstruction} from '../../src/instruction';
import {AddressLookupTableAccount} from '../../src/lookup-table';
import {Message, MessageV0} from '../../src/message';
import {TransactionMessage} from '../../src/transaction';

const at = (value: number): Address =>
  new Address(new Uint8Array(32).fill(value));

describe('TransactionMessage', () => {
  const recentBlockhash = bs58.encode(new Uint8Array(32).fill(9));
  const payerKey = at(1);
  const cosigner = at(2);
  const vault = at(3);
  const oracle = at(4);
  const program = at(5);

  // metas already carry the widened flags, so decompiling gives them back
  const swap = new TransactionInstruction({
    programAddress: program,
    accounts: [
      {address: payerKey, isSigner: true, isWritable: true},
      {address: cosigner, isSigner: true, isWritable: false},
      {address: vault, isSigner: false, isWritable: true},
      {address: oracle, isSigner: false, isWritable: false},
    ],
    data: Uint8Array.of(4, 2),
  });
  const log = new TransactionInstruction({
    programAddress: program,
    accounts: [{address: oracle, isSigner: false, isWritable: false}],
    data: Uint8Array.of(9),
  });
  const transactionMessage = new TransactionMessage({
    payerKey,
    recentBlockhash,
    instructions: [swap, log],
  });

  it('decompiles a legacy message back into its instructions', () => {
    const message = transactionMessage.compileToLegacyMessage();
    expect(message).to.be.instanceOf(Message);
    expect(TransactionMessage.decompile(message)).to.eql(transactionMessage);
  });

  it('reports the widened role of an account', () => {
    const message = Message.compile({
      payerKey,
      recentBlockhash,
      instructions: [
        new TransactionInstruction({
          programAddress: program,
          accounts: [{address: vault, isSigner: false, isWritable: true}],
        }),
        new TransactionInstruction({
          programAddress: program,
          accounts: [{address: vault, isSigner: false, isWritable: false}],
        }),
      ],
    });

    const {instructions} = TransactionMessage.decompile(message);
    expect(instructions[1].accounts).to.eql([
      {address: vault, isSigner: false, isWritable: true},
    ]);
  });

  describe('v0', () => {
    const table = new AddressLookupTableAccount({
      key: at(6),
      state: {addresses: [oracle, cosigner, vault]},
    });

    it('needs the lookup tables or the loaded addresses', () => {
      const message = transactionMessage.compileToV0Message([table]);
      expect(message.addressTableLookups).to.eql([
        {accountKey: table.key, writableIndexes: [2], readonlyIndexes: [0]},
      ]);
      expect(() => TransactionMessage.decompile(message))
        .to.throw(CompileError)
        .with.property('kind', 'UnknownAccount');
    });

    it('decompiles through the tables', () => {
      const message = transactionMessage.compileToV0Message([table]);
      const fromTables = TransactionMessage.decompile(message, {
        addressLookupTableAccounts: [table],
      });
      expect(fromTables).to.eql(transactionMessage);

      const loadedAddresses = message.loadAddresses([table]);
      expect(TransactionMessage.decompile(message, {loadedAddresses})).to.eql(
        fromTables,
      );
    });

    it('matches the legacy layout when nothing is loaded', () => {
      const legacy = transactionMessage.compileToLegacyMessage();
      const v0 = transactionMessage.compileToV0Message();
      expect(v0).to.be.instanceOf(MessageV0);
      expect(v0.staticAccountKeys).to.eql(legacy.staticAccountKeys);
      expect(v0.compiledInstructions).to.eql(legacy.compiledInstructions);
      expect(TransactionMessage.decompile(v0)).to.eql(transactionMessage);
    });
  });

  it('passes the compile config through', () => {
    expect(() =>
      transactionMessage.compileToLegacyMessage({packetDataSize: 100}),
    )
      .to.throw(CompileError)
      .with.property('kind', 'MessageTooLarge');
  });

  it('fails on an account position past the key list', () => {
    const message = new Message({
      header: {
        numRequiredSignatures: 1,
        numReadonlySigned: 0,
        numReadonlyUnsigned: 0,
      },
      staticAccountKeys: [payerKey],
      recentBlockhash,
      compiledInstructions: [
        {programIndex: 4, accountIndices: [], data: new Uint8Array(0)},
      ],
    });
    expect(() => TransactionMessage.decompile(message))
      .to.throw(CompileError, 'Message has no account at position 4')
      .with.property('kind', 'UnknownAccount');
  });
});
