import bs58 from 'bs58';
import {expect} from 'chai';
import sinon from 'sinon';

import {Address} from '../src/address';
import {TransactionInstruction} from '../src/instruction';
import {Keypair} from '../src/keypair';
import {Message, MessageV0} from '../src/message';
import {VersionedTransaction} from '../src/transaction';
import {
  checkLogAllTransactions,
  describeInstruction,
  describeTransaction,
  inspectTransaction,
} from '../src/util/inspect-transaction';

function filledAddress(value: number): Address {
  return new Address(new Uint8Array(32).fill(value));
}

describe('Inspect Transaction', () => {
  const payer = filledAddress(1);
  const program = filledAddress(2);
  const account = filledAddress(3);
  const recentBlockhash = bs58.encode(new Uint8Array(32).fill(9));

  const PAYER = '4vJ9JU1bJJE96FWSJKvHsmmFADCg4gpZQff4P3bkLKi';
  const PROGRAM = '8qbHbw2BbbTHBW1sbeqakYXVKRQM8Ne7pLK7m6CVfeR';
  const ACCOUNT = 'CktRuQ2mttgRGkXJtyksdKHjUdc2C4TgDzyB98oEzy8';
  const BLOCKHASH = 'cGfHiC6Kgg3FpFZvgwGcswsCRtp4aBP2fzuXRQPizuN';

  const instruction = new TransactionInstruction({
    programAddress: program,
    accounts: [
      {address: payer, isSigner: true, isWritable: true},
      {address: account, isSigner: false, isWritable: true},
    ],
    data: Uint8Array.of(0xaa, 0xbb),
  });

  const legacyTransaction = () =>
    new VersionedTransaction(
      Message.compile({
        payerKey: payer,
        recentBlockhash,
        instructions: [instruction],
      }),
    );

  afterEach(() => {
    sinon.restore();
    delete process.env['TXWIRE_LOG_ALL_TRANSACTIONS'];
  });

  it('checkLogAllTransactions', () => {
    expect(checkLogAllTransactions()).to.be.false;
    process.env['TXWIRE_LOG_ALL_TRANSACTIONS'] = '';
    expect(checkLogAllTransactions()).to.be.true;
  });

  it('describes a legacy transaction', () => {
    expect(describeTransaction(legacyTransaction()).split('\n')).to.eql([
      'Transaction (legacy)',
      'Signatures: 1 (0 present)',
      'Header: 1 required signatures, 0 readonly signed, 1 readonly unsigned',
      'Account keys:',
      `  0: ${PAYER} [signer, writable]`,
      `  1: ${ACCOUNT} [writable]`,
      `  2: ${PROGRAM} [readonly]`,
      `Recent blockhash: ${BLOCKHASH}`,
      'Instructions:',
      `  0: program ${PROGRAM}, accounts [0, 1], data 0xaabb (2 bytes)`,
    ]);
  });

  it('counts present signatures', () => {
    const signer = Keypair.fromSeed(new Uint8Array(32).fill(8));
    const transaction = new VersionedTransaction(
      Message.compile({
        payerKey: signer.publicKey,
        recentBlockhash,
        instructions: [],
      }),
    );
    transaction.sign([signer]);
    expect(describeTransaction(transaction).split('\n')[1]).to.eq(
      'Signatures: 1 (1 present)',
    );
  });

  it('describes a v0 transaction with lookups', () => {
    const message = new MessageV0({
      header: {
        numRequiredSignatures: 1,
        numReadonlySigned: 0,
        numReadonlyUnsigned: 0,
      },
      staticAccountKeys: [payer],
      recentBlockhash,
      compiledInstructions: [
        {programIndex: 2, accountIndices: [0, 1], data: new Uint8Array(0)},
      ],
      addressTableLookups: [
        {accountKey: account, writableIndexes: [4], readonlyIndexes: [0, 7]},
      ],
    });
    expect(
      describeTransaction(new VersionedTransaction(message)).split('\n'),
    ).to.eql([
      'Transaction (v0)',
      'Signatures: 1 (0 present)',
      'Header: 1 required signatures, 0 readonly signed, 0 readonly unsigned',
      'Account keys:',
      `  0: ${PAYER} [signer, writable]`,
      `Recent blockhash: ${BLOCKHASH}`,
      'Instructions:',
      '  0: program #2, accounts [0, 1], data 0x (0 bytes)',
      'Address table lookups:',
      `  0: ${ACCOUNT} writable [4] readonly [0, 7]`,
    ]);
  });

  it('describes an instruction', () => {
    expect(describeInstruction(instruction).split('\n')).to.eql([
      `Program: ${PROGRAM}`,
      'Accounts:',
      `  0: ${PAYER} [signer, writable]`,
      `  1: ${ACCOUNT} [writable]`,
      'Data: 0xaabb (2 bytes)',
    ]);
    expect(
      describeInstruction(
        new TransactionInstruction({programAddress: program, accounts: []}),
      ).split('\n'),
    ).to.eql([`Program: ${PROGRAM}`, 'Accounts: none', 'Data: 0x (0 bytes)']);
  });

  it('inspectTransaction logs to console by default', () => {
    const log = sinon.stub(console, 'log');
    const transaction = legacyTransaction();
    inspectTransaction(transaction);
    expect(log.calledOnceWithExactly(describeTransaction(transaction))).to.be
      .true;
  });
});
