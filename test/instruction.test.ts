import {expect} from 'chai';
import {StructError} from 'superstruct';

import {Address} from '../src/address';
import {TransactionInstruction} from '../src/instruction';

describe('TransactionInstruction', () => {
  const programAddress = new Address(new Uint8Array(32).fill(2));
  const account = new Address(new Uint8Array(32).fill(3));

  it('defaults to empty data', () => {
    const instruction = new TransactionInstruction({
      programAddress,
      accounts: [],
    });
    expect(instruction.data).to.eql(new Uint8Array(0));
  });

  it('toJSON', () => {
    const instruction = new TransactionInstruction({
      programAddress,
      accounts: [{address: account, isSigner: false, isWritable: true}],
      data: Uint8Array.from([1, 2, 3]),
    });
    expect(instruction.toJSON()).to.eql({
      programAddress: programAddress.toBase58(),
      accounts: [
        {address: account.toBase58(), isSigner: false, isWritable: true},
      ],
      data: [1, 2, 3],
    });
  });

  it('fromJSON', () => {
    const instruction = TransactionInstruction.fromJSON({
      programAddress: programAddress.toBase58(),
      accounts: [
        {address: account.toBase58(), isSigner: true, isWritable: false},
      ],
      data: [9, 8],
    });
    expect(instruction.programAddress.equals(programAddress)).to.be.true;
    expect(instruction.accounts).to.have.length(1);
    expect(instruction.accounts[0].address.equals(account)).to.be.true;
    expect(instruction.accounts[0].isSigner).to.be.true;
    expect(instruction.accounts[0].isWritable).to.be.false;
    expect(instruction.data).to.eql(Uint8Array.from([9, 8]));
  });

  it('fromJSON reverses toJSON', () => {
    const instruction = new TransactionInstruction({
      programAddress,
      accounts: [
        {address: account, isSigner: true, isWritable: true},
        {address: programAddress, isSigner: false, isWritable: false},
      ],
      data: Uint8Array.from([0, 255]),
    });
    const parsed = TransactionInstruction.fromJSON(
      JSON.parse(JSON.stringify(instruction)),
    );
    expect(parsed).to.eql(instruction);
  });

  it('fromJSON rejects malformed descriptions', () => {
    expect(() =>
      TransactionInstruction.fromJSON({
        programAddress: programAddress.toBase58(),
        accounts: [],
        data: [256],
      }),
    ).to.throw(StructError);
    expect(() =>
      TransactionInstruction.fromJSON({
        programAddress: programAddress.toBase58(),
        accounts: [{address: account.toBase58(), isSigner: 'yes'}],
        data: [],
      }),
    ).to.throw(StructError);
    expect(() =>
      TransactionInstruction.fromJSON({accounts: [], data: []}),
    ).to.throw(StructError);
  });
});
