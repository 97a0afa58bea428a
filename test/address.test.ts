import {expect} from 'chai';

import {Address} from '../src/address';
import {Keypair} from '../src/keypair';

const ONES = '4vJ9JU1bJJE96FWSJKvHsmmFADCg4gpZQff4P3bkLKi';
const LAST_BYTE_SEVEN = '11111111111111111111111111111118';

describe('Address', () => {
  describe('construction', () => {
    it('takes raw bytes or base-58 text', () => {
      const fromBytes = new Address(new Uint8Array(32).fill(1));
      const fromArray = new Address(Array<number>(32).fill(1));
      const fromText = new Address(ONES);
      expect(fromBytes.equals(fromText)).to.be.true;
      expect(fromArray.equals(fromText)).to.be.true;
    });

    it('rejects anything but 32 bytes', () => {
      for (const input of [
        new Uint8Array(31),
        Array<number>(33).fill(0),
        `${ONES}${ONES}`,
      ]) {
        expect(() => new Address(input)).to.throw('Invalid address input');
      }
    });

    it('rejects text outside the base-58 alphabet', () => {
      expect(() => new Address('0OIl')).to.throw();
    });
  });

  it('keeps leading zero bytes in the text form', () => {
    const bytes = new Uint8Array(32);
    bytes[31] = 7;
    expect(new Address(bytes).toBase58()).to.eq(LAST_BYTE_SEVEN);
    expect(new Address(LAST_BYTE_SEVEN).toBytes()[31]).to.eq(7);
  });

  it('uses the text form for toString and JSON', () => {
    const address = new Address(ONES);
    expect(address.toString()).to.eq(ONES);
    expect(JSON.stringify({address})).to.eq(`{"address":"${ONES}"}`);
  });

  it('compares by bytes', () => {
    expect(new Address(ONES).equals(new Address(ONES))).to.be.true;
    expect(new Address(ONES).equals(Address.default)).to.be.false;
    expect(Address.default.toBase58()).to.eq(
      '11111111111111111111111111111111',
    );
  });

  it('hands out copies of its bytes', () => {
    const address = new Address(ONES);
    const bytes = address.toBytes();
    bytes.fill(0);
    expect(address.toBytes()[0]).to.eq(1);
    expect(address.toBuffer().equals(Buffer.alloc(32, 1))).to.be.true;
  });

  it('unique addresses differ in their last four bytes', () => {
    const first = Address.unique();
    const second = Address.unique();
    expect(first.equals(second)).to.be.false;
    expect(first.toBytes().subarray(0, 28).every(byte => byte === 0)).to.be
      .true;
  });

  it('tells curve points from derived addresses', () => {
    const publicKey = Keypair.fromSeed(new Uint8Array(32).fill(8)).publicKey;
    expect(Address.isOnCurve(publicKey)).to.be.true;
    expect(Address.isOnCurve(publicKey.toBytes())).to.be.true;
    // a program-derived address, off the curve by construction
    expect(
      Address.isOnCurve('3gF2KMe9KiC6FNVBmfg9i267aMPvK37FewCip4eGBFcT'),
    ).to.be.false;
  });
});
