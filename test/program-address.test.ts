import {Buffer} from 'buffer';
import {expect} from 'chai';
import {sha256} from '@noble/hashes/sha256';
import sinon from 'sinon';

import {Address} from '../src/address';
import {DerivationError} from '../src/errors';
import {
  createProgramAddress,
  createProgramAddressSync,
  createWithSeed,
  findAssociatedTokenAddress,
  findProgramAddress,
  MAX_SEED_LENGTH,
  seedFromString,
  seedFromU32,
  seedFromU64,
} from '../src/program-address';
import {PROGRAM_IDS} from '../src/programs';

describe('program addresses', () => {
  const programId = new Address('BPFLoader1111111111111111111111111111111111');

  it('createProgramAddressSync', () => {
    const address = new Address('SeedPubey1111111111111111111111111111111111');

    let programAddress = createProgramAddressSync(
      [Buffer.from('', 'utf8'), Buffer.from([1])],
      programId,
    );
    expect(programAddress.toBase58()).to.eq(
      '3gF2KMe9KiC6FNVBmfg9i267aMPvK37FewCip4eGBFcT',
    );

    programAddress = createProgramAddressSync(
      [Buffer.from('☉', 'utf8')],
      programId,
    );
    expect(programAddress.toBase58()).to.eq(
      '7ytmC1nT1xY4RfxCV2ZgyA7UakC93do5ZdyhdF3EtPj7',
    );

    programAddress = createProgramAddressSync(
      [Buffer.from('Talking', 'utf8'), Buffer.from('Squirrels', 'utf8')],
      programId,
    );
    expect(programAddress.toBase58()).to.eq(
      'HwRVBufQ4haG5XSgpspwKtNd3PC9GM9m1196uJW36vds',
    );

    programAddress = createProgramAddressSync([address.toBuffer()], programId);
    expect(programAddress.toBase58()).to.eq(
      'GUs5qLUfsEHkcMB9T38vjr18ypEhRuNWiePW2LoK4E3K',
    );

    const programAddress2 = createProgramAddressSync(
      [Buffer.from('Talking2', 'utf8'), Buffer.from('Squirrels', 'utf8')],
      programId,
    );
    expect(programAddress.equals(programAddress2)).to.be.false;

    programAddress = createProgramAddressSync(
      [
        new Address('H4snTKK9adiU15gP22ErfZYtro3aqR9BTMXiH3AwiUTQ').toBuffer(),
        seedFromU64(2),
      ],
      new Address('4ckmDgGdxQoPDLUkDT3vHgSAkzA3QRdNq5ywwY4sUSJn'),
    );
    expect(programAddress.toBase58()).to.eq(
      '12rqwuEgBYiGhBrDJStCiqEtzQpTTiZbh7teNVLuYcFA',
    );
  });

  it('createProgramAddress appends the bump seed', () => {
    const programAddress = createProgramAddress(
      [Buffer.from('', 'utf8')],
      1,
      programId,
    );
    expect(programAddress.toBase58()).to.eq(
      '3gF2KMe9KiC6FNVBmfg9i267aMPvK37FewCip4eGBFcT',
    );
  });

  it('rejects seeds longer than 32 bytes', () => {
    expect(() =>
      createProgramAddress([Buffer.alloc(MAX_SEED_LENGTH + 1)], 255, programId),
    )
      .to.throw(DerivationError)
      .with.property('kind', 'SeedTooLong');
    expect(() =>
      createProgramAddressSync([Buffer.alloc(MAX_SEED_LENGTH)], programId),
    ).not.to.throw();
  });

  it('caps seed segments at 16 including the bump', () => {
    const fifteen = new Array(15).fill(0).map(() => Buffer.from([7]));
    const sixteen = [...fifteen, Buffer.from([7])];
    expect(() => createProgramAddress(sixteen, 255, programId))
      .to.throw(DerivationError)
      .with.property('kind', 'TooManySeeds');
    expect(() => findProgramAddress(sixteen, programId))
      .to.throw(DerivationError)
      .with.property('kind', 'TooManySeeds');
    const [address, bump] = findProgramAddress(fifteen, programId);
    expect(createProgramAddress(fifteen, bump, programId).equals(address)).to
      .be.true;
  });

  it('rejects an invalid bump', () => {
    for (const bump of [-1, 256, 1.5]) {
      expect(() => createProgramAddress([], bump, programId))
        .to.throw(DerivationError)
        .with.property('kind', 'InvalidBump');
    }
  });

  it('rejects addresses on the curve', () => {
    // bumps 255 through 253 of this seed all hash onto the curve
    for (const bump of [255, 254, 253]) {
      expect(() =>
        createProgramAddress([seedFromString('config')], bump, programId),
      )
        .to.throw(DerivationError)
        .with.property('kind', 'AddressOnCurve');
    }
  });

  it('findProgramAddress', () => {
    const [programAddress, bump] = findProgramAddress(
      [Buffer.from('', 'utf8')],
      programId,
    );
    expect(bump).to.be.lessThan(256);
    expect(Address.isOnCurve(programAddress)).to.be.false;
    expect(
      programAddress.equals(
        createProgramAddress([Buffer.from('', 'utf8')], bump, programId),
      ),
    ).to.be.true;
  });

  it('findProgramAddress skips bumps that land on the curve', () => {
    const [programAddress, bump] = findProgramAddress(
      [seedFromString('config')],
      programId,
    );
    expect(bump).to.eq(252);
    expect(programAddress.toBase58()).to.eq(
      '81a4cX9DmmCWk6XVpb2t6s1F1V3EKbdXhVx1Stdjxxso',
    );
  });

  it('findProgramAddress is deterministic', () => {
    const seeds = [seedFromString('pool'), seedFromU32(7)];
    const first = findProgramAddress(seeds, programId);
    const second = findProgramAddress(seeds, programId);
    expect(first[0].equals(second[0])).to.be.true;
    expect(first[1]).to.eq(second[1]);
  });

  it('tries all 256 bumps before giving up', () => {
    const isOnCurve = sinon.fake.returns(true);
    const hash = sinon.fake((data: Uint8Array) => sha256(data));
    expect(() =>
      findProgramAddress([seedFromString('vault')], programId, {
        hash,
        isOnCurve,
      }),
    )
      .to.throw(DerivationError)
      .with.property('kind', 'BumpSeedExhausted');
    expect(isOnCurve.callCount).to.eq(256);
    // the last attempt uses bump 0
    const lastInput: Uint8Array = hash.lastCall.args[0];
    expect(lastInput[5]).to.eq(0);
  });

  it('does not retry errors other than a curve hit', () => {
    const isOnCurve = sinon.fake.returns(true);
    expect(() =>
      findProgramAddress([Buffer.alloc(33)], programId, {
        hash: data => sha256(data),
        isOnCurve,
      }),
    )
      .to.throw(DerivationError)
      .with.property('kind', 'SeedTooLong');
    expect(isOnCurve.callCount).to.eq(0);
  });

  it('createWithSeed', () => {
    const defaultPublicKey = Address.default;
    const derivedKey = createWithSeed(
      defaultPublicKey,
      'limber chicken: 4/45',
      defaultPublicKey,
    );

    expect(
      derivedKey.equals(
        new Address('9h1HyLCW5dZnBVap8C5egQ9Z6pHyjsh5MNy83iPqqRuq'),
      ),
    ).to.be.true;

    expect(() =>
      createWithSeed(defaultPublicKey, 'x'.repeat(33), defaultPublicKey),
    )
      .to.throw(DerivationError)
      .with.property('kind', 'SeedTooLong');
  });

  it('findAssociatedTokenAddress', () => {
    const wallet = new Address('2q7pyhPwAwZ3QMfZrnAbDhnh9mDUqycszcpf86VgQxhF');
    const mint = new Address('EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v');
    const [address, bump] = findAssociatedTokenAddress(wallet, mint);
    expect(address.toBase58()).to.eq(
      'BPk1w6qrFB5bMjimh2JD8RXUtFpHM4s93XbSDCxkPVDv',
    );
    expect(bump).to.eq(255);

    const [token2022Address] = findAssociatedTokenAddress(
      wallet,
      mint,
      PROGRAM_IDS.token2022,
    );
    expect(token2022Address.equals(address)).to.be.false;
  });

  it('seed helpers', () => {
    expect([...seedFromString('abc')]).to.eql([0x61, 0x62, 0x63]);
    expect([...seedFromU32(0x01020304)]).to.eql([4, 3, 2, 1]);
    expect([...seedFromU64(258n)]).to.eql([2, 1, 0, 0, 0, 0, 0, 0]);
  });
});
