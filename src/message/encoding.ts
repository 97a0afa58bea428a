import bs58 from 'bs58';
import * as BufferLayout from '@solana/buffer-layout';

import {Address, ADDRESS_LENGTH} from '../address';
import {Blockhash, blockhashToBytes, BLOCKHASH_LENGTH} from '../blockhash';
import {DecodeError} from '../errors';
import * as Layout from '../layout';
import {ByteReader} from '../utils/byte-reader';
import * as shortvec from '../utils/shortvec-encoding';
import type {
  CompiledInstruction,
  MessageAddressTableLookup,
  MessageHeader,
} from './index';

// smallest possible records, used to reject impossible counts before reading
const MIN_INSTRUCTION_SIZE = 3;
const MIN_TABLE_LOOKUP_SIZE = ADDRESS_LENGTH + 2;

/**
 * The part of the wire format shared by every message version
 */
export type MessageBody = {
  header: MessageHeader;
  staticAccountKeys: Array<Address>;
  recentBlockhash: Blockhash;
  compiledInstructions: Array<CompiledInstruction>;
};

const encodeLength = (len: number): Uint8Array => {
  const bytes: Array<number> = [];
  shortvec.encodeLength(bytes, len);
  return new Uint8Array(bytes);
};

function encodeLayout<T>(layout: BufferLayout.Layout<T>, value: T): Uint8Array {
  const encoded = new Uint8Array(layout.span);
  const length = layout.encode(value, encoded, 0);
  return encoded.slice(0, length);
}

export function serializeInstructions(
  instructions: Array<CompiledInstruction>,
): Uint8Array {
  const serialized = instructions.map(instruction => {
    const encodedAccountIndicesLength = encodeLength(
      instruction.accountIndices.length,
    );
    const encodedDataLength = encodeLength(instruction.data.length);

    const instructionLayout = BufferLayout.struct<{
      programIndex: number;
      encodedAccountIndicesLength: Uint8Array;
      accountIndices: number[];
      encodedDataLength: Uint8Array;
      data: Uint8Array;
    }>([
      BufferLayout.u8('programIndex'),
      BufferLayout.blob(
        encodedAccountIndicesLength.length,
        'encodedAccountIndicesLength',
      ),
      BufferLayout.seq(
        BufferLayout.u8(),
        instruction.accountIndices.length,
        'accountIndices',
      ),
      BufferLayout.blob(encodedDataLength.length, 'encodedDataLength'),
      BufferLayout.blob(instruction.data.length, 'data'),
    ]);

    return encodeLayout(instructionLayout, {
      programIndex: instruction.programIndex,
      encodedAccountIndicesLength,
      accountIndices: instruction.accountIndices,
      encodedDataLength,
      data: instruction.data,
    });
  });
  return concatBytes([encodeLength(instructions.length), ...serialized]);
}

export function serializeAddressTableLookups(
  lookups: Array<MessageAddressTableLookup>,
): Uint8Array {
  const serialized = lookups.map(lookup => {
    const encodedWritableIndexesLength = encodeLength(
      lookup.writableIndexes.length,
    );
    const encodedReadonlyIndexesLength = encodeLength(
      lookup.readonlyIndexes.length,
    );

    const addressTableLookupLayout = BufferLayout.struct<{
      accountKey: Uint8Array;
      encodedWritableIndexesLength: Uint8Array;
      writableIndexes: number[];
      encodedReadonlyIndexesLength: Uint8Array;
      readonlyIndexes: number[];
    }>([
      Layout.address('accountKey'),
      BufferLayout.blob(
        encodedWritableIndexesLength.length,
        'encodedWritableIndexesLength',
      ),
      BufferLayout.seq(
        BufferLayout.u8(),
        lookup.writableIndexes.length,
        'writableIndexes',
      ),
      BufferLayout.blob(
        encodedReadonlyIndexesLength.length,
        'encodedReadonlyIndexesLength',
      ),
      BufferLayout.seq(
        BufferLayout.u8(),
        lookup.readonlyIndexes.length,
        'readonlyIndexes',
      ),
    ]);

    return encodeLayout(addressTableLookupLayout, {
      accountKey: lookup.accountKey.toBytes(),
      encodedWritableIndexesLength,
      writableIndexes: lookup.writableIndexes,
      encodedReadonlyIndexesLength,
      readonlyIndexes: lookup.readonlyIndexes,
    });
  });
  return concatBytes([encodeLength(lookups.length), ...serialized]);
}

/**
 * Header, account keys, blockhash and instructions, without any version
 * prefix or trailing lookups
 */
export function serializeMessageBody(body: MessageBody): Uint8Array {
  const keyCount = encodeLength(body.staticAccountKeys.length);
  const messageLayout = BufferLayout.struct<{
    header: MessageHeader;
    keyCount: Uint8Array;
    keys: Array<Uint8Array>;
    recentBlockhash: Uint8Array;
  }>([
    BufferLayout.struct<MessageHeader>(
      [
        BufferLayout.u8('numRequiredSignatures'),
        BufferLayout.u8('numReadonlySigned'),
        BufferLayout.u8('numReadonlyUnsigned'),
      ],
      'header',
    ),
    BufferLayout.blob(keyCount.length, 'keyCount'),
    BufferLayout.seq(Layout.address(), body.staticAccountKeys.length, 'keys'),
    Layout.blockhash(),
  ]);

  return concatBytes([
    encodeLayout(messageLayout, {
      header: body.header,
      keyCount,
      keys: body.staticAccountKeys.map(key => key.toBytes()),
      recentBlockhash: blockhashToBytes(body.recentBlockhash),
    }),
    serializeInstructions(body.compiledInstructions),
  ]);
}

export function decodeMessageBody(reader: ByteReader): MessageBody {
  const headerOffset = reader.position;
  const header: MessageHeader = {
    numRequiredSignatures: reader.readU8(),
    numReadonlySigned: reader.readU8(),
    numReadonlyUnsigned: reader.readU8(),
  };

  const keyCount = reader.readLength(ADDRESS_LENGTH);
  const staticAccountKeys: Array<Address> = [];
  for (let i = 0; i < keyCount; i++) {
    staticAccountKeys.push(new Address(reader.readBytes(ADDRESS_LENGTH)));
  }
  assertHeaderConsistent(header, staticAccountKeys.length, headerOffset);

  const recentBlockhash = bs58.encode(reader.readBytes(BLOCKHASH_LENGTH));

  const instructionCount = reader.readLength(MIN_INSTRUCTION_SIZE);
  const compiledInstructions: Array<CompiledInstruction> = [];
  for (let i = 0; i < instructionCount; i++) {
    const programIndex = reader.readU8();
    const accountIndices = [...reader.readBytes(reader.readLength())];
    const data = reader.readBytes(reader.readLength());
    compiledInstructions.push({programIndex, accountIndices, data});
  }

  return {header, staticAccountKeys, recentBlockhash, compiledInstructions};
}

export function decodeAddressTableLookups(
  reader: ByteReader,
): Array<MessageAddressTableLookup> {
  const lookupCount = reader.readLength(MIN_TABLE_LOOKUP_SIZE);
  const lookups: Array<MessageAddressTableLookup> = [];
  for (let i = 0; i < lookupCount; i++) {
    const accountKey = new Address(reader.readBytes(ADDRESS_LENGTH));
    const writableIndexes = [...reader.readBytes(reader.readLength())];
    const readonlyIndexes = [...reader.readBytes(reader.readLength())];
    lookups.push({accountKey, writableIndexes, readonlyIndexes});
  }
  return lookups;
}

function assertHeaderConsistent(
  header: MessageHeader,
  numAccountKeys: number,
  offset: number,
): void {
  const {numRequiredSignatures, numReadonlySigned, numReadonlyUnsigned} =
    header;
  if (numRequiredSignatures > numAccountKeys) {
    throw new DecodeError(
      'InconsistentHeader',
      'Header requires more signatures than there are account keys',
      {offset, expected: numAccountKeys, found: numRequiredSignatures},
    );
  }
  // the fee payer is always a writable signer
  if (numReadonlySigned >= numRequiredSignatures) {
    throw new DecodeError(
      'InconsistentHeader',
      'Header leaves no writable signer for the fee payer',
      {
        offset: offset + 1,
        expected: numRequiredSignatures - 1,
        found: numReadonlySigned,
      },
    );
  }
  if (numReadonlyUnsigned > numAccountKeys - numRequiredSignatures) {
    throw new DecodeError(
      'InconsistentHeader',
      'Header marks more read-only unsigned accounts than there are unsigned keys',
      {
        offset: offset + 2,
        expected: numAccountKeys - numRequiredSignatures,
        found: numReadonlyUnsigned,
      },
    );
  }
}

export function concatBytes(chunks: Array<Uint8Array>): Uint8Array {
  const length = chunks.reduce((total, chunk) => total + chunk.length, 0);
  const bytes = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.length;
  }
  return bytes;
}
