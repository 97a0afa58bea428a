import {DecodeError} from '../errors';
import {VERSION_PREFIX_MASK} from '../transaction/constants';
import {ByteReader} from '../utils/byte-reader';
import {Message} from './legacy';
import {MessageV0} from './v0';

/**
 * Version of a message given its first byte. A clear top bit means the byte
 * is the signature count of a legacy message.
 */
const versionOf = (firstByte: number): 'legacy' | number =>
  firstByte & ~VERSION_PREFIX_MASK ? firstByte & VERSION_PREFIX_MASK : 'legacy';

export type VersionedMessage = Message | MessageV0;
// eslint-disable-next-line no-redeclare
export const VersionedMessage = {
  deserializeMessageVersion(serializedMessage: Uint8Array): 'legacy' | number {
    return versionOf(new ByteReader(serializedMessage).peekU8());
  },

  /**
   * Decode a message of any supported version, rejecting trailing bytes
   */
  deserialize(serializedMessage: Uint8Array): VersionedMessage {
    const reader = new ByteReader(serializedMessage);
    const message = VersionedMessage.decode(reader);
    reader.assertEnd();
    return message;
  },

  /** @internal */
  decode(reader: ByteReader): VersionedMessage {
    const offset = reader.position;
    const version = versionOf(reader.peekU8());
    switch (version) {
      case 'legacy':
        return Message.decode(reader);
      case 0:
        return MessageV0.decode(reader);
      default:
        throw new DecodeError(
          'UnsupportedVersion',
          `Transaction message version ${version} deserialization is not supported`,
          {offset, expected: 0, found: version},
        );
    }
  },
};
