/**
 * Maximum over-the-wire size of a Transaction
 *
 * 1280 is IPv6 minimum MTU
 * 40 bytes is the size of the IPv6 header
 * 8 bytes is the size of the fragment header
 */
export const PACKET_DATA_SIZE = 1280 - 40 - 8;

export const VERSION_PREFIX_MASK = 0x7f;

export const MESSAGE_VERSION_0_PREFIX = 1 << 7;

export const SIGNATURE_LENGTH_IN_BYTES = 64;

/**
 * Header counts and instruction indexes are single bytes
 */
export const MAX_ACCOUNT_KEYS = 256;

export const MAX_REQUIRED_SIGNATURES = 255;

/**
 * A legacy message starts with its signature count, so the count must keep
 * the version bit clear
 */
export const MAX_LEGACY_REQUIRED_SIGNATURES = VERSION_PREFIX_MASK;
