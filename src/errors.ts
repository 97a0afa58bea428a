// Each error class carries a string `kind` so callers can branch without
// matching on message text.

export const DerivationErrorKind = {
  SEED_TOO_LONG: 'SeedTooLong',
  TOO_MANY_SEEDS: 'TooManySeeds',
  ADDRESS_ON_CURVE: 'AddressOnCurve',
  BUMP_SEED_EXHAUSTED: 'BumpSeedExhausted',
  INVALID_BUMP: 'InvalidBump',
} as const;
export type DerivationErrorKindEnum =
  typeof DerivationErrorKind[keyof typeof DerivationErrorKind];

export class DerivationError extends Error {
  kind: DerivationErrorKindEnum;

  constructor(kind: DerivationErrorKindEnum, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'DerivationError';
  }
}

export const CompileErrorKind = {
  TOO_MANY_SIGNATURES: 'TooManySignatures',
  ACCOUNT_LIMIT_EXCEEDED: 'AccountLimitExceeded',
  MESSAGE_TOO_LARGE: 'MessageTooLarge',
  UNKNOWN_ACCOUNT: 'UnknownAccount',
  INVALID_BLOCKHASH: 'InvalidBlockhash',
  NO_INSTRUCTIONS: 'NoInstructions',
  LOOKUP_TABLE_INDEX_OVERFLOW: 'LookupTableIndexOverflow',
  ACCOUNT_ROLE_CONFLICT: 'AccountRoleConflict',
  UNSUPPORTED_VERSION: 'UnsupportedVersion',
} as const;
export type CompileErrorKindEnum =
  typeof CompileErrorKind[keyof typeof CompileErrorKind];

export class CompileError extends Error {
  kind: CompileErrorKindEnum;

  constructor(kind: CompileErrorKindEnum, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'CompileError';
  }
}

export const DecodeErrorKind = {
  TRUNCATED_INPUT: 'TruncatedInput',
  MALFORMED_LENGTH: 'MalformedLength',
  INCONSISTENT_HEADER: 'InconsistentHeader',
  TRAILING_BYTES: 'TrailingBytes',
  UNSUPPORTED_VERSION: 'UnsupportedVersion',
} as const;
export type DecodeErrorKindEnum =
  typeof DecodeErrorKind[keyof typeof DecodeErrorKind];

/**
 * Where in the input a decode failure was detected
 */
export type DecodeErrorContext = {
  /** Byte offset into the input being decoded */
  offset: number;
  expected?: number;
  found?: number;
};

export class DecodeError extends Error {
  kind: DecodeErrorKindEnum;
  offset: number;
  expected?: number;
  found?: number;

  constructor(
    kind: DecodeErrorKindEnum,
    message: string,
    {offset, expected, found}: DecodeErrorContext,
  ) {
    super(
      expected !== undefined && found !== undefined
        ? `${message} at offset ${offset}: expected ${expected}, found ${found}`
        : `${message} at offset ${offset}`,
    );
    this.kind = kind;
    this.offset = offset;
    this.expected = expected;
    this.found = found;
    this.name = 'DecodeError';
  }
}

export const SigningErrorKind = {
  UNKNOWN_SIGNER: 'UnknownSigner',
  MISSING_SIGNATURE: 'MissingSignature',
  INVALID_SIGNATURE: 'InvalidSignature',
} as const;
export type SigningErrorKindEnum =
  typeof SigningErrorKind[keyof typeof SigningErrorKind];

export class SigningError extends Error {
  kind: SigningErrorKindEnum;

  constructor(kind: SigningErrorKindEnum, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'SigningError';
  }
}
