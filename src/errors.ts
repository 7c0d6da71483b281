import type {Address} from './address';

// Typescript `enums` thwart tree-shaking, so the codes live in a frozen object.
export const TransactionErrorCode = {
  NoFeePayer: 'NoFeePayer',
  NoRecentCheckpoint: 'NoRecentCheckpoint',
  NoInstructions: 'NoInstructions',
  TooManyAccountKeys: 'TooManyAccountKeys',
  AccountNotFound: 'AccountNotFound',
  NotEnoughSigners: 'NotEnoughSigners',
  MissingSigner: 'MissingSigner',
  SignatureVerificationFailed: 'SignatureVerificationFailed',
  InvalidSignature: 'InvalidSignature',
  WireFormatError: 'WireFormatError',
} as const;
export type TransactionErrorCodeEnum =
  typeof TransactionErrorCode[keyof typeof TransactionErrorCode];

export type BuildErrorCode =
  | typeof TransactionErrorCode.NoFeePayer
  | typeof TransactionErrorCode.NoRecentCheckpoint
  | typeof TransactionErrorCode.NoInstructions
  | typeof TransactionErrorCode.TooManyAccountKeys
  | typeof TransactionErrorCode.AccountNotFound;

export type SignerErrorCode =
  | typeof TransactionErrorCode.NotEnoughSigners
  | typeof TransactionErrorCode.MissingSigner
  | typeof TransactionErrorCode.SignatureVerificationFailed
  | typeof TransactionErrorCode.InvalidSignature;

/**
 * Base class of every failure raised while building, signing, verifying or
 * decoding a transaction. `code` names the violated invariant.
 */
export class TransactionError extends Error {
  code: TransactionErrorCodeEnum;

  constructor(code: TransactionErrorCodeEnum, message: string) {
    super(message);
    this.code = code;
  }
}

Object.defineProperty(TransactionError.prototype, 'name', {
  value: 'TransactionError',
});

/**
 * Missing build inputs, capacity overflow, and compilation invariants
 */
export class TransactionBuildError extends TransactionError {
  declare code: BuildErrorCode;

  constructor(code: BuildErrorCode, message: string) {
    super(code, message);
  }
}

Object.defineProperty(TransactionBuildError.prototype, 'name', {
  value: 'TransactionBuildError',
});

export class TransactionSignerError extends TransactionError {
  declare code: SignerErrorCode;
  /** The account whose signature is missing or invalid, when known */
  address?: Address;

  constructor(code: SignerErrorCode, message: string, address?: Address) {
    super(code, message);
    this.address = address;
  }
}

Object.defineProperty(TransactionSignerError.prototype, 'name', {
  value: 'TransactionSignerError',
});

export class WireFormatError extends TransactionError {
  constructor(message: string) {
    super(TransactionErrorCode.WireFormatError, message);
  }
}

Object.defineProperty(WireFormatError.prototype, 'name', {
  value: 'WireFormatError',
});
