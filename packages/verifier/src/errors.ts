import {CodedError} from "@minime-proofs/utils";

export enum MinimeKeyErrorCode {
  KEYS_NOT_CONSECUTIVE = "MINIME_KEY_ERROR_KEYS_NOT_CONSECUTIVE",
  KEY_OFFSET_OVERFLOW = "MINIME_KEY_ERROR_KEY_OFFSET_OVERFLOW",
}

export type MinimeKeyErrorType =
  | {code: MinimeKeyErrorCode.KEYS_NOT_CONSECUTIVE; key0: string; key1: string}
  | {code: MinimeKeyErrorCode.KEY_OFFSET_OVERFLOW; offset: string};

export class MinimeKeyError extends CodedError<MinimeKeyErrorType> {}

export enum MinimeProofErrorCode {
  WRONG_PROOF_COUNT = "MINIME_PROOF_ERROR_WRONG_PROOF_COUNT",
  EMPTY_CHECKPOINT_VALUE = "MINIME_PROOF_ERROR_EMPTY_CHECKPOINT_VALUE",
  INVALID_VALUE_LENGTH = "MINIME_PROOF_ERROR_INVALID_VALUE_LENGTH",
  INVALID_KEY_LENGTH = "MINIME_PROOF_ERROR_INVALID_KEY_LENGTH",
  INVALID_HOLDER_LENGTH = "MINIME_PROOF_ERROR_INVALID_HOLDER_LENGTH",
  INVALID_STORAGE_ROOT_LENGTH = "MINIME_PROOF_ERROR_INVALID_STORAGE_ROOT_LENGTH",
  INVALID_MAP_INDEX_SLOT = "MINIME_PROOF_ERROR_INVALID_MAP_INDEX_SLOT",
  INVALID_DECIMALS = "MINIME_PROOF_ERROR_INVALID_DECIMALS",
  MISSING_TARGET_BALANCE = "MINIME_PROOF_ERROR_MISSING_TARGET_BALANCE",
  MISSING_TARGET_BLOCK = "MINIME_PROOF_ERROR_MISSING_TARGET_BLOCK",
  /** Proof keys are not the holder's checkpoint slots */
  KEY_MISMATCH = "MINIME_PROOF_ERROR_KEY_MISMATCH",
  BALANCE_MISMATCH = "MINIME_PROOF_ERROR_BALANCE_MISMATCH",
  /** The first checkpoint was recorded after the target block */
  CHECKPOINT_AFTER_TARGET = "MINIME_PROOF_ERROR_CHECKPOINT_AFTER_TARGET",
  /** The second checkpoint is not later than the first one */
  CHECKPOINTS_NOT_ORDERED = "MINIME_PROOF_ERROR_CHECKPOINTS_NOT_ORDERED",
  /** A later checkpoint exists at or before the target block */
  TARGET_NOT_BEFORE_NEXT_CHECKPOINT = "MINIME_PROOF_ERROR_TARGET_NOT_BEFORE_NEXT_CHECKPOINT",
  /** The proof does not authenticate the value against the storage root */
  INVALID_PROOF = "MINIME_PROOF_ERROR_INVALID_PROOF",
  /** The proof verifier failed to process the proof */
  PROOF_VERIFICATION_ERROR = "MINIME_PROOF_ERROR_PROOF_VERIFICATION_ERROR",
}

export type MinimeProofErrorType =
  | {code: MinimeProofErrorCode.WRONG_PROOF_COUNT; count: number}
  | {code: MinimeProofErrorCode.EMPTY_CHECKPOINT_VALUE}
  | {code: MinimeProofErrorCode.INVALID_VALUE_LENGTH; index: number; length: number}
  | {code: MinimeProofErrorCode.INVALID_KEY_LENGTH; index: number; length: number}
  | {code: MinimeProofErrorCode.INVALID_HOLDER_LENGTH; length: number}
  | {code: MinimeProofErrorCode.INVALID_STORAGE_ROOT_LENGTH; length: number}
  | {code: MinimeProofErrorCode.INVALID_MAP_INDEX_SLOT; mapIndexSlot: number}
  | {code: MinimeProofErrorCode.INVALID_DECIMALS; decimals: number}
  | {code: MinimeProofErrorCode.MISSING_TARGET_BALANCE}
  | {code: MinimeProofErrorCode.MISSING_TARGET_BLOCK}
  | {code: MinimeProofErrorCode.KEY_MISMATCH; reason: MinimeKeyErrorCode}
  | {code: MinimeProofErrorCode.BALANCE_MISMATCH; proofBalance: string; targetBalance: string}
  | {code: MinimeProofErrorCode.CHECKPOINT_AFTER_TARGET; checkpointBlock: string; targetBlock: string}
  | {code: MinimeProofErrorCode.CHECKPOINTS_NOT_ORDERED; block0: string; block1: string}
  | {code: MinimeProofErrorCode.TARGET_NOT_BEFORE_NEXT_CHECKPOINT; targetBlock: string; nextCheckpointBlock: string}
  | {code: MinimeProofErrorCode.INVALID_PROOF; index: number}
  | {code: MinimeProofErrorCode.PROOF_VERIFICATION_ERROR; index: number; reason: string};

export enum MinimeProofErrorKind {
  MalformedInput = "MalformedInput",
  KeyMismatch = "KeyMismatch",
  BalanceMismatch = "BalanceMismatch",
  BlockRangeViolation = "BlockRangeViolation",
  CryptographicInvalidity = "CryptographicInvalidity",
}

export function getMinimeProofErrorKind(code: MinimeProofErrorCode): MinimeProofErrorKind {
  switch (code) {
    case MinimeProofErrorCode.WRONG_PROOF_COUNT:
    case MinimeProofErrorCode.EMPTY_CHECKPOINT_VALUE:
    case MinimeProofErrorCode.INVALID_VALUE_LENGTH:
    case MinimeProofErrorCode.INVALID_KEY_LENGTH:
    case MinimeProofErrorCode.INVALID_HOLDER_LENGTH:
    case MinimeProofErrorCode.INVALID_STORAGE_ROOT_LENGTH:
    case MinimeProofErrorCode.INVALID_MAP_INDEX_SLOT:
    case MinimeProofErrorCode.INVALID_DECIMALS:
    case MinimeProofErrorCode.MISSING_TARGET_BALANCE:
    case MinimeProofErrorCode.MISSING_TARGET_BLOCK:
      return MinimeProofErrorKind.MalformedInput;

    case MinimeProofErrorCode.KEY_MISMATCH:
      return MinimeProofErrorKind.KeyMismatch;

    case MinimeProofErrorCode.BALANCE_MISMATCH:
      return MinimeProofErrorKind.BalanceMismatch;

    case MinimeProofErrorCode.CHECKPOINT_AFTER_TARGET:
    case MinimeProofErrorCode.CHECKPOINTS_NOT_ORDERED:
    case MinimeProofErrorCode.TARGET_NOT_BEFORE_NEXT_CHECKPOINT:
      return MinimeProofErrorKind.BlockRangeViolation;

    case MinimeProofErrorCode.INVALID_PROOF:
    case MinimeProofErrorCode.PROOF_VERIFICATION_ERROR:
      return MinimeProofErrorKind.CryptographicInvalidity;
  }
}

export class MinimeProofError extends CodedError<MinimeProofErrorType> {
  get kind(): MinimeProofErrorKind {
    return getMinimeProofErrorKind(this.type.code);
  }
}

export function isMinimeProofError(e: unknown): e is MinimeProofError {
  return e instanceof MinimeProofError;
}
