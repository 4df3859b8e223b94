import {bigIntToBytes, bytesToBigInt, formatBigDecimal, padLeft} from "@minime-proofs/utils";
import {CHECKPOINT_FIELD_LENGTH, MAX_TOKEN_DECIMALS, MAX_UINT128, STORAGE_VALUE_MAX_LENGTH} from "./constants.js";
import {MinimeCheckpoint, Rational} from "./types.js";

/**
 * Split a MiniMe checkpoint storage value into balance and block number.
 *
 * The value comes from EIP-1186 and may have its leading zero bytes trimmed, so it's expanded back to a full
 * 32 byte word first. Bytes `[0:16]` hold the balance and bytes `[16:32]` the block, both big-endian.
 */
export function decodeMinimeCheckpoint(value: Uint8Array, decimals = 0): MinimeCheckpoint {
  if (value.length > STORAGE_VALUE_MAX_LENGTH) {
    throw Error(`Checkpoint value must be at most ${STORAGE_VALUE_MAX_LENGTH} bytes, got ${value.length}`);
  }

  const word = padLeft(value, STORAGE_VALUE_MAX_LENGTH);
  const balance = bytesToBigInt(word.subarray(0, CHECKPOINT_FIELD_LENGTH));
  const block = bytesToBigInt(word.subarray(CHECKPOINT_FIELD_LENGTH));

  return {balance, block, scaledBalance: scaleBalance(balance, decimals)};
}

/**
 * Pack a checkpoint into its 32 byte storage word
 */
export function encodeMinimeCheckpoint({balance, block}: Pick<MinimeCheckpoint, "balance" | "block">): Uint8Array {
  assertUint128(balance, "balance");
  assertUint128(block, "block");

  const word = new Uint8Array(STORAGE_VALUE_MAX_LENGTH);
  word.set(bigIntToBytes(balance, CHECKPOINT_FIELD_LENGTH), 0);
  word.set(bigIntToBytes(block, CHECKPOINT_FIELD_LENGTH), CHECKPOINT_FIELD_LENGTH);
  return word;
}

export function isValidDecimals(decimals: number): boolean {
  return Number.isInteger(decimals) && decimals >= 0 && decimals <= MAX_TOKEN_DECIMALS;
}

export function scaleBalance(balance: bigint, decimals: number): Rational {
  if (!isValidDecimals(decimals)) {
    throw RangeError(`Decimals must be an integer in [0, ${MAX_TOKEN_DECIMALS}], got ${decimals}`);
  }
  return {numerator: balance, denominator: BigInt(10) ** BigInt(decimals)};
}

/**
 * Render a rational as a decimal string truncated to `maxDecimals` digits
 */
export function formatRational({numerator, denominator}: Rational, maxDecimals: number): string {
  if (denominator === BigInt(1) || maxDecimals <= 0) {
    return (numerator / denominator).toString();
  }
  return formatBigDecimal(numerator, denominator, BigInt(10) ** BigInt(maxDecimals));
}

function assertUint128(value: bigint, name: string): void {
  if (value < BigInt(0) || value > MAX_UINT128) {
    throw RangeError(`Checkpoint ${name} must fit in 128 bits, got ${value}`);
  }
}
