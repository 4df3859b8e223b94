import {bytesToBigInt, toHex} from "@minime-proofs/utils";
import {MAX_MINIME_CHECKPOINTS} from "./constants.js";
import {MinimeKeyError, MinimeKeyErrorCode} from "./errors.js";
import {StorageSlotResolver} from "./interfaces.js";
import {keccakSlotResolver} from "./slots.js";

/**
 * Check that two storage proof keys are consecutive checkpoint slots of `holder`.
 *
 * Each MiniMe checkpoint takes the next slot of the holder's array, so `key1` must be `key0 + 1` and `key0`
 * must lie within `MAX_MINIME_CHECKPOINTS` slots of the array start.
 *
 * @returns index of the `key0` checkpoint in the holder's array
 */
export function checkMinimeKeys(
  key0: Uint8Array,
  key1: Uint8Array,
  holder: Uint8Array,
  mapIndexSlot: number,
  slotResolver: StorageSlotResolver = keccakSlotResolver
): bigint {
  const baseIndex = bytesToBigInt(slotResolver.getCheckpointsBaseSlot(holder, mapIndexSlot));
  const key0Index = bytesToBigInt(key0);
  const key1Index = bytesToBigInt(key1);

  if (key0Index + BigInt(1) !== key1Index) {
    throw new MinimeKeyError(
      {code: MinimeKeyErrorCode.KEYS_NOT_CONSECUTIVE, key0: toHex(key0), key1: toHex(key1)},
      "Keys are not consecutive"
    );
  }

  const offset = key0Index - baseIndex;
  if (offset < BigInt(0) || offset >= BigInt(MAX_MINIME_CHECKPOINTS)) {
    throw new MinimeKeyError(
      {code: MinimeKeyErrorCode.KEY_OFFSET_OVERFLOW, offset: offset.toString()},
      `Key offset overflow, expected [0, ${MAX_MINIME_CHECKPOINTS}) got ${offset}`
    );
  }

  return offset;
}
