import {concatBytes} from "@ethereumjs/util";
import {keccak256} from "ethereum-cryptography/keccak.js";
import {bigIntToBytes, padLeft} from "@minime-proofs/utils";
import {STORAGE_KEY_LENGTH} from "./constants.js";
import {StorageSlotResolver} from "./interfaces.js";

/**
 * Storage slot of `mapping[holder]` for a mapping declared at `mapIndexSlot`:
 * `keccak256(pad32(holder) ++ pad32(mapIndexSlot))`
 */
export function getMapSlot(holder: Uint8Array, mapIndexSlot: number): Uint8Array {
  if (!Number.isSafeInteger(mapIndexSlot) || mapIndexSlot < 0) {
    throw Error(`mapIndexSlot must be a non-negative integer, got ${mapIndexSlot}`);
  }
  return keccak256(
    concatBytes(padLeft(holder, STORAGE_KEY_LENGTH), bigIntToBytes(BigInt(mapIndexSlot), STORAGE_KEY_LENGTH))
  );
}

/**
 * Slot of the first element of a dynamic array whose length is stored at `slot`
 */
export function getArrayDataSlot(slot: Uint8Array): Uint8Array {
  return keccak256(slot);
}

/**
 * MiniMe stores `balances` as `mapping(address => Checkpoint[])`, so a holder's checkpoints start at the
 * data slot of the array found in the mapping.
 */
export const keccakSlotResolver: StorageSlotResolver = {
  getCheckpointsBaseSlot(holder: Uint8Array, mapIndexSlot: number): Uint8Array {
    return getArrayDataSlot(getMapSlot(holder, mapIndexSlot));
  },
};
