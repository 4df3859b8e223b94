import {fromHex, padLeft, trimLeadingZeros} from "@minime-proofs/utils";
import {STORAGE_KEY_LENGTH} from "../constants.js";
import {ELStorageProof, ELStorageProofEntry, HexString, MinimeProofQuery, StorageProof} from "../types.js";

/**
 * Convert an `eth_getProof` storage proof entry to bytes.
 * Keys may be returned unpadded (`0x0`) and values as quantities, where `0x0` means the slot is empty.
 */
export function storageProofFromEL(sp: ELStorageProofEntry): StorageProof {
  return {
    key: padLeft(fromHex(sp.key), STORAGE_KEY_LENGTH),
    value: trimLeadingZeros(fromHex(sp.value)),
    proof: sp.proof.map(fromHex),
  };
}

export function minimeQueryFromEL({
  proof,
  holder,
  mapIndexSlot,
  targetBalance,
  targetBlock,
}: {
  proof: ELStorageProof;
  holder: HexString;
  mapIndexSlot: number;
  targetBalance: bigint;
  targetBlock: bigint;
}): MinimeProofQuery {
  return {
    holder: fromHex(holder),
    storageRoot: fromHex(proof.storageHash),
    proofs: proof.storageProof.map(storageProofFromEL),
    mapIndexSlot,
    targetBalance,
    targetBlock,
  };
}

function isHexString(value: unknown): value is HexString {
  return typeof value === "string" && /^0x[0-9a-fA-F]*$/.test(value);
}

function isELStorageProofEntry(value: unknown): value is ELStorageProofEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "key" in value &&
    isHexString(value.key) &&
    "value" in value &&
    isHexString(value.value) &&
    "proof" in value &&
    Array.isArray(value.proof) &&
    value.proof.every(isHexString)
  );
}

/**
 * Shape check for storage proofs read from untyped sources such as files
 */
export function isELStorageProof(value: unknown): value is ELStorageProof {
  return (
    typeof value === "object" &&
    value !== null &&
    "storageHash" in value &&
    isHexString(value.storageHash) &&
    "storageProof" in value &&
    Array.isArray(value.storageProof) &&
    value.storageProof.every(isELStorageProofEntry)
  );
}
