import {Logger, LogLevel} from "@minime-proofs/utils";

export type MerkleProofArgs = {
  storageRoot: Uint8Array;
  key: Uint8Array;
  value: Uint8Array;
  proof: Uint8Array[];
};

/**
 * Authenticates a storage slot value against a storage root. Resolves `false` when the proof is well formed
 * but does not derive `value` under `storageRoot`, rejects when the proof can't be processed.
 */
export interface MerkleProofVerifier {
  verify(args: MerkleProofArgs): Promise<boolean>;
}

/**
 * Resolves where a holder's checkpoint array starts in the token contract storage
 */
export interface StorageSlotResolver {
  getCheckpointsBaseSlot(holder: Uint8Array, mapIndexSlot: number): Uint8Array;
}

// Either a logger is provided by user or user specify a log level
// If both are skipped then we don't log anything
export type LogOptions = {logger?: Logger; logLevel?: never} | {logLevel?: LogLevel; logger?: never};

export type CheckMinimeProofOpts = LogOptions & {
  slotResolver?: StorageSlotResolver;
  /** Token decimals used for `scaledBalance`, defaults to 0 */
  decimals?: number;
};

export type VerifyMinimeProofOpts = CheckMinimeProofOpts & {
  /** Defaults to a `TrieStorageProofVerifier` */
  proofVerifier?: MerkleProofVerifier;
};
