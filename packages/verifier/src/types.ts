export type HexString = string;

/**
 * Storage proof of a single slot, decoded to bytes
 */
export type StorageProof = {
  /** Storage slot, 32 bytes */
  key: Uint8Array;
  /** Slot content, 0 to 32 bytes. Empty for a proof of non-existence */
  value: Uint8Array;
  /** RLP encoded trie nodes from the storage root down to the slot */
  proof: Uint8Array[];
};

export type MinimeProofQuery = {
  /** Token holder address, 20 bytes */
  holder: Uint8Array;
  /** Storage trie root of the token contract, 32 bytes */
  storageRoot: Uint8Array;
  /** `[checkpoint at or before targetBlock, next checkpoint slot]` */
  proofs: StorageProof[];
  /** Storage index of the `balances` mapping in the token contract */
  mapIndexSlot: number;
  /** Claimed balance in full units, without decimals. `null` is rejected */
  targetBalance: bigint | null;
  /** `null` is rejected */
  targetBlock: bigint | null;
};

export type Rational = {
  numerator: bigint;
  denominator: bigint;
};

export type MinimeCheckpoint = {
  /** Balance in full units */
  balance: bigint;
  /** Block number from which the balance applies */
  block: bigint;
  /** `balance / 10^decimals` */
  scaledBalance: Rational;
};

export type MinimeProofResult = {
  checkpoint: MinimeCheckpoint;
  /** `null` when the second proof shows that no later checkpoint exists */
  nextCheckpoint: MinimeCheckpoint | null;
  /** Position of the checkpoint in the holder's checkpoint array */
  checkpointIndex: bigint;
};

// eth_getProof response shapes (EIP-1186)

export interface ELStorageProofEntry {
  readonly key: HexString;
  readonly value: HexString;
  readonly proof: HexString[];
}

export interface ELProof {
  readonly address: HexString;
  readonly balance: HexString;
  readonly codeHash: HexString;
  readonly nonce: HexString;
  readonly storageHash: HexString;
  readonly accountProof: HexString[];
  readonly storageProof: ELStorageProofEntry[];
}

export type ELStorageProof = Pick<ELProof, "storageHash" | "storageProof">;
