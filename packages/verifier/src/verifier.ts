import {Logger, errorMessage, toHex} from "@minime-proofs/utils";
import {
  ADDRESS_LENGTH,
  MAX_TOKEN_DECIMALS,
  MINIME_PROOF_COUNT,
  STORAGE_KEY_LENGTH,
  STORAGE_ROOT_LENGTH,
  STORAGE_VALUE_MAX_LENGTH,
} from "./constants.js";
import {decodeMinimeCheckpoint, isValidDecimals} from "./checkpoint.js";
import {MinimeKeyError, MinimeProofError, MinimeProofErrorCode} from "./errors.js";
import {CheckMinimeProofOpts, MerkleProofVerifier, VerifyMinimeProofOpts} from "./interfaces.js";
import {checkMinimeKeys} from "./keys.js";
import {TrieStorageProofVerifier} from "./trie.js";
import {MinimeCheckpoint, MinimeProofQuery, MinimeProofResult, StorageProof} from "./types.js";
import {getLogger} from "./utils/logger.js";

type SanitizedQuery = {
  proof0: StorageProof;
  proof1: StorageProof;
  targetBalance: bigint;
  targetBlock: bigint;
};

/**
 * Verify a MiniMe token balance proof: `targetBalance` is the holder's balance at `targetBlock`.
 *
 * `proofs[0]` must be the checkpoint at or before the target block and `proofs[1]` the next slot of the
 * holder's checkpoint array, either the next checkpoint or a proof of non-existence. The checkpoints are
 * verified to fulfill `checkpoint0.block <= targetBlock < checkpoint1.block`, then both proofs are
 * authenticated against `storageRoot`.
 *
 * Rejects with a `MinimeProofError` at the first failed check.
 */
export async function verifyMinimeProof(
  query: MinimeProofQuery,
  opts: VerifyMinimeProofOpts = {}
): Promise<MinimeProofResult> {
  const logger = getLogger(opts);
  const proofVerifier = opts.proofVerifier ?? new TrieStorageProofVerifier();

  try {
    const result = checkMinimeProofWithLogger(query, opts, logger);

    for (const [index, proof] of query.proofs.entries()) {
      await assertValidStorageProof(proofVerifier, query.storageRoot, proof, index);
    }

    logger.verbose("Minime proof verified", {
      holder: toHex(query.holder),
      balance: result.checkpoint.balance,
      checkpointBlock: result.checkpoint.block,
      checkpointIndex: result.checkpointIndex,
    });
    return result;
  } catch (e) {
    logger.debug("Minime proof rejected", {holder: toHex(query.holder)}, e instanceof Error ? e : undefined);
    throw e;
  }
}

/**
 * Run every check of `verifyMinimeProof` except the authentication of the proofs against the storage root
 */
export function checkMinimeProof(query: MinimeProofQuery, opts: CheckMinimeProofOpts = {}): MinimeProofResult {
  return checkMinimeProofWithLogger(query, opts, getLogger(opts));
}

function checkMinimeProofWithLogger(
  query: MinimeProofQuery,
  opts: CheckMinimeProofOpts,
  logger: Logger
): MinimeProofResult {
  const decimals = opts.decimals ?? 0;
  const {proof0, proof1, targetBalance, targetBlock} = sanityCheck(query, decimals);

  // Check the proof keys match the holder
  let checkpointIndex: bigint;
  try {
    checkpointIndex = checkMinimeKeys(proof0.key, proof1.key, query.holder, query.mapIndexSlot, opts.slotResolver);
  } catch (e) {
    if (e instanceof MinimeKeyError) {
      throw new MinimeProofError(
        {code: MinimeProofErrorCode.KEY_MISMATCH, reason: e.type.code},
        `Proof key and holder do not match: ${e.message}`
      );
    }
    throw e;
  }

  const checkpoint = decodeMinimeCheckpoint(proof0.value, decimals);
  logger.debug("Decoded minime checkpoint", {index: checkpointIndex, balance: checkpoint.balance, block: checkpoint.block});

  if (checkpoint.balance !== targetBalance) {
    throw new MinimeProofError(
      {
        code: MinimeProofErrorCode.BALANCE_MISMATCH,
        proofBalance: checkpoint.balance.toString(),
        targetBalance: targetBalance.toString(),
      },
      `Proof balance and target balance mismatch (${checkpoint.balance} != ${targetBalance})`
    );
  }

  // Verify that `checkpoint.block <= targetBlock < nextCheckpoint.block`
  if (checkpoint.block > targetBlock) {
    throw new MinimeProofError(
      {
        code: MinimeProofErrorCode.CHECKPOINT_AFTER_TARGET,
        checkpointBlock: checkpoint.block.toString(),
        targetBlock: targetBlock.toString(),
      },
      `Checkpoint block ${checkpoint.block} is after target block ${targetBlock}`
    );
  }

  // An empty second value proves there is no later checkpoint, so the first one is the latest and
  // covers any target block after it
  let nextCheckpoint: MinimeCheckpoint | null = null;
  if (proof1.value.length > 0) {
    nextCheckpoint = decodeMinimeCheckpoint(proof1.value, decimals);

    if (checkpoint.block >= nextCheckpoint.block) {
      throw new MinimeProofError(
        {
          code: MinimeProofErrorCode.CHECKPOINTS_NOT_ORDERED,
          block0: checkpoint.block.toString(),
          block1: nextCheckpoint.block.toString(),
        },
        `Checkpoint block ${checkpoint.block} is not before next checkpoint block ${nextCheckpoint.block}`
      );
    }

    if (targetBlock >= nextCheckpoint.block) {
      throw new MinimeProofError(
        {
          code: MinimeProofErrorCode.TARGET_NOT_BEFORE_NEXT_CHECKPOINT,
          targetBlock: targetBlock.toString(),
          nextCheckpointBlock: nextCheckpoint.block.toString(),
        },
        `Target block ${targetBlock} is not before next checkpoint block ${nextCheckpoint.block}`
      );
    }
  }

  return {checkpoint, nextCheckpoint, checkpointIndex};
}

function sanityCheck(
  {holder, storageRoot, proofs, mapIndexSlot, targetBalance, targetBlock}: MinimeProofQuery,
  decimals: number
): SanitizedQuery {
  if (proofs.length !== MINIME_PROOF_COUNT) {
    throw new MinimeProofError(
      {code: MinimeProofErrorCode.WRONG_PROOF_COUNT, count: proofs.length},
      `Expected ${MINIME_PROOF_COUNT} storage proofs, got ${proofs.length}`
    );
  }
  const [proof0, proof1] = proofs;

  for (const [index, {key, value}] of proofs.entries()) {
    // Only the second value may be empty, as a proof of non-existence
    if (index === 0 && value.length === 0) {
      throw new MinimeProofError({code: MinimeProofErrorCode.EMPTY_CHECKPOINT_VALUE}, "Checkpoint value is empty");
    }
    if (value.length > STORAGE_VALUE_MAX_LENGTH) {
      throw new MinimeProofError(
        {code: MinimeProofErrorCode.INVALID_VALUE_LENGTH, index, length: value.length},
        `Value length is wrong. Expected <= ${STORAGE_VALUE_MAX_LENGTH}, got ${value.length}`
      );
    }
    if (key.length !== STORAGE_KEY_LENGTH) {
      throw new MinimeProofError(
        {code: MinimeProofErrorCode.INVALID_KEY_LENGTH, index, length: key.length},
        `Key length is wrong. Expected ${STORAGE_KEY_LENGTH}, got ${key.length}`
      );
    }
  }

  if (targetBalance === null) {
    throw new MinimeProofError({code: MinimeProofErrorCode.MISSING_TARGET_BALANCE}, "Target balance is missing");
  }
  if (targetBlock === null) {
    throw new MinimeProofError({code: MinimeProofErrorCode.MISSING_TARGET_BLOCK}, "Target block is missing");
  }

  if (holder.length !== ADDRESS_LENGTH) {
    throw new MinimeProofError(
      {code: MinimeProofErrorCode.INVALID_HOLDER_LENGTH, length: holder.length},
      `Holder length is wrong. Expected ${ADDRESS_LENGTH}, got ${holder.length}`
    );
  }
  if (storageRoot.length !== STORAGE_ROOT_LENGTH) {
    throw new MinimeProofError(
      {code: MinimeProofErrorCode.INVALID_STORAGE_ROOT_LENGTH, length: storageRoot.length},
      `Storage root length is wrong. Expected ${STORAGE_ROOT_LENGTH}, got ${storageRoot.length}`
    );
  }
  if (!Number.isSafeInteger(mapIndexSlot) || mapIndexSlot < 0) {
    throw new MinimeProofError(
      {code: MinimeProofErrorCode.INVALID_MAP_INDEX_SLOT, mapIndexSlot},
      `mapIndexSlot must be a non-negative integer, got ${mapIndexSlot}`
    );
  }
  // Only scales the returned balances
  if (!isValidDecimals(decimals)) {
    throw new MinimeProofError(
      {code: MinimeProofErrorCode.INVALID_DECIMALS, decimals},
      `Decimals must be an integer in [0, ${MAX_TOKEN_DECIMALS}], got ${decimals}`
    );
  }

  return {proof0, proof1, targetBalance, targetBlock};
}

async function assertValidStorageProof(
  proofVerifier: MerkleProofVerifier,
  storageRoot: Uint8Array,
  {key, value, proof}: StorageProof,
  index: number
): Promise<void> {
  let valid: boolean;
  try {
    valid = await proofVerifier.verify({storageRoot, key, value, proof});
  } catch (e) {
    throw new MinimeProofError(
      {code: MinimeProofErrorCode.PROOF_VERIFICATION_ERROR, index, reason: errorMessage(e)},
      `Proof ${index} could not be verified: ${errorMessage(e)}`
    );
  }

  if (!valid) {
    throw new MinimeProofError({code: MinimeProofErrorCode.INVALID_PROOF, index}, `Proof ${index} is not valid`);
  }
}
