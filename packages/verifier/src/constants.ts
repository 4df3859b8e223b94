export const ADDRESS_LENGTH = 20;
export const STORAGE_ROOT_LENGTH = 32;
export const STORAGE_KEY_LENGTH = 32;
/** A storage value is one EVM word, possibly with its leading zero bytes trimmed */
export const STORAGE_VALUE_MAX_LENGTH = 32;

/** Checkpoint balance and block are each packed as a uint128 in half of the storage word */
export const CHECKPOINT_FIELD_LENGTH = 16;
export const MAX_UINT128 = (BigInt(1) << BigInt(128)) - BigInt(1);

/**
 * Maximum number of checkpoints accepted per holder. A proof key further than this from the start of the
 * holder's checkpoint array is rejected, so proofs for unrelated storage slots can't pass as checkpoints.
 */
export const MAX_MINIME_CHECKPOINTS = 2 ** 16;

/** Number of proofs in a query: the checkpoint at or before the target block, and the next slot */
export const MINIME_PROOF_COUNT = 2;

export const DEFAULT_DISPLAY_DECIMALS = 5;
/** ERC-20 `decimals()` is a uint8 */
export const MAX_TOKEN_DECIMALS = 255;
