export * from "./constants.js";
export * from "./types.js";
export * from "./interfaces.js";
export * from "./errors.js";
export {decodeMinimeCheckpoint, encodeMinimeCheckpoint, formatRational, scaleBalance} from "./checkpoint.js";
export {getArrayDataSlot, getMapSlot, keccakSlotResolver} from "./slots.js";
export {checkMinimeKeys} from "./keys.js";
export {TrieStorageProofVerifier} from "./trie.js";
export {checkMinimeProof, verifyMinimeProof} from "./verifier.js";
export {isELStorageProof, minimeQueryFromEL, storageProofFromEL} from "./utils/conversion.js";
