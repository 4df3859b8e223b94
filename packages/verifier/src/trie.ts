import {RLP} from "@ethereumjs/rlp";
import {Trie} from "@ethereumjs/trie";
import {keccak256} from "ethereum-cryptography/keccak.js";
import {byteArrayEquals, trimLeadingZeros} from "@minime-proofs/utils";
import {MerkleProofArgs, MerkleProofVerifier} from "./interfaces.js";

/**
 * Verifies EIP-1186 storage proofs against a contract storage trie.
 *
 * Storage trie keys are `keccak256(slot)` and leaves hold the RLP encoding of the value without leading
 * zeros. An empty value is valid only if the trie proves the slot absent.
 */
export class TrieStorageProofVerifier implements MerkleProofVerifier {
  async verify({storageRoot, key, value, proof}: MerkleProofArgs): Promise<boolean> {
    const trie = await Trie.create();
    const expectedStorageRLP = await trie.verifyProof(storageRoot, keccak256(key), proof);
    const trimmedValue = trimLeadingZeros(value);

    if (expectedStorageRLP === null) {
      return trimmedValue.length === 0;
    }

    return byteArrayEquals(expectedStorageRLP, RLP.encode(trimmedValue));
  }
}
