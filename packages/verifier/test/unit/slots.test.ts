import {describe, it, expect} from "vitest";
import {keccak256} from "ethereum-cryptography/keccak.js";
import {bigIntToBytes, toHex} from "@minime-proofs/utils";
import {getArrayDataSlot, getMapSlot, keccakSlotResolver} from "../../src/index.js";
import {holderFixture} from "../utils/minimeStorage.js";

describe("storage slots", () => {
  it("getArrayDataSlot hashes the length slot", () => {
    expect(toHex(getArrayDataSlot(new Uint8Array(32)))).toBe(
      "0x290decd9548b62a8d60345a988386fc84ba6bc95484008f6362f93160ef3e563"
    );
    expect(toHex(getArrayDataSlot(bigIntToBytes(BigInt(1), 32)))).toBe(
      "0xb10e2d527612073b26eecdfd717e6a320cf44b4afac2b0732d9fcbe2b7fa0cf6"
    );
  });

  it("getMapSlot hashes the padded key and mapping slot", () => {
    expect(toHex(getMapSlot(new Uint8Array(20), 0))).toBe(
      "0xad3228b676f7d3cd4284a5443f17f1962b36e491b30a40b2405849e597ba5fb5"
    );

    const preimage = new Uint8Array(64);
    preimage.set(holderFixture, 12);
    preimage[63] = 3;
    expect(toHex(getMapSlot(holderFixture, 3))).toBe(toHex(keccak256(preimage)));
  });

  it("getMapSlot depends on the mapping slot", () => {
    expect(toHex(getMapSlot(holderFixture, 3))).not.toBe(toHex(getMapSlot(holderFixture, 4)));
  });

  it("getMapSlot rejects invalid mapping slots", () => {
    expect(() => getMapSlot(holderFixture, -1)).toThrow("mapIndexSlot must be a non-negative integer, got -1");
    expect(() => getMapSlot(holderFixture, 1.5)).toThrow("mapIndexSlot must be a non-negative integer, got 1.5");
  });

  it("keccakSlotResolver chains the map and array slots", () => {
    expect(toHex(keccakSlotResolver.getCheckpointsBaseSlot(holderFixture, 3))).toBe(
      toHex(getArrayDataSlot(getMapSlot(holderFixture, 3)))
    );
  });
});
