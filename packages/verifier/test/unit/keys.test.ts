import {describe, it, expect} from "vitest";
import {bigIntToBytes} from "@minime-proofs/utils";
import {MAX_MINIME_CHECKPOINTS, MinimeKeyError, MinimeKeyErrorCode, checkMinimeKeys} from "../../src/index.js";
import {holderFixture} from "../utils/minimeStorage.js";
import {MAP_INDEX_SLOT, getCheckpointKey} from "../utils/query.js";

function getKeyError(fn: () => unknown): MinimeKeyError {
  try {
    fn();
  } catch (e) {
    if (e instanceof MinimeKeyError) return e;
    throw e;
  }
  throw Error("Expected a key error");
}

describe("checkMinimeKeys", () => {
  it("returns the checkpoint index of consecutive holder keys", () => {
    expect(checkMinimeKeys(getCheckpointKey(BigInt(0)), getCheckpointKey(BigInt(1)), holderFixture, MAP_INDEX_SLOT)).toBe(
      BigInt(0)
    );
    expect(checkMinimeKeys(getCheckpointKey(BigInt(5)), getCheckpointKey(BigInt(6)), holderFixture, MAP_INDEX_SLOT)).toBe(
      BigInt(5)
    );
  });

  it("accepts the last checkpoint slot", () => {
    const last = BigInt(MAX_MINIME_CHECKPOINTS - 1);
    expect(checkMinimeKeys(getCheckpointKey(last), getCheckpointKey(last + BigInt(1)), holderFixture, MAP_INDEX_SLOT)).toBe(
      last
    );
  });

  it("rejects keys that are not consecutive", () => {
    const key0 = getCheckpointKey(BigInt(0));
    const key1 = getCheckpointKey(BigInt(2));
    const e = getKeyError(() => checkMinimeKeys(key0, key1, holderFixture, MAP_INDEX_SLOT));

    expect(e.type.code).toBe(MinimeKeyErrorCode.KEYS_NOT_CONSECUTIVE);
    expect(e.message).toBe("Keys are not consecutive");
  });

  it("rejects the same key twice", () => {
    const key = getCheckpointKey(BigInt(0));
    const e = getKeyError(() => checkMinimeKeys(key, key, holderFixture, MAP_INDEX_SLOT));
    expect(e.type.code).toBe(MinimeKeyErrorCode.KEYS_NOT_CONSECUTIVE);
  });

  it("rejects keys past the checkpoint limit", () => {
    const key0 = getCheckpointKey(BigInt(MAX_MINIME_CHECKPOINTS));
    const key1 = getCheckpointKey(BigInt(MAX_MINIME_CHECKPOINTS + 1));
    const e = getKeyError(() => checkMinimeKeys(key0, key1, holderFixture, MAP_INDEX_SLOT));

    expect(e.type).toEqual({code: MinimeKeyErrorCode.KEY_OFFSET_OVERFLOW, offset: "65536"});
    expect(e.message).toBe("Key offset overflow, expected [0, 65536) got 65536");
  });

  it("rejects keys before the start of the checkpoint array", () => {
    const key0 = getCheckpointKey(BigInt(-1));
    const key1 = getCheckpointKey(BigInt(0));
    const e = getKeyError(() => checkMinimeKeys(key0, key1, holderFixture, MAP_INDEX_SLOT));

    expect(e.type).toEqual({code: MinimeKeyErrorCode.KEY_OFFSET_OVERFLOW, offset: "-1"});
  });

  it("resolves the base slot with the provided resolver", () => {
    const slotResolver = {getCheckpointsBaseSlot: () => bigIntToBytes(BigInt(1000), 32)};
    const key0 = bigIntToBytes(BigInt(1003), 32);
    const key1 = bigIntToBytes(BigInt(1004), 32);

    expect(checkMinimeKeys(key0, key1, holderFixture, MAP_INDEX_SLOT, slotResolver)).toBe(BigInt(3));
  });
});
