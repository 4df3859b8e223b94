import {describe, it, expect} from "vitest";
import {fromHex, toHex, trimLeadingZeros} from "@minime-proofs/utils";
import {MAX_UINT128, decodeMinimeCheckpoint, encodeMinimeCheckpoint, formatRational} from "../../src/index.js";

describe("checkpoint", () => {
  describe("decodeMinimeCheckpoint", () => {
    const boundaries = [BigInt(0), BigInt(1), BigInt(2) ** BigInt(64), MAX_UINT128];

    for (const balance of boundaries) {
      for (const block of boundaries) {
        it(`balance ${balance} block ${block}`, () => {
          const word = encodeMinimeCheckpoint({balance, block});
          expect(word.length).toBe(32);
          expect(decodeMinimeCheckpoint(word)).toEqual({
            balance,
            block,
            scaledBalance: {numerator: balance, denominator: BigInt(1)},
          });
          // eth_getProof values come without leading zeros
          expect(decodeMinimeCheckpoint(trimLeadingZeros(word))).toEqual(decodeMinimeCheckpoint(word));
        });
      }
    }

    it("reads the balance from the high half and the block from the low half", () => {
      const value = fromHex("0x03e800000000000000000000000000000064");
      const {balance, block} = decodeMinimeCheckpoint(value);
      expect(balance).toBe(BigInt(1000));
      expect(block).toBe(BigInt(100));
    });

    it("decodes a short value as a block only", () => {
      const {balance, block} = decodeMinimeCheckpoint(fromHex("0x64"));
      expect(balance).toBe(BigInt(0));
      expect(block).toBe(BigInt(100));
    });

    it("decodes an empty value as zero", () => {
      const {balance, block} = decodeMinimeCheckpoint(new Uint8Array(0));
      expect(balance).toBe(BigInt(0));
      expect(block).toBe(BigInt(0));
    });

    it("scales the balance by the token decimals", () => {
      const {scaledBalance} = decodeMinimeCheckpoint(fromHex("0x03e800000000000000000000000000000064"), 2);
      expect(scaledBalance).toEqual({numerator: BigInt(1000), denominator: BigInt(100)});
    });

    it("throws on decimals outside the uint8 range", () => {
      expect(() => decodeMinimeCheckpoint(new Uint8Array(0), 256)).toThrow(
        new RangeError("Decimals must be an integer in [0, 255], got 256")
      );
    });

    it("throws on a value longer than a word", () => {
      expect(() => decodeMinimeCheckpoint(new Uint8Array(33))).toThrow(
        "Checkpoint value must be at most 32 bytes, got 33"
      );
    });
  });

  describe("encodeMinimeCheckpoint", () => {
    it("packs balance and block big-endian", () => {
      expect(toHex(encodeMinimeCheckpoint({balance: BigInt(1000), block: BigInt(100)}))).toBe(
        "0x00000000000000000000000000000" + "3e8" + "0".repeat(30) + "64"
      );
    });

    it("rejects fields outside of uint128", () => {
      expect(() => encodeMinimeCheckpoint({balance: MAX_UINT128 + BigInt(1), block: BigInt(0)})).toThrow(RangeError);
      expect(() => encodeMinimeCheckpoint({balance: BigInt(0), block: BigInt(-1)})).toThrow(RangeError);
    });
  });

  describe("formatRational", () => {
    const testCases: {numerator: bigint; denominator: bigint; maxDecimals: number; expected: string}[] = [
      {numerator: BigInt(1000), denominator: BigInt(1), maxDecimals: 5, expected: "1000"},
      {numerator: BigInt(1000), denominator: BigInt(100), maxDecimals: 5, expected: "10.00000"},
      {numerator: BigInt(1234), denominator: BigInt(100), maxDecimals: 2, expected: "12.34"},
      {numerator: BigInt(1234), denominator: BigInt(100), maxDecimals: 0, expected: "12"},
    ];

    for (const {numerator, denominator, maxDecimals, expected} of testCases) {
      it(`${numerator}/${denominator} with ${maxDecimals} decimals -> ${expected}`, () => {
        expect(formatRational({numerator, denominator}, maxDecimals)).toBe(expected);
      });
    }
  });
});
