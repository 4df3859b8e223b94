import {describe, it, expect} from "vitest";
import {
  bigIntToBytes,
  byteArrayEquals,
  bytesToBigInt,
  fromHex,
  padLeft,
  toHex,
  trimLeadingZeros,
} from "../../src/index.js";

describe("bytes", () => {
  describe("bigint conversion", () => {
    const testCases: {value: bigint; length: number; hex: string}[] = [
      {value: BigInt(0), length: 2, hex: "0x0000"},
      {value: BigInt(258), length: 4, hex: "0x00000102"},
      {value: BigInt(2) ** BigInt(128) - BigInt(1), length: 16, hex: "0x" + "ff".repeat(16)},
    ];

    for (const {value, length, hex} of testCases) {
      it(`should convert ${value} to ${length} bytes`, () => {
        expect(toHex(bigIntToBytes(value, length))).toBe(hex);
        expect(bytesToBigInt(fromHex(hex))).toBe(value);
      });
    }

    it("should read empty bytes as zero", () => {
      expect(bytesToBigInt(new Uint8Array(0))).toBe(BigInt(0));
    });

    it("should reject values that don't fit", () => {
      expect(() => bigIntToBytes(BigInt(256), 1)).toThrow("Value 256 does not fit in 1 bytes");
      expect(() => bigIntToBytes(BigInt(-1), 1)).toThrow(RangeError);
    });
  });

  describe("fromHex", () => {
    it("should pad odd length hex", () => {
      expect(Array.from(fromHex("0x0"))).toEqual([0]);
      expect(Array.from(fromHex("abc"))).toEqual([0x0a, 0xbc]);
    });

    it("should parse an empty string", () => {
      expect(fromHex("0x").length).toBe(0);
    });

    it("should reject non hex characters", () => {
      expect(() => fromHex("0xzz")).toThrow("Invalid hex string: 0xzz");
    });
  });

  it("padLeft", () => {
    expect(Array.from(padLeft(Uint8Array.from([1, 2]), 4))).toEqual([0, 0, 1, 2]);
    expect(Array.from(padLeft(Uint8Array.from([1, 2, 3]), 2))).toEqual([1, 2, 3]);
  });

  it("trimLeadingZeros", () => {
    expect(Array.from(trimLeadingZeros(Uint8Array.from([0, 0, 1, 0])))).toEqual([1, 0]);
    expect(trimLeadingZeros(new Uint8Array(3)).length).toBe(0);
  });

  it("byteArrayEquals", () => {
    expect(byteArrayEquals(Uint8Array.from([1, 2]), Uint8Array.from([1, 2]))).toBe(true);
    expect(byteArrayEquals(Uint8Array.from([1, 2]), Uint8Array.from([1, 3]))).toBe(false);
    expect(byteArrayEquals(Uint8Array.from([1]), Uint8Array.from([1, 0]))).toBe(false);
  });
});
