import {bigIntToBytes as bigIntToMinimalBytes, setLengthLeft} from "@ethereumjs/util";

export {bytesToBigInt} from "@ethereumjs/util";

/**
 * Big-endian bytes of an unsigned integer, left-padded to `length`
 */
export function bigIntToBytes(value: bigint, length: number): Uint8Array {
  if (value < BigInt(0) || value >= BigInt(1) << BigInt(length * 8)) {
    throw RangeError(`Value ${value} does not fit in ${length} bytes`);
  }
  return setLengthLeft(bigIntToMinimalBytes(value), length);
}

export function toHex(buffer: Uint8Array): string {
  return "0x" + Buffer.from(buffer.buffer, buffer.byteOffset, buffer.length).toString("hex");
}

/**
 * Parse a hex string with or without `0x` prefix. Odd-length strings are padded with a leading zero.
 */
export function fromHex(hex: string): Uint8Array {
  const raw = hex.startsWith("0x") ? hex.slice(2) : hex;
  if (!/^[0-9a-fA-F]*$/.test(raw)) {
    throw Error(`Invalid hex string: ${hex}`);
  }
  const b = Buffer.from(raw.length % 2 ? `0${raw}` : raw, "hex");
  return new Uint8Array(b.buffer, b.byteOffset, b.length);
}

/**
 * Left-pad `bytes` with zeros up to `length`. Inputs already at least `length` long are returned as a copy.
 */
export function padLeft(bytes: Uint8Array, length: number): Uint8Array {
  if (bytes.length >= length) return Uint8Array.from(bytes);
  const out = new Uint8Array(length);
  out.set(bytes, length - bytes.length);
  return out;
}

/**
 * Drop leading zero bytes, the minimal big-endian form of an unsigned integer
 */
export function trimLeadingZeros(bytes: Uint8Array): Uint8Array {
  let i = 0;
  while (i < bytes.length && bytes[i] === 0) i++;
  return bytes.slice(i);
}

export function byteArrayEquals(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
