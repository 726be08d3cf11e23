import type { Hex } from "../types/brands";

export const U64_MAX = (1n << 64n) - 1n;
export const U256_MAX = (1n << 256n) - 1n;

/* ── human-readable quantities ───────────────────────────── */

/** Minimal lowercase hex: `0x0`, `0x1`, `0x2fefd8`. */
export const toQuantity = (n: bigint): Hex => {
  if (n < 0n) throw new RangeError(`quantity must be unsigned, got ${n}`);
  return `0x${n.toString(16)}`;
};

/** Case-insensitive, any number of leading zeros. */
export const QUANTITY_RE = /^0[xX][0-9a-fA-F]+$/;

export const fromQuantity = (s: string): bigint => {
  if (!QUANTITY_RE.test(s)) throw new RangeError(`not a hex quantity: ${s}`);
  return BigInt(`0x${s.slice(2)}`);
};

/* ── little-endian fixed-width integers ──────────────────── */

const checkRange = (n: bigint, max: bigint, what: string) => {
  if (n < 0n || n > max) throw new RangeError(`${what} out of range: ${n}`);
};

export const writeUint64LE = (out: Uint8Array, offset: number, n: bigint): number => {
  checkRange(n, U64_MAX, "uint64");
  new DataView(out.buffer, out.byteOffset, out.byteLength).setBigUint64(offset, n, true);
  return offset + 8;
};

export const readUint64LE = (bytes: Uint8Array, offset = 0): bigint =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(offset, true);

export const writeUint256LE = (out: Uint8Array, offset: number, n: bigint): number => {
  checkRange(n, U256_MAX, "uint256");
  let rest = n;
  for (let i = 0; i < 32; i++) {
    out[offset + i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return offset + 32;
};

export const readUint256LE = (bytes: Uint8Array, offset = 0): bigint => {
  let n = 0n;
  for (let i = 31; i >= 0; i--) n = (n << 8n) | BigInt(bytes[offset + i]);
  return n;
};

export const writeUint32LE = (out: Uint8Array, offset: number, n: number): number => {
  new DataView(out.buffer, out.byteOffset, out.byteLength).setUint32(offset, n, true);
  return offset + 4;
};

export const readUint32LE = (bytes: Uint8Array, offset = 0): number =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, true);

/** 8-byte big-endian, as hashed into payload ids. */
export const uint64BE = (n: bigint): Uint8Array => {
  checkRange(n, U64_MAX, "uint64");
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, n, false);
  return out;
};
