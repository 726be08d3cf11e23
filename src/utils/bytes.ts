import {
  bytesToHex as rawBytesToHex,
  hexToBytes as rawHexToBytes,
} from "@noble/hashes/utils";
import { concat } from "uint8arrays";
import type { Hex } from "../types/brands";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${rawBytesToHex(bytes)}`;

/** Accepts `0x`/`0X`-prefixed, even-length hex in either case. */
export const hexToBytes = (hex: string): Uint8Array => {
  if (!/^0[xX]/.test(hex)) throw new RangeError(`hex string must start with 0x: ${hex.slice(0, 16)}`);
  return rawHexToBytes(hex.slice(2));
};

export const concatBytes = (parts: readonly Uint8Array[]): Uint8Array => concat([...parts]);

/** Like `bytesToHex`, for fields of a fixed width. */
export const fixedBytesToHex = (bytes: Uint8Array, size: number): Hex => {
  if (bytes.length !== size) throw new RangeError(`expected ${size}-byte value, got ${bytes.length} bytes`);
  return bytesToHex(bytes);
};
