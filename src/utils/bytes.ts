import { bytesToHex as rawHex, hexToBytes as rawBytes } from "@noble/hashes/utils";
import type { Address, Hex } from "../types";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${rawHex(bytes)}`;

export const hexToBytes = (hex: Hex): Uint8Array => rawBytes(hex.slice(2));

export const equalBytes = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((x, i) => x === b[i]);

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export const isAddress = (v: string): v is Address => ADDRESS_RE.test(v);

/** Lower-cases so map keys compare byte-wise. */
export const normalizeAddress = (v: string): Address => {
  if (!isAddress(v)) throw new TypeError(`not a 20-byte address: ${v}`);
  return `0x${v.slice(2).toLowerCase()}`;
};

export const ZERO_ADDRESS: Address = `0x${"00".repeat(20)}`;
