import { bytesToHex as toHex, hexToBytes as fromHex, utf8ToBytes } from "@noble/hashes/utils";
import type { Hex } from "../types/brands";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHex(bytes)}`;

export const hexToBytes = (h: Hex): Uint8Array => fromHex(h.slice(2));

export const bytesToBigint = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(bytesToHex(b));

export const utf8 = (s: string): Uint8Array => utf8ToBytes(s);

export const fromUtf8 = (b: Uint8Array): string => new TextDecoder().decode(b);

/** Byte payloads pass through; strings are always taken as UTF-8 text. */
export const toPayloadBytes = (p: Uint8Array | string): Uint8Array =>
  typeof p === "string" ? utf8(p) : p;
