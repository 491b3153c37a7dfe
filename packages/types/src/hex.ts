/**
 * Hex helpers.
 *
 * Every byte string in the domain model is lowercase hex without a
 * `0x` prefix. These helpers convert at the edges where raw bytes are
 * needed (signing, hashing, predicate templates).
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

/** Lowercase hex string, no `0x` prefix. */
export type Hex = string;

const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function toHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes);
}

/**
 * Decode a hex string into bytes.
 *
 * Accepts upper case input. Throws on odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex.toLowerCase());
}

export function concatBytes(...parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
