/**
 * Canonical encoding, signing bytes and hashes.
 *
 * Orders are encoded as RFC 8785 canonical JSON (via json-canonicalize)
 * after bigints are rendered as decimal strings and byte arrays as hex.
 * Signing bytes never include the proof they are signed into:
 *
 * - auth proof signs `{ payload, stateUnlock }`
 * - fee proof signs `{ payload, stateUnlock, authProof }`
 * - the transaction hash covers the whole order
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Hex } from "./hex.js";
import { concatBytes, fromHex, toHex } from "./hex.js";
import type {
  BlockHeader,
  Payload,
  TransactionOrder,
  TransactionRecord,
} from "./transaction.js";
import { newUnitId, UnitTag } from "./unit-id.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * Convert a domain value into plain JSON.
 *
 * bigint → decimal string, Uint8Array → hex, undefined fields dropped.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new TypeError(`cannot encode non-finite number ${value}`);
    }
    return value;
  }
  if (value instanceof Uint8Array) return toHex(value);
  if (Array.isArray(value)) return value.map((v: unknown) => toJsonValue(v));
  if (typeof value === "object") {
    const out: Record<string, JsonValue> = {};
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) out[key] = toJsonValue(v);
    }
    return out;
  }
  throw new TypeError(`cannot encode value of type ${typeof value}`);
}

export function canonicalJson(value: unknown): string {
  return canonicalize(toJsonValue(value));
}

export function canonicalBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalJson(value));
}

export function sha256(data: Uint8Array | string): Uint8Array {
  return createHash("sha256").update(data).digest();
}

export function sha256Hex(data: Uint8Array | string): Hex {
  return createHash("sha256").update(data).digest("hex");
}

// =============================================================================
// Transaction bytes
// =============================================================================

export function authProofSigBytes(tx: TransactionOrder): Uint8Array {
  return canonicalBytes({ payload: tx.payload, stateUnlock: tx.stateUnlock });
}

export function feeProofSigBytes(tx: TransactionOrder): Uint8Array {
  return canonicalBytes({
    payload: tx.payload,
    stateUnlock: tx.stateUnlock,
    authProof: tx.authProof,
  });
}

export function transactionHash(tx: TransactionOrder): Hex {
  return sha256Hex(canonicalBytes(tx));
}

/** Merkle leaf of a record: covers the order and its execution metadata. */
export function transactionRecordHash(record: TransactionRecord): Hex {
  return sha256Hex(canonicalBytes(record));
}

export function blockHeaderHash(header: BlockHeader, txRoot: Hex): Hex {
  return sha256Hex(canonicalBytes({ ...header, txRoot }));
}

// =============================================================================
// Derived unit IDs
// =============================================================================

/**
 * ID of a newly minted token: hash of the mint payload with an empty
 * unit ID, tagged with the token class of the payload.
 */
export function mintedTokenId(payload: Payload): Hex {
  const tag =
    payload.type === "mintNFT" ? UnitTag.NonFungibleToken : UnitTag.FungibleToken;
  return newUnitId(sha256(canonicalBytes({ ...payload, unitId: "" })), tag);
}

/** ID of the unit created by a split, derived from the split order's auth signing bytes. */
export function splitTokenId(tx: TransactionOrder): Hex {
  const digest = sha256(authProofSigBytes(tx));
  return newUnitId(
    sha256(concatBytes(digest, fromHex(tx.payload.unitId))),
    UnitTag.FungibleToken,
  );
}

/** Fee credit record ID owned by the given owner predicate. */
export function feeCreditRecordIdFor(ownerPredicate: Hex): Hex {
  return newUnitId(sha256(fromHex(ownerPredicate)), UnitTag.FeeCreditRecord);
}
