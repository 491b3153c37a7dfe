/**
 * Token Types
 *
 * Local view of token types, token units and fee credit bills as
 * maintained by the block processor and read by the wallet.
 *
 * Rules:
 * - All types are immutable (readonly)
 * - Byte fields are lowercase hex
 * - uint64 quantities are bigint
 */

import type { Hex } from "./hex.js";

export type TokenKind = "fungible" | "nft";

/** Query filter over token kinds. */
export type TokenKindFilter = TokenKind | "all";

/** Lock reason codes. Zero means unlocked. */
export const LockReason = {
  Unlocked: 0,
  Manual: 1,
  CollectDust: 2,
} as const;

export interface TokenIcon {
  /** MIME type, e.g. "image/png" */
  readonly type: string;
  readonly data: Hex;
}

// ─── Token Types ─────────────────────────────────────────────────────────

interface TokenTypeBase {
  readonly id: Hex;
  /** Null for a root type. */
  readonly parentTypeId: Hex | null;
  readonly symbol: string;
  readonly name: string;
  readonly icon: TokenIcon | null;
  readonly subTypeCreationPredicate: Hex;
  readonly tokenMintingPredicate: Hex;
  /** Inherited by every token of this type. */
  readonly tokenTypeOwnerPredicate: Hex;
  /** Compressed public key of the fee payer of the define transaction. */
  readonly creator: Hex | null;
  readonly txHash: Hex;
}

export interface FungibleTokenType extends TokenTypeBase {
  readonly kind: "fungible";
  readonly decimalPlaces: number;
}

export interface NonFungibleTokenType extends TokenTypeBase {
  readonly kind: "nft";
  readonly dataUpdatePredicate: Hex;
}

export type TokenTypeUnit = FungibleTokenType | NonFungibleTokenType;

// ─── Token Units ─────────────────────────────────────────────────────────

interface TokenUnitBase {
  readonly id: Hex;
  readonly typeId: Hex;
  readonly typeName: string;
  readonly symbol: string;
  /** Owner predicate bytes. */
  readonly owner: Hex;
  /** Advanced on every accepted mutation. */
  readonly counter: bigint;
  /** Hash of the last transaction that touched this unit. */
  readonly txHash: Hex;
  /** 0 = unlocked, otherwise a LockReason code. */
  readonly lockStatus: number;
}

export interface FungibleTokenUnit extends TokenUnitBase {
  readonly kind: "fungible";
  readonly amount: bigint;
  readonly decimals: number;
  readonly burned: boolean;
}

export interface NonFungibleTokenUnit extends TokenUnitBase {
  readonly kind: "nft";
  readonly nftName: string;
  readonly nftUri: string;
  readonly nftData: Hex;
  readonly nftDataUpdatePredicate: Hex;
}

export type TokenUnit = FungibleTokenUnit | NonFungibleTokenUnit;

// ─── Fee Credit ──────────────────────────────────────────────────────────

/** Partition-local prepaid fee balance, mirrored from the fee-credit protocol. */
export interface FeeCreditBill {
  readonly id: Hex;
  readonly balance: bigint;
  readonly lockStatus: number;
  readonly counter: bigint;
  readonly ownerPredicate: Hex;
  readonly txHash: Hex;
}
