/**
 * Runtime Type Guards
 *
 * Narrowing functions for token domain types.
 */

import type { Payload, PayloadOf, TransactionOrder, TxType } from "./transaction.js";
import { TxType as TxTypes } from "./transaction.js";
import type {
  FungibleTokenType,
  FungibleTokenUnit,
  NonFungibleTokenType,
  NonFungibleTokenUnit,
  TokenKind,
  TokenKindFilter,
  TokenTypeUnit,
  TokenUnit,
} from "./tokens.js";

const TOKEN_KINDS = new Set<string>(["fungible", "nft"]);
const TX_TYPES = new Set<string>(Object.values(TxTypes));

export function isTokenKind(value: unknown): value is TokenKind {
  return typeof value === "string" && TOKEN_KINDS.has(value);
}

export function isTokenKindFilter(value: unknown): value is TokenKindFilter {
  return value === "all" || isTokenKind(value);
}

export function isTxType(value: unknown): value is TxType {
  return typeof value === "string" && TX_TYPES.has(value);
}

export function isFungibleToken(token: TokenUnit): token is FungibleTokenUnit {
  return token.kind === "fungible";
}

export function isNonFungibleToken(token: TokenUnit): token is NonFungibleTokenUnit {
  return token.kind === "nft";
}

export function isFungibleType(type: TokenTypeUnit): type is FungibleTokenType {
  return type.kind === "fungible";
}

export function isNonFungibleType(type: TokenTypeUnit): type is NonFungibleTokenType {
  return type.kind === "nft";
}

export function matchesKind(kind: TokenKindFilter, value: { readonly kind: TokenKind }): boolean {
  return kind === "all" || value.kind === kind;
}

/** Narrow an order to one payload type. */
export function hasPayloadType<T extends TxType>(
  tx: TransactionOrder,
  type: T,
): tx is TransactionOrder<PayloadOf<T> & Payload> {
  return tx.payload.type === type;
}
