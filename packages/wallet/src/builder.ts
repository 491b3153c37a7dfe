/**
 * @tokenwallet/wallet — Transaction construction.
 *
 * Payload constructors for every token lifecycle operation, plus
 * {@link signOrder}, which attaches the authorization proofs and the fee
 * proof in that order: the auth proof signs `{payload, stateUnlock}`, the
 * fee proof additionally covers the auth proof.
 *
 * Preconditions checked here are local validation only (amounts, IDs,
 * NFT field sizes); ledger state is checked by the caller.
 */

import type { AccountKey } from "@tokenwallet/types";
import { accountInput, predicateProof, predicateProofs } from "@tokenwallet/predicates";
import type { PredicateInput } from "@tokenwallet/predicates";
import type {
  AuthProof,
  DefineFungibleTypeAttributes,
  DefineNonFungibleTypeAttributes,
  FungibleTokenUnit,
  Hex,
  MintFungibleAttributes,
  MintNonFungibleAttributes,
  NonFungibleTokenUnit,
  Payload,
  PayloadOf,
  TokenUnit,
  TransactionOrder,
  TxAttributesMap,
  TxRecordProof,
  TxType,
} from "@tokenwallet/types";
import {
  authProofSigBytes,
  feeProofSigBytes,
  formatUnitTag,
  isUnitId,
  mintedTokenId,
  toHex,
  UNIT_ID_LENGTH,
  unitTagOf,
} from "@tokenwallet/types";
import type { UnitTag } from "@tokenwallet/types";
import { WalletError } from "./errors.js";
import { MAX_UINT64, NFT_DATA_MAX_BYTES, NFT_NAME_MAX_BYTES, NFT_URI_MAX_BYTES } from "./types.js";

/** Client metadata every payload is stamped with. */
export interface OrderContext {
  readonly networkId: number;
  readonly partitionId: number;
  /** Last round the order may execute in. */
  readonly timeout: bigint;
  readonly maxFee: bigint;
  readonly feeCreditRecordId: Hex;
}

function newPayload<T extends TxType>(
  ctx: OrderContext,
  type: T,
  unitId: Hex,
  attributes: TxAttributesMap[T],
): PayloadOf<T> {
  return {
    networkId: ctx.networkId,
    partitionId: ctx.partitionId,
    unitId,
    type,
    attributes,
    clientMetadata: {
      timeout: ctx.timeout,
      maxTransactionFee: ctx.maxFee,
      feeCreditRecordId: ctx.feeCreditRecordId,
    },
  };
}

// =============================================================================
// Validation
// =============================================================================

export function validateTypeId(id: Hex, tag: UnitTag): void {
  if (!isUnitId(id)) {
    throw new WalletError(
      "INVALID_TYPE_ID",
      `invalid token type ID: expected hex length is ${UNIT_ID_LENGTH * 2} characters (${UNIT_ID_LENGTH} bytes)`,
    );
  }
  if (unitTagOf(id) !== tag) {
    throw new WalletError(
      "INVALID_TYPE_ID",
      `invalid token type ID: expected unit type is ${formatUnitTag(tag)}`,
    );
  }
}

/** Amounts are uint64 and never zero. */
export function validateAmount(amount: bigint): void {
  if (amount <= 0n || amount > MAX_UINT64) {
    throw new WalletError("INVALID_AMOUNT", `invalid amount: ${amount}`);
  }
}

function byteLength(value: string): number {
  return Buffer.byteLength(value, "utf-8");
}

function isValidUri(uri: string): boolean {
  try {
    new URL(uri);
    return true;
  } catch {
    return false;
  }
}

/**
 * @throws {WalletError} INVALID_NFT_FIELD when a field is too large or the
 *   URI does not parse
 */
export function validateNftFields(fields: { name: string; uri: string; data: Hex }): void {
  if (byteLength(fields.name) > NFT_NAME_MAX_BYTES) {
    throw new WalletError(
      "INVALID_NFT_FIELD",
      `name exceeds the maximum allowed size of ${NFT_NAME_MAX_BYTES} bytes`,
    );
  }
  if (byteLength(fields.uri) > NFT_URI_MAX_BYTES) {
    throw new WalletError(
      "INVALID_NFT_FIELD",
      `URI exceeds the maximum allowed size of ${NFT_URI_MAX_BYTES} bytes`,
    );
  }
  if (fields.uri !== "" && !isValidUri(fields.uri)) {
    throw new WalletError("INVALID_NFT_FIELD", `URI '${fields.uri}' is invalid`);
  }
  validateNftData(fields.data);
}

export function validateNftData(data: Hex): void {
  if (data.length / 2 > NFT_DATA_MAX_BYTES) {
    throw new WalletError(
      "INVALID_NFT_FIELD",
      `data exceeds the maximum allowed size of ${NFT_DATA_MAX_BYTES} bytes`,
    );
  }
}

// =============================================================================
// Payloads
// =============================================================================

export function defineFungibleType(
  ctx: OrderContext,
  id: Hex,
  attributes: DefineFungibleTypeAttributes,
): PayloadOf<"defineFT"> {
  return newPayload(ctx, "defineFT", id, attributes);
}

export function defineNonFungibleType(
  ctx: OrderContext,
  id: Hex,
  attributes: DefineNonFungibleTypeAttributes,
): PayloadOf<"defineNFT"> {
  return newPayload(ctx, "defineNFT", id, attributes);
}

/** Mint payload whose unit ID is derived from its own contents. */
export function mintFungible(
  ctx: OrderContext,
  attributes: MintFungibleAttributes,
): PayloadOf<"mintFT"> {
  const draft = newPayload(ctx, "mintFT", "", attributes);
  return { ...draft, unitId: mintedTokenId(draft) };
}

export function mintNonFungible(
  ctx: OrderContext,
  attributes: MintNonFungibleAttributes,
): PayloadOf<"mintNFT"> {
  const draft = newPayload(ctx, "mintNFT", "", attributes);
  return { ...draft, unitId: mintedTokenId(draft) };
}

export function transferFungible(
  ctx: OrderContext,
  token: FungibleTokenUnit,
  newOwnerPredicate: Hex,
): PayloadOf<"transFT"> {
  return newPayload(ctx, "transFT", token.id, {
    typeId: token.typeId,
    newOwnerPredicate,
    value: token.amount,
    counter: token.counter,
  });
}

export function transferNonFungible(
  ctx: OrderContext,
  token: NonFungibleTokenUnit,
  newOwnerPredicate: Hex,
): PayloadOf<"transNFT"> {
  return newPayload(ctx, "transNFT", token.id, {
    typeId: token.typeId,
    newOwnerPredicate,
    counter: token.counter,
  });
}

/** Carve `amount` off `token` for a new owner; the remainder stays on `token`. */
export function splitFungible(
  ctx: OrderContext,
  token: FungibleTokenUnit,
  amount: bigint,
  newOwnerPredicate: Hex,
): PayloadOf<"splitFT"> {
  validateAmount(amount);
  if (amount >= token.amount) {
    throw new WalletError(
      "INVALID_AMOUNT",
      `split amount ${amount} must be less than token amount ${token.amount}`,
    );
  }
  return newPayload(ctx, "splitFT", token.id, {
    typeId: token.typeId,
    newOwnerPredicate,
    targetValue: amount,
    remainingValue: token.amount - amount,
    counter: token.counter,
  });
}

/** Transfer when `amount` equals the token amount, split otherwise. */
export function splitOrTransfer(
  ctx: OrderContext,
  token: FungibleTokenUnit,
  amount: bigint,
  newOwnerPredicate: Hex,
): PayloadOf<"transFT"> | PayloadOf<"splitFT"> {
  return amount >= token.amount
    ? transferFungible(ctx, token, newOwnerPredicate)
    : splitFungible(ctx, token, amount, newOwnerPredicate);
}

export function burnFungible(
  ctx: OrderContext,
  token: FungibleTokenUnit,
  targetTokenId: Hex,
  targetTokenCounter: bigint,
): PayloadOf<"burnFT"> {
  return newPayload(ctx, "burnFT", token.id, {
    typeId: token.typeId,
    value: token.amount,
    targetTokenId,
    targetTokenCounter,
    counter: token.counter,
  });
}

/** Join confirmed burns into `targetTokenId`. Proofs are ordered by burned unit ID. */
export function joinFungible(
  ctx: OrderContext,
  targetTokenId: Hex,
  counter: bigint,
  burnProofs: readonly TxRecordProof[],
): PayloadOf<"joinFT"> {
  const sorted = [...burnProofs].sort((a, b) => {
    const x = a.txRecord.transactionOrder.payload.unitId;
    const y = b.txRecord.transactionOrder.payload.unitId;
    return x < y ? -1 : x > y ? 1 : 0;
  });
  return newPayload(ctx, "joinFT", targetTokenId, {
    burnTokenTransactions: sorted,
    counter,
  });
}

export function updateNonFungible(
  ctx: OrderContext,
  token: NonFungibleTokenUnit,
  data: Hex,
): PayloadOf<"updateNFT"> {
  return newPayload(ctx, "updateNFT", token.id, { data, counter: token.counter });
}

export function lockTokenPayload(
  ctx: OrderContext,
  token: TokenUnit,
  lockStatus: number,
): PayloadOf<"lockToken"> {
  return newPayload(ctx, "lockToken", token.id, { lockStatus, counter: token.counter });
}

export function unlockTokenPayload(ctx: OrderContext, token: TokenUnit): PayloadOf<"unlockToken"> {
  return newPayload(ctx, "unlockToken", token.id, { counter: token.counter });
}

// =============================================================================
// Signing
// =============================================================================

/** Computes an order's auth proof from its auth signing bytes. */
export type AuthProofBuilder = (sigBytes: Uint8Array) => AuthProof;

export function proofHex(input: PredicateInput, sigBytes: Uint8Array): Hex {
  return toHex(predicateProof(input, sigBytes));
}

export function proofsHex(inputs: readonly PredicateInput[], sigBytes: Uint8Array): Hex[] {
  return predicateProofs(inputs, sigBytes).map((p) => toHex(p));
}

/**
 * Attach authorization and fee proofs. The fee is always paid by
 * `feeKey`'s P2PKH signature.
 */
export function signOrder(
  payload: Payload,
  buildAuthProof: AuthProofBuilder,
  feeKey: AccountKey,
): TransactionOrder {
  const unsigned: TransactionOrder = { payload, stateUnlock: null, authProof: {}, feeProof: null };
  const authProof = buildAuthProof(authProofSigBytes(unsigned));
  const authorized: TransactionOrder = { ...unsigned, authProof };
  const feeProof = proofHex(accountInput(feeKey), feeProofSigBytes(authorized));
  return { ...authorized, feeProof };
}
