/**
 * Test helpers for @tokenwallet/block-processor.
 */

import { ALWAYS_TRUE_BYTES, p2pkhPredicate } from "@tokenwallet/predicates";
import type {
  Block,
  ClientMetadata,
  Hex,
  Payload,
  TransactionOrder,
  TransactionRecord,
  TxRecordProof,
  TxStatus,
} from "@tokenwallet/types";
import { feeCreditRecordIdFor, mintedTokenId, toHex } from "@tokenwallet/types";

export const OWNER: Hex = toHex(p2pkhPredicate(new Uint8Array(32).fill(0x11)));
export const OTHER_OWNER: Hex = toHex(p2pkhPredicate(new Uint8Array(32).fill(0x22)));
export const FCR_ID: Hex = feeCreditRecordIdFor(OWNER);

export const FT_TYPE: Hex = "01".repeat(32) + "20";
export const FT_SUBTYPE: Hex = "02".repeat(32) + "20";
export const NFT_TYPE: Hex = "03".repeat(32) + "22";

const ALWAYS_TRUE: Hex = toHex(ALWAYS_TRUE_BYTES);

function meta(feeCreditRecordId: Hex | null = FCR_ID): ClientMetadata {
  return { timeout: 100n, maxTransactionFee: 10n, feeCreditRecordId };
}

function order(payload: Payload, feeProof: Hex | null = null): TransactionOrder {
  return { payload, stateUnlock: null, authProof: {}, feeProof };
}

export function record(
  tx: TransactionOrder,
  fee = 1n,
  status: TxStatus = "successful",
): TransactionRecord {
  return { transactionOrder: tx, serverMetadata: { actualFee: fee, successIndicator: status } };
}

export function block(round: bigint, transactions: readonly TransactionRecord[]): Block {
  return { header: { partitionId: 2, round, previousBlockHash: null }, transactions };
}

// ─── Fee credit ──────────────────────────────────────────────────────

export function addFC(transferAmount: bigint): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: FCR_ID,
    type: "addFC",
    attributes: {
      feeCreditOwnerPredicate: OWNER,
      transferAmount,
      transferFee: 1n,
      transferTxHash: "ab".repeat(32),
    },
    clientMetadata: meta(null),
  });
}

export function lockFC(counter: bigint): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: FCR_ID,
    type: "lockFC",
    attributes: { lockStatus: 1, counter },
    clientMetadata: meta(null),
  });
}

export function closeFC(amount: bigint, counter: bigint): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: FCR_ID,
    type: "closeFC",
    attributes: { amount, targetUnitId: "cd".repeat(33), counter },
    clientMetadata: meta(null),
  });
}

// ─── Types ───────────────────────────────────────────────────────────

export function defineFT(
  id: Hex,
  options: { parentTypeId?: Hex; decimalPlaces?: number; feeProof?: Hex } = {},
): TransactionOrder {
  return order(
    {
      networkId: 1,
      partitionId: 2,
      unitId: id,
      type: "defineFT",
      attributes: {
        symbol: "TT",
        name: "Test Token",
        icon: null,
        parentTypeId: options.parentTypeId ?? null,
        decimalPlaces: options.decimalPlaces ?? 2,
        subTypeCreationPredicate: ALWAYS_TRUE,
        tokenMintingPredicate: ALWAYS_TRUE,
        tokenTypeOwnerPredicate: ALWAYS_TRUE,
      },
      clientMetadata: meta(),
    },
    options.feeProof ?? null,
  );
}

export function defineNFT(id: Hex): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "defineNFT",
    attributes: {
      symbol: "ART",
      name: "Artworks",
      icon: null,
      parentTypeId: null,
      subTypeCreationPredicate: ALWAYS_TRUE,
      tokenMintingPredicate: ALWAYS_TRUE,
      tokenTypeOwnerPredicate: ALWAYS_TRUE,
      dataUpdatePredicate: ALWAYS_TRUE,
    },
    clientMetadata: meta(),
  });
}

// ─── Tokens ──────────────────────────────────────────────────────────

export function mintFT(typeId: Hex, value: bigint, nonce = 0n, owner: Hex = OWNER): TransactionOrder {
  const payload: Payload = {
    networkId: 1,
    partitionId: 2,
    unitId: "",
    type: "mintFT",
    attributes: { typeId, ownerPredicate: owner, value, nonce },
    clientMetadata: meta(),
  };
  return order({ ...payload, unitId: mintedTokenId(payload) });
}

export function mintNFT(typeId: Hex, nonce = 0n): TransactionOrder {
  const payload: Payload = {
    networkId: 1,
    partitionId: 2,
    unitId: "",
    type: "mintNFT",
    attributes: {
      typeId,
      ownerPredicate: OWNER,
      name: "first",
      uri: "https://example.org/1",
      data: "0102",
      dataUpdatePredicate: ALWAYS_TRUE,
      nonce,
    },
    clientMetadata: meta(),
  };
  return order({ ...payload, unitId: mintedTokenId(payload) });
}

export function transFT(id: Hex, typeId: Hex, value: bigint, counter: bigint): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "transFT",
    attributes: { typeId, newOwnerPredicate: OTHER_OWNER, value, counter },
    clientMetadata: meta(),
  });
}

export function transNFT(id: Hex, typeId: Hex, counter: bigint): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "transNFT",
    attributes: { typeId, newOwnerPredicate: OTHER_OWNER, counter },
    clientMetadata: meta(),
  });
}

export function splitFT(
  id: Hex,
  typeId: Hex,
  targetValue: bigint,
  remainingValue: bigint,
  counter: bigint,
): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "splitFT",
    attributes: { typeId, newOwnerPredicate: OTHER_OWNER, targetValue, remainingValue, counter },
    clientMetadata: meta(),
  });
}

export function burnFT(
  id: Hex,
  typeId: Hex,
  value: bigint,
  targetTokenId: Hex,
  targetTokenCounter: bigint,
  counter: bigint,
): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "burnFT",
    attributes: { typeId, value, targetTokenId, targetTokenCounter, counter },
    clientMetadata: meta(),
  });
}

export function joinFT(
  id: Hex,
  burnTokenTransactions: readonly TxRecordProof[],
  counter: bigint,
): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "joinFT",
    attributes: { burnTokenTransactions, counter },
    clientMetadata: meta(),
  });
}

export function updateNFT(id: Hex, data: Hex, counter: bigint): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "updateNFT",
    attributes: { data, counter },
    clientMetadata: meta(),
  });
}

export function lockToken(id: Hex, counter: bigint, lockStatus = 1): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "lockToken",
    attributes: { lockStatus, counter },
    clientMetadata: meta(),
  });
}

export function unlockToken(id: Hex, counter: bigint): TransactionOrder {
  return order({
    networkId: 1,
    partitionId: 2,
    unitId: id,
    type: "unlockToken",
    attributes: { counter },
    clientMetadata: meta(),
  });
}

export function withoutFeeCredit(tx: TransactionOrder): TransactionOrder {
  return order({ ...tx.payload, clientMetadata: meta(null) });
}
