/**
 * Wire decoding.
 *
 * Zod schemas that turn plain JSON (uint64 as decimal strings, bytes as
 * hex) back into domain values. Encoding is {@link toJsonValue}.
 */

import { z } from "zod";
import type {
  Block,
  Payload,
  TransactionOrder,
  TransactionRecord,
  TxProof,
  TxRecordProof,
} from "./transaction.js";
import type { FeeCreditBill, TokenTypeUnit, TokenUnit } from "./tokens.js";

const MAX_UINT64 = (1n << 64n) - 1n;

// ─── Primitives ──────────────────────────────────────────────────────────

export const hexSchema = z
  .string()
  .regex(/^(?:[0-9a-f]{2})*$/, "expected lowercase hex without 0x prefix");

export const unitIdSchema = hexSchema.length(66, "expected 33-byte unit ID");

/** Numbers above 2^53 - 1 have lost precision and must come as strings. */
export const uint64Schema = z
  .union([
    z.string().regex(/^\d+$/, "expected unsigned decimal string"),
    z.number().int().nonnegative().refine(Number.isSafeInteger, "unsafe integer, expected a decimal string"),
    z.bigint().nonnegative(),
  ])
  .transform((v) => BigInt(v))
  .refine((v) => v <= MAX_UINT64, "value exceeds uint64");

const iconSchema = z.object({ type: z.string(), data: hexSchema }).nullable();

const clientMetadataSchema = z.object({
  timeout: uint64Schema,
  maxTransactionFee: uint64Schema,
  feeCreditRecordId: hexSchema.nullable(),
});

const authProofSchema = z.object({
  ownerProof: hexSchema.optional(),
  tokenTypeOwnerProofs: z.array(hexSchema).optional(),
  subTypeCreationProofs: z.array(hexSchema).optional(),
  tokenMintingProof: hexSchema.optional(),
  tokenDataUpdateProof: hexSchema.optional(),
  tokenTypeDataUpdateProofs: z.array(hexSchema).optional(),
});

// ─── Proofs ──────────────────────────────────────────────────────────────

export const txProofSchema: z.ZodType<TxProof, z.ZodTypeDef, unknown> = z.object({
  partitionId: z.number().int().nonnegative(),
  round: uint64Schema,
  previousBlockHash: hexSchema.nullable(),
  txRoot: hexSchema,
  blockHeaderHash: hexSchema,
  leafIndex: z.number().int().nonnegative(),
  siblings: z.array(
    z.object({ hash: hexSchema, direction: z.enum(["left", "right"]) }),
  ),
});

// Join attributes embed records, so orders and records are recursive.
export const txRecordProofSchema: z.ZodType<TxRecordProof, z.ZodTypeDef, unknown> = z.lazy(
  () => z.object({ txRecord: transactionRecordSchema, txProof: txProofSchema }),
);

// ─── Payloads ────────────────────────────────────────────────────────────

function payload<T extends string, A extends z.ZodTypeAny>(type: T, attributes: A) {
  return z.object({
    networkId: z.number().int().nonnegative(),
    partitionId: z.number().int().nonnegative(),
    unitId: hexSchema,
    type: z.literal(type),
    attributes,
    clientMetadata: clientMetadataSchema,
  });
}

const definePredicates = {
  subTypeCreationPredicate: hexSchema,
  tokenMintingPredicate: hexSchema,
  tokenTypeOwnerPredicate: hexSchema,
};

export const payloadSchema: z.ZodType<Payload, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("type", [
    payload(
      "defineFT",
      z.object({
        symbol: z.string(),
        name: z.string(),
        icon: iconSchema,
        parentTypeId: hexSchema.nullable(),
        decimalPlaces: z.number().int().min(0).max(255),
        ...definePredicates,
      }),
    ),
    payload(
      "defineNFT",
      z.object({
        symbol: z.string(),
        name: z.string(),
        icon: iconSchema,
        parentTypeId: hexSchema.nullable(),
        ...definePredicates,
        dataUpdatePredicate: hexSchema,
      }),
    ),
    payload(
      "mintFT",
      z.object({
        typeId: hexSchema,
        ownerPredicate: hexSchema,
        value: uint64Schema,
        nonce: uint64Schema,
      }),
    ),
    payload(
      "mintNFT",
      z.object({
        typeId: hexSchema,
        ownerPredicate: hexSchema,
        name: z.string(),
        uri: z.string(),
        data: hexSchema,
        dataUpdatePredicate: hexSchema,
        nonce: uint64Schema,
      }),
    ),
    payload(
      "transFT",
      z.object({
        typeId: hexSchema,
        newOwnerPredicate: hexSchema,
        value: uint64Schema,
        counter: uint64Schema,
      }),
    ),
    payload(
      "transNFT",
      z.object({ typeId: hexSchema, newOwnerPredicate: hexSchema, counter: uint64Schema }),
    ),
    payload(
      "splitFT",
      z.object({
        typeId: hexSchema,
        newOwnerPredicate: hexSchema,
        targetValue: uint64Schema,
        remainingValue: uint64Schema,
        counter: uint64Schema,
      }),
    ),
    payload(
      "burnFT",
      z.object({
        typeId: hexSchema,
        value: uint64Schema,
        targetTokenId: hexSchema,
        targetTokenCounter: uint64Schema,
        counter: uint64Schema,
      }),
    ),
    payload(
      "joinFT",
      z.object({
        burnTokenTransactions: z.array(txRecordProofSchema),
        counter: uint64Schema,
      }),
    ),
    payload("updateNFT", z.object({ data: hexSchema, counter: uint64Schema })),
    payload(
      "lockToken",
      z.object({ lockStatus: z.number().int().positive(), counter: uint64Schema }),
    ),
    payload("unlockToken", z.object({ counter: uint64Schema })),
    payload(
      "addFC",
      z.object({
        feeCreditOwnerPredicate: hexSchema,
        transferAmount: uint64Schema,
        transferFee: uint64Schema,
        transferTxHash: hexSchema,
      }),
    ),
    payload(
      "closeFC",
      z.object({ amount: uint64Schema, targetUnitId: hexSchema, counter: uint64Schema }),
    ),
    payload(
      "lockFC",
      z.object({ lockStatus: z.number().int().positive(), counter: uint64Schema }),
    ),
    payload("unlockFC", z.object({ counter: uint64Schema })),
  ]),
);

// ─── Orders, Records, Blocks ─────────────────────────────────────────────

export const transactionOrderSchema: z.ZodType<TransactionOrder, z.ZodTypeDef, unknown> =
  z.object({
    payload: payloadSchema,
    stateUnlock: hexSchema.nullable(),
    authProof: authProofSchema,
    feeProof: hexSchema.nullable(),
  });

export const transactionRecordSchema: z.ZodType<TransactionRecord, z.ZodTypeDef, unknown> =
  z.object({
    transactionOrder: transactionOrderSchema,
    serverMetadata: z.object({
      actualFee: uint64Schema,
      successIndicator: z.enum(["successful", "failed"]),
    }),
  });

export const blockSchema: z.ZodType<Block, z.ZodTypeDef, unknown> = z.object({
  header: z.object({
    partitionId: z.number().int().nonnegative(),
    round: uint64Schema,
    previousBlockHash: hexSchema.nullable(),
  }),
  transactions: z.array(transactionRecordSchema),
});

// ─── Units ───────────────────────────────────────────────────────────────

const tokenTypeBase = {
  id: hexSchema,
  parentTypeId: hexSchema.nullable(),
  symbol: z.string(),
  name: z.string(),
  icon: iconSchema,
  ...definePredicates,
  creator: hexSchema.nullable(),
  txHash: hexSchema,
};

export const tokenTypeSchema: z.ZodType<TokenTypeUnit, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    z.object({
      ...tokenTypeBase,
      kind: z.literal("fungible"),
      decimalPlaces: z.number().int().min(0).max(255),
    }),
    z.object({
      ...tokenTypeBase,
      kind: z.literal("nft"),
      dataUpdatePredicate: hexSchema,
    }),
  ]);

const tokenBase = {
  id: hexSchema,
  typeId: hexSchema,
  typeName: z.string(),
  symbol: z.string(),
  owner: hexSchema,
  counter: uint64Schema,
  txHash: hexSchema,
  lockStatus: z.number().int().nonnegative(),
};

export const tokenSchema: z.ZodType<TokenUnit, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    z.object({
      ...tokenBase,
      kind: z.literal("fungible"),
      amount: uint64Schema,
      decimals: z.number().int().min(0).max(255),
      burned: z.boolean(),
    }),
    z.object({
      ...tokenBase,
      kind: z.literal("nft"),
      nftName: z.string(),
      nftUri: z.string(),
      nftData: hexSchema,
      nftDataUpdatePredicate: hexSchema,
    }),
  ]);

export const feeCreditBillSchema: z.ZodType<FeeCreditBill, z.ZodTypeDef, unknown> = z.object({
  id: hexSchema,
  balance: uint64Schema,
  lockStatus: z.number().int().nonnegative(),
  counter: uint64Schema,
  ownerPredicate: hexSchema,
  txHash: hexSchema,
});
