import { describe, it, expect } from "vitest";
import { toJsonValue } from "../src/codec.js";
import {
  uint64Schema,
  tokenSchema,
  transactionRecordSchema,
  blockSchema,
} from "../src/wire.js";
import type { FungibleTokenUnit } from "../src/tokens.js";
import type { TransactionRecord } from "../src/transaction.js";

const UNIT = "ab".repeat(32) + "21";
const TYPE = "cd".repeat(32) + "20";

describe("uint64Schema", () => {
  it("accepts decimal strings, numbers and bigints", () => {
    expect(uint64Schema.parse("18446744073709551615")).toBe(18446744073709551615n);
    expect(uint64Schema.parse(7)).toBe(7n);
    expect(uint64Schema.parse(9n)).toBe(9n);
  });

  it("rejects negatives, decimals and overflow", () => {
    expect(uint64Schema.safeParse("-1").success).toBe(false);
    expect(uint64Schema.safeParse("1.5").success).toBe(false);
    expect(uint64Schema.safeParse("18446744073709551616").success).toBe(false);
  });

  it("accepts numbers only up to the largest safe integer", () => {
    expect(uint64Schema.parse(Number.MAX_SAFE_INTEGER)).toBe(9007199254740991n);
    expect(uint64Schema.safeParse(2 ** 53).success).toBe(false);
    expect(uint64Schema.parse("9007199254740993")).toBe(9007199254740993n);
  });
});

describe("tokenSchema", () => {
  it("decodes what toJsonValue encodes", () => {
    const token: FungibleTokenUnit = {
      kind: "fungible",
      id: UNIT,
      typeId: TYPE,
      typeName: "Gold",
      symbol: "AU",
      owner: "830041025820" + "00".repeat(32),
      counter: 3n,
      txHash: "ee".repeat(32),
      lockStatus: 0,
      amount: 500n,
      decimals: 2,
      burned: false,
    };
    const json = JSON.parse(JSON.stringify(toJsonValue(token)));
    expect(json.amount).toBe("500");
    expect(tokenSchema.parse(json)).toEqual(token);
  });

  it("rejects unknown kinds", () => {
    expect(tokenSchema.safeParse({ kind: "other" }).success).toBe(false);
  });
});

describe("transactionRecordSchema", () => {
  it("decodes nested join records", () => {
    const burn: TransactionRecord = {
      transactionOrder: {
        payload: {
          networkId: 1,
          partitionId: 2,
          unitId: UNIT,
          type: "burnFT",
          attributes: {
            typeId: TYPE,
            value: 10n,
            targetTokenId: UNIT,
            targetTokenCounter: 1n,
            counter: 0n,
          },
          clientMetadata: { timeout: 10n, maxTransactionFee: 1n, feeCreditRecordId: null },
        },
        stateUnlock: null,
        authProof: { ownerProof: "01" },
        feeProof: null,
      },
      serverMetadata: { actualFee: 1n, successIndicator: "successful" },
    };
    const join: TransactionRecord = {
      transactionOrder: {
        payload: {
          networkId: 1,
          partitionId: 2,
          unitId: UNIT,
          type: "joinFT",
          attributes: {
            burnTokenTransactions: [
              {
                txRecord: burn,
                txProof: {
                  partitionId: 2,
                  round: 4n,
                  previousBlockHash: null,
                  txRoot: "00",
                  blockHeaderHash: "11",
                  leafIndex: 0,
                  siblings: [{ hash: "22", direction: "right" }],
                },
              },
            ],
            counter: 1n,
          },
          clientMetadata: { timeout: 10n, maxTransactionFee: 1n, feeCreditRecordId: "aa" },
        },
        stateUnlock: null,
        authProof: {},
        feeProof: "ff",
      },
      serverMetadata: { actualFee: 2n, successIndicator: "failed" },
    };

    const decoded = transactionRecordSchema.parse(JSON.parse(JSON.stringify(toJsonValue(join))));
    expect(decoded).toEqual(join);
  });

  it("rejects unknown transaction types", () => {
    const result = blockSchema.safeParse({
      header: { partitionId: 2, round: "1", previousBlockHash: null },
      transactions: [
        {
          transactionOrder: {
            payload: {
              networkId: 1,
              partitionId: 2,
              unitId: UNIT,
              type: "mintCoin",
              attributes: {},
              clientMetadata: { timeout: "1", maxTransactionFee: "1", feeCreditRecordId: null },
            },
            stateUnlock: null,
            authProof: {},
            feeProof: null,
          },
          serverMetadata: { actualFee: "1", successIndicator: "successful" },
        },
      ],
    });
    expect(result.success).toBe(false);
  });
});
