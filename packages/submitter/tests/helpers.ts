/**
 * Test helpers for @tokenwallet/submitter.
 */

import { vi } from "vitest";
import type {
  RpcClient,
  TransactionOrder,
  TxRecordProof,
  TxStatus,
} from "@tokenwallet/types";

export function lockOrder(timeout: bigint, unitByte = "01"): TransactionOrder {
  return {
    payload: {
      networkId: 1,
      partitionId: 2,
      unitId: unitByte.repeat(32) + "21",
      type: "lockToken",
      attributes: { lockStatus: 1, counter: 0n },
      clientMetadata: { timeout, maxTransactionFee: 1n, feeCreditRecordId: null },
    },
    stateUnlock: null,
    authProof: {},
    feeProof: null,
  };
}

export function proofFor(tx: TransactionOrder, status: TxStatus = "successful"): TxRecordProof {
  return {
    txRecord: {
      transactionOrder: tx,
      serverMetadata: { actualFee: 1n, successIndicator: status },
    },
    txProof: {
      partitionId: 2,
      round: 5n,
      previousBlockHash: null,
      txRoot: "00".repeat(32),
      blockHeaderHash: "00".repeat(32),
      leafIndex: 0,
      siblings: [],
    },
  };
}

export function createMockRpc() {
  return {
    getRoundNumber: vi.fn<() => Promise<bigint>>().mockResolvedValue(1n),
    sendTransaction: vi.fn<RpcClient["sendTransaction"]>().mockResolvedValue("aa"),
    getTransactionProof: vi.fn<RpcClient["getTransactionProof"]>().mockResolvedValue(null),
    getToken: vi.fn<RpcClient["getToken"]>().mockResolvedValue(null),
    getTokens: vi.fn<RpcClient["getTokens"]>().mockResolvedValue([]),
    getTokenTypes: vi.fn<RpcClient["getTokenTypes"]>().mockResolvedValue([]),
    getTypeHierarchy: vi.fn<RpcClient["getTypeHierarchy"]>().mockResolvedValue([]),
    getFeeCreditRecord: vi.fn<RpcClient["getFeeCreditRecord"]>().mockResolvedValue(null),
  } satisfies RpcClient;
}

export const noopSleep = async (_ms: number, _signal?: AbortSignal): Promise<void> => {};
