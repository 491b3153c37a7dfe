/**
 * Test helpers for @tokenwallet/backend.
 *
 * Builds the app over in-memory storage with a recording forwarder, and
 * a scripted block source for the syncer.
 */

import { InMemoryStorage } from "@tokenwallet/block-processor";
import type { Storage } from "@tokenwallet/block-processor";
import type {
  Block,
  BlockSource,
  FeeCreditBill,
  FungibleTokenType,
  FungibleTokenUnit,
  Hex,
  TransactionForwarder,
  TransactionOrder,
  TransactionRecord,
} from "@tokenwallet/types";
import { transactionHash } from "@tokenwallet/types";
import { createApp } from "../src/app.js";
import type { CreateAppOptions } from "../src/app.js";

export const NETWORK_ID = 3;
export const PARTITION_ID = 2;

export const OWNER: Hex = "76a8" + "11".repeat(32) + "87";
export const OTHER_OWNER: Hex = "76a8" + "22".repeat(32) + "87";
export const TYPE_ID: Hex = "01".repeat(32) + "20";
export const SUBTYPE_ID: Hex = "02".repeat(32) + "20";
export const FCR_ID: Hex = "0f".repeat(32) + "2f";

export function tokenId(n: number): Hex {
  return n.toString(16).padStart(2, "0").repeat(32) + "21";
}

export function fungibleType(id: Hex, parentTypeId: Hex | null = null): FungibleTokenType {
  return {
    kind: "fungible",
    id,
    parentTypeId,
    symbol: "GLD",
    name: "Gold",
    icon: null,
    subTypeCreationPredicate: "01",
    tokenMintingPredicate: "01",
    tokenTypeOwnerPredicate: "01",
    creator: "02" + "ab".repeat(32),
    txHash: "ee".repeat(32),
    decimalPlaces: 2,
  };
}

export function fungibleToken(id: Hex, amount: bigint, owner: Hex = OWNER): FungibleTokenUnit {
  return {
    kind: "fungible",
    id,
    typeId: TYPE_ID,
    typeName: "Gold",
    symbol: "GLD",
    owner,
    counter: 2n,
    txHash: "dd".repeat(32),
    lockStatus: 0,
    amount,
    decimals: 2,
    burned: false,
  };
}

export const FEE_BILL: FeeCreditBill = {
  id: FCR_ID,
  balance: 990n,
  lockStatus: 0,
  counter: 3n,
  ownerPredicate: OWNER,
  txHash: "cc".repeat(32),
};

export function lockOrder(networkId = NETWORK_ID): TransactionOrder {
  return {
    payload: {
      networkId,
      partitionId: PARTITION_ID,
      unitId: tokenId(1),
      type: "lockToken",
      attributes: { lockStatus: 1, counter: 2n },
      clientMetadata: { timeout: 20n, maxTransactionFee: 10n, feeCreditRecordId: FCR_ID },
    },
    stateUnlock: null,
    authProof: { ownerProof: "01" },
    feeProof: "02",
  };
}

export function addFeeCredit(amount: bigint): TransactionRecord {
  return {
    transactionOrder: {
      payload: {
        networkId: NETWORK_ID,
        partitionId: PARTITION_ID,
        unitId: FCR_ID,
        type: "addFC",
        attributes: {
          feeCreditOwnerPredicate: OWNER,
          transferAmount: amount,
          transferFee: 1n,
          transferTxHash: "ab".repeat(32),
        },
        clientMetadata: { timeout: 100n, maxTransactionFee: 10n, feeCreditRecordId: null },
      },
      stateUnlock: null,
      authProof: {},
      feeProof: null,
    },
    serverMetadata: { actualFee: 1n, successIndicator: "successful" },
  };
}

export function block(round: bigint, transactions: readonly TransactionRecord[] = []): Block {
  return { header: { partitionId: PARTITION_ID, round, previousBlockHash: null }, transactions };
}

/** Forwarder that records orders and answers with their hash. */
export class RecordingForwarder implements TransactionForwarder {
  readonly sent: TransactionOrder[] = [];

  async sendTransaction(tx: TransactionOrder): Promise<Hex> {
    this.sent.push(tx);
    return transactionHash(tx);
  }
}

/** Block source over a fixed map of rounds; missing rounds have no block. */
export class ScriptedBlockSource implements BlockSource {
  roundNumber: bigint;
  readonly blocks = new Map<bigint, Block>();
  readonly requested: bigint[] = [];
  /** Errors thrown by the next getBlock calls, in order */
  readonly failures: Error[] = [];

  constructor(roundNumber: bigint, blocks: readonly Block[] = []) {
    this.roundNumber = roundNumber;
    for (const b of blocks) this.blocks.set(b.header.round, b);
  }

  async getRoundNumber(): Promise<bigint> {
    return this.roundNumber;
  }

  async getBlock(round: bigint): Promise<Block | null> {
    this.requested.push(round);
    const failure = this.failures.shift();
    if (failure !== undefined) throw failure;
    return this.blocks.get(round) ?? null;
  }
}

export function createTestApp(overrides: Partial<CreateAppOptions> = {}) {
  const storage: Storage = overrides.storage ?? new InMemoryStorage();
  const forwarder = new RecordingForwarder();
  const app = createApp({
    storage,
    forwarder,
    networkId: NETWORK_ID,
    partitionId: PARTITION_ID,
    ...overrides,
  });
  return { app, storage, forwarder };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}
