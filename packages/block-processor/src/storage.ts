/**
 * @tokenwallet/block-processor — Storage interface.
 *
 * The local ledger view written by the block processor and read by the
 * wallet (through an RpcClient adapter) and the HTTP API.
 *
 * Single writer, many readers. Writes issued inside
 * {@link Storage.runInTransaction} are undone when the callback throws.
 */

import type {
  FeeCreditBill,
  Hex,
  TokenKindFilter,
  TokenTypeUnit,
  TokenUnit,
  TxRecordProof,
} from "@tokenwallet/types";

export interface Storage {
  /** Round of the last applied block, 0 before the first block. */
  getBlockNumber(): bigint;
  setBlockNumber(round: bigint): void;

  getTokenType(id: Hex): TokenTypeUnit | undefined;
  saveTokenType(type: TokenTypeUnit): void;
  /** Sorted by ID. */
  getTokenTypes(kind: TokenKindFilter, creator?: Hex): TokenTypeUnit[];

  getToken(id: Hex): TokenUnit | undefined;
  saveToken(token: TokenUnit): void;
  removeToken(id: Hex): void;
  /** Tokens owned by exactly `ownerPredicate`, sorted by ID. */
  getTokens(kind: TokenKindFilter, ownerPredicate: Hex): TokenUnit[];

  getFeeCreditBill(id: Hex): FeeCreditBill | undefined;
  saveFeeCreditBill(bill: FeeCreditBill): void;

  getTxProof(txHash: Hex): TxRecordProof | undefined;
  saveTxProof(txHash: Hex, proof: TxRecordProof): void;

  /**
   * Run `fn` atomically: if it throws, every write made during the call
   * is undone and the error is rethrown.
   */
  runInTransaction<T>(fn: () => T): T;
}
