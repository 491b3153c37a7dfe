/**
 * Capability interfaces consumed by the wallet core.
 *
 * Concrete partition clients, fee-credit managers and key stores are
 * adapters implementing these; the core never depends on them directly.
 */

import type { Hex } from "./hex.js";
import type {
  FeeCreditBill,
  TokenKindFilter,
  TokenTypeUnit,
  TokenUnit,
} from "./tokens.js";
import type { Block, TransactionOrder, TxRecordProof } from "./transaction.js";

export interface RpcClient {
  getRoundNumber(): Promise<bigint>;

  /** Broadcast an order. Resolves with the transaction hash. */
  sendTransaction(tx: TransactionOrder): Promise<Hex>;

  /** Null while the transaction is not yet in a block. */
  getTransactionProof(txHash: Hex): Promise<TxRecordProof | null>;

  getToken(id: Hex): Promise<TokenUnit | null>;

  /** Tokens whose owner predicate equals `ownerPredicate`. */
  getTokens(kind: TokenKindFilter, ownerPredicate: Hex): Promise<readonly TokenUnit[]>;

  /** Token types, optionally restricted to those created by `creator` (public key). */
  getTokenTypes(kind: TokenKindFilter, creator?: Hex): Promise<readonly TokenTypeUnit[]>;

  /** Ancestor chain starting with the type itself and ending at its root; empty for an unknown type. */
  getTypeHierarchy(id: Hex): Promise<readonly TokenTypeUnit[]>;

  getFeeCreditRecord(id: Hex): Promise<FeeCreditBill | null>;
}

/**
 * Gate on the partition-local fee balance.
 *
 * Resolves with the fee credit record ID to charge, or rejects when the
 * account has no record or too little balance for `txCount` transactions.
 */
export interface FeeManager {
  ensureFeeCredit(accountNumber: number, txCount: number): Promise<Hex>;
}

export interface AccountKey {
  /** 1-based account number. */
  readonly accountNumber: number;
  /** Compressed secp256k1 public key (33 bytes). */
  readonly publicKey: Uint8Array;
  /** SHA-256 of the public key. */
  readonly pubKeyHash: Uint8Array;
  /** Sign a message; returns the 65-byte compact signature with recovery id. */
  sign(message: Uint8Array): Uint8Array;
}

export interface AccountKeyProvider {
  /** Rejects when the account does not exist. */
  getAccountKey(accountNumber: number): Promise<AccountKey>;
  getAccountKeys(): Promise<readonly AccountKey[]>;
}

/** Finalized blocks of one partition, read by the indexer. */
export interface BlockSource {
  /** Latest finalized round. */
  getRoundNumber(): Promise<bigint>;
  /** Null for a round that produced no block. */
  getBlock(round: bigint): Promise<Block | null>;
}

/** Relays client orders to the partition. Resolves with the transaction hash. */
export interface TransactionForwarder {
  sendTransaction(tx: TransactionOrder): Promise<Hex>;
}
