/**
 * @tokenwallet/block-processor — In-memory Storage.
 *
 * Plain maps plus an undo journal. Each write made inside a transaction
 * records how to restore the previous value; a throwing transaction
 * replays the journal in reverse.
 *
 * Suitable for tests and as the base of the JSON file storage.
 */

import type {
  FeeCreditBill,
  Hex,
  TokenKindFilter,
  TokenTypeUnit,
  TokenUnit,
  TxRecordProof,
} from "@tokenwallet/types";
import { matchesKind } from "@tokenwallet/types";
import type { Storage } from "./storage.js";

/** Serializable copy of the whole storage. */
export interface StorageSnapshot {
  readonly blockNumber: bigint;
  readonly tokenTypes: readonly TokenTypeUnit[];
  readonly tokens: readonly TokenUnit[];
  readonly feeCreditBills: readonly FeeCreditBill[];
  readonly proofs: readonly { readonly txHash: Hex; readonly proof: TxRecordProof }[];
}

function byId<T extends { readonly id: Hex }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class InMemoryStorage implements Storage {
  private _blockNumber = 0n;
  private readonly _tokenTypes = new Map<Hex, TokenTypeUnit>();
  private readonly _tokens = new Map<Hex, TokenUnit>();
  private readonly _feeCreditBills = new Map<Hex, FeeCreditBill>();
  private readonly _proofs = new Map<Hex, TxRecordProof>();

  /** Undo steps of the open transaction; null outside a transaction. */
  private _journal: (() => void)[] | null = null;

  constructor(snapshot?: StorageSnapshot) {
    if (snapshot !== undefined) {
      this._blockNumber = snapshot.blockNumber;
      for (const t of snapshot.tokenTypes) this._tokenTypes.set(t.id, t);
      for (const t of snapshot.tokens) this._tokens.set(t.id, t);
      for (const b of snapshot.feeCreditBills) this._feeCreditBills.set(b.id, b);
      for (const p of snapshot.proofs) this._proofs.set(p.txHash, p.proof);
    }
  }

  // ─── Block Number ───────────────────────────────────────────────────

  getBlockNumber(): bigint {
    return this._blockNumber;
  }

  setBlockNumber(round: bigint): void {
    const previous = this._blockNumber;
    this._record(() => {
      this._blockNumber = previous;
    });
    this._blockNumber = round;
  }

  // ─── Token Types ────────────────────────────────────────────────────

  getTokenType(id: Hex): TokenTypeUnit | undefined {
    return this._tokenTypes.get(id);
  }

  saveTokenType(type: TokenTypeUnit): void {
    this._put(this._tokenTypes, type.id, type);
  }

  getTokenTypes(kind: TokenKindFilter, creator?: Hex): TokenTypeUnit[] {
    return [...this._tokenTypes.values()]
      .filter((t) => matchesKind(kind, t))
      .filter((t) => creator === undefined || t.creator === creator)
      .sort(byId);
  }

  // ─── Tokens ─────────────────────────────────────────────────────────

  getToken(id: Hex): TokenUnit | undefined {
    return this._tokens.get(id);
  }

  saveToken(token: TokenUnit): void {
    this._put(this._tokens, token.id, token);
  }

  removeToken(id: Hex): void {
    this._delete(this._tokens, id);
  }

  getTokens(kind: TokenKindFilter, ownerPredicate: Hex): TokenUnit[] {
    return [...this._tokens.values()]
      .filter((t) => matchesKind(kind, t) && t.owner === ownerPredicate)
      .sort(byId);
  }

  // ─── Fee Credit ─────────────────────────────────────────────────────

  getFeeCreditBill(id: Hex): FeeCreditBill | undefined {
    return this._feeCreditBills.get(id);
  }

  saveFeeCreditBill(bill: FeeCreditBill): void {
    this._put(this._feeCreditBills, bill.id, bill);
  }

  // ─── Proofs ─────────────────────────────────────────────────────────

  getTxProof(txHash: Hex): TxRecordProof | undefined {
    return this._proofs.get(txHash);
  }

  saveTxProof(txHash: Hex, proof: TxRecordProof): void {
    this._put(this._proofs, txHash, proof);
  }

  // ─── Transactions ───────────────────────────────────────────────────

  runInTransaction<T>(fn: () => T): T {
    // Nested calls join the outer transaction.
    if (this._journal !== null) {
      return fn();
    }

    const journal: (() => void)[] = [];
    this._journal = journal;
    try {
      const result = fn();
      this._journal = null;
      this.afterCommit();
      return result;
    } catch (err: unknown) {
      for (let i = journal.length - 1; i >= 0; i--) {
        journal[i]!();
      }
      this._journal = null;
      throw err;
    }
  }

  snapshot(): StorageSnapshot {
    return {
      blockNumber: this._blockNumber,
      tokenTypes: [...this._tokenTypes.values()].sort(byId),
      tokens: [...this._tokens.values()].sort(byId),
      feeCreditBills: [...this._feeCreditBills.values()].sort(byId),
      proofs: [...this._proofs.entries()].map(([txHash, proof]) => ({ txHash, proof })),
    };
  }

  /** Called after a transaction commits. */
  protected afterCommit(): void {}

  // ─── Internal ───────────────────────────────────────────────────────

  private _record(undo: () => void): void {
    this._journal?.push(undo);
  }

  private _put<V>(map: Map<Hex, V>, key: Hex, value: V): void {
    const had = map.has(key);
    const previous = map.get(key);
    this._record(() => {
      if (had && previous !== undefined) {
        map.set(key, previous);
      } else {
        map.delete(key);
      }
    });
    map.set(key, value);
  }

  private _delete<V>(map: Map<Hex, V>, key: Hex): void {
    const previous = map.get(key);
    if (previous === undefined) return;
    this._record(() => {
      map.set(key, previous);
    });
    map.delete(key);
  }
}
