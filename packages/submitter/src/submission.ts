/**
 * Tracking of one broadcast transaction.
 */

import type { Hex, TransactionOrder, TxRecordProof } from "@tokenwallet/types";
import { transactionHash } from "@tokenwallet/types";

export class TxSubmission {
  readonly unitId: Hex;
  readonly txHash: Hex;
  readonly transaction: TransactionOrder;
  private _proof: TxRecordProof | null = null;

  constructor(transaction: TransactionOrder) {
    this.transaction = transaction;
    this.unitId = transaction.payload.unitId;
    this.txHash = transactionHash(transaction);
  }

  get proof(): TxRecordProof | null {
    return this._proof;
  }

  /** Last round in which the transaction may still be executed. */
  get timeout(): bigint {
    return this.transaction.payload.clientMetadata.timeout;
  }

  confirmed(): boolean {
    return this._proof !== null;
  }

  /** True once confirmed with a successful execution status. */
  succeeded(): boolean {
    return this._proof?.txRecord.serverMetadata.successIndicator === "successful";
  }

  /** Proof observed by the confirmation loop. */
  confirm(proof: TxRecordProof): void {
    this._proof = proof;
  }
}
