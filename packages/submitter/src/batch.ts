/**
 * @tokenwallet/submitter — Transaction batch submission.
 *
 * Flow:
 * 1. Broadcast every transaction once, in insertion order
 * 2. Without confirmation: return right after the broadcasts
 * 3. With confirmation: poll the round number and the proofs of the
 *    unconfirmed transactions until all are confirmed, or the round
 *    reaches the largest timeout in the batch, or the caller aborts
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Hex, RpcClient, TransactionOrder } from "@tokenwallet/types";
import { SubmissionError } from "./errors.js";
import { sleep } from "./retry.js";
import type { SleepFn } from "./retry.js";
import { TxSubmission } from "./submission.js";

export const DEFAULT_POLL_INTERVAL_MS = 500;

export interface SubmitterOptions {
  readonly logger?: Logger | undefined;
  /** Delay between confirmation polls. Default: 500 */
  readonly pollIntervalMs?: number | undefined;
  /** Sleep function (injectable for testing). */
  readonly sleepFn?: SleepFn | undefined;
}

export interface SendOptions {
  /** Wait for proofs of every transaction. */
  readonly confirm: boolean;
  /** Cancels the confirmation wait. The transactions stay pending on-chain. */
  readonly signal?: AbortSignal | undefined;
}

export class TxSubmissionBatch {
  private readonly rpc: RpcClient;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly sleepFn: SleepFn;
  private readonly items: TxSubmission[] = [];

  constructor(rpc: RpcClient, options: SubmitterOptions = {}) {
    this.rpc = rpc;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  add(tx: TransactionOrder | TxSubmission): TxSubmission {
    const submission = tx instanceof TxSubmission ? tx : new TxSubmission(tx);
    this.items.push(submission);
    return submission;
  }

  submissions(): readonly TxSubmission[] {
    return this.items;
  }

  /** Largest timeout round across the batch. */
  maxTimeout(): bigint {
    let max = 0n;
    for (const sub of this.items) {
      if (sub.timeout > max) max = sub.timeout;
    }
    return max;
  }

  /**
   * Broadcast every transaction, then optionally wait for confirmation.
   *
   * @throws {SubmissionError} TRANSACTION_TIMED_OUT when the round reaches
   *   the batch timeout with unconfirmed transactions, SUBMISSION_ABORTED
   *   when the signal fires.
   */
  async sendTx(options: SendOptions): Promise<readonly TxSubmission[]> {
    for (const sub of this.items) {
      await this.rpc.sendTransaction(sub.transaction);
      this.logger.debug({ txHash: sub.txHash, unitId: sub.unitId }, "transaction sent");
    }

    if (!options.confirm) {
      return this.items;
    }

    await this.waitForConfirmation(options.signal);
    return this.items;
  }

  private async waitForConfirmation(signal: AbortSignal | undefined): Promise<void> {
    const maxTimeout = this.maxTimeout();

    for (;;) {
      if (signal?.aborted === true) {
        throw new SubmissionError(
          "SUBMISSION_ABORTED",
          "confirmation wait aborted",
          this.pendingHashes(),
        );
      }

      const round = await this.rpc.getRoundNumber();

      for (const sub of this.items) {
        if (sub.confirmed() || round > sub.timeout) continue;

        const proof = await this.rpc.getTransactionProof(sub.txHash);
        if (proof !== null) {
          sub.confirm(proof);
          this.logger.info(
            {
              txHash: sub.txHash,
              unitId: sub.unitId,
              status: proof.txRecord.serverMetadata.successIndicator,
              fee: proof.txRecord.serverMetadata.actualFee.toString(),
            },
            "transaction confirmed",
          );
        }
      }

      const pending = this.pendingHashes();
      if (pending.length === 0) {
        return;
      }

      if (round >= maxTimeout) {
        throw new SubmissionError(
          "TRANSACTION_TIMED_OUT",
          `confirmation timeout: round ${round} reached timeout ${maxTimeout} with ${pending.length} unconfirmed transaction(s)`,
          pending,
        );
      }

      await this.sleepFn(this.pollIntervalMs, signal);
    }
  }

  private pendingHashes(): Hex[] {
    return this.items.filter((s) => !s.confirmed()).map((s) => s.txHash);
  }
}

/**
 * Send one transaction, optionally waiting for its proof.
 */
export async function submitTransaction(
  rpc: RpcClient,
  tx: TransactionOrder,
  send: SendOptions,
  options: SubmitterOptions = {},
): Promise<TxSubmission> {
  const batch = new TxSubmissionBatch(rpc, options);
  const submission = batch.add(tx);
  await batch.sendTx(send);
  return submission;
}
