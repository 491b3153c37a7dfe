/**
 * @tokenwallet/submitter — Errors.
 */

import type { Hex } from "@tokenwallet/types";

export type SubmissionErrorCode =
  | "TRANSACTION_TIMED_OUT"
  | "SUBMISSION_ABORTED"
  | "TRANSACTION_FAILED";

/**
 * Error thrown while broadcasting or confirming transactions.
 *
 * A timed-out or aborted wait does not roll anything back: the
 * transactions may still be executed until their timeout round.
 */
export class SubmissionError extends Error {
  public readonly code: SubmissionErrorCode;
  /** Hashes of the transactions that were not confirmed. */
  public readonly pending: readonly Hex[];

  constructor(code: SubmissionErrorCode, message: string, pending: readonly Hex[] = []) {
    super(message);
    this.name = "SubmissionError";
    this.code = code;
    this.pending = pending;
  }
}
