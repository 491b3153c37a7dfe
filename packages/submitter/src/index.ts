/**
 * @tokenwallet/submitter — Broadcast and confirmation of transactions.
 */

export { SubmissionError } from "./errors.js";
export type { SubmissionErrorCode } from "./errors.js";

export { TxSubmission } from "./submission.js";

export {
  TxSubmissionBatch,
  submitTransaction,
  DEFAULT_POLL_INTERVAL_MS,
} from "./batch.js";
export type { SubmitterOptions, SendOptions } from "./batch.js";

export {
  withRetry,
  sleep,
  computeDelay,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig, RetryOptions, SleepFn } from "./retry.js";
