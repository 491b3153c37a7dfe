/**
 * @tokenwallet/submitter — Sleep and retry with exponential backoff.
 *
 * The confirmation loop only needs a cancellable sleep. `withRetry`
 * wraps reads that may fail transiently, such as the backend's block
 * fetches; a broadcast is never retried.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

import { SubmissionError } from "./errors.js";

export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 1000 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 30000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 200 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 200,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

/**
 * Sleep for the specified duration.
 *
 * Rejects with SUBMISSION_ABORTED as soon as `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted === true) {
      reject(new SubmissionError("SUBMISSION_ABORTED", "wait aborted"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new SubmissionError("SUBMISSION_ABORTED", "wait aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

export interface RetryOptions {
  readonly config?: RetryConfig | undefined;
  /** Whether an error is worth another attempt (default: all errors) */
  readonly shouldRetry?: ((err: unknown) => boolean) | undefined;
  readonly sleepFn?: SleepFn | undefined;
  /** Aborts the wait between attempts with SUBMISSION_ABORTED */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Execute a function with retry on failure.
 *
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 * @throws {SubmissionError} SUBMISSION_ABORTED when `signal` fires during a wait
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = options.config ?? DEFAULT_RETRY_CONFIG;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleepFn = options.sleepFn ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!shouldRetry(err)) {
        throw err;
      }
      lastError = err;

      if (attempt < config.maxAttempts - 1) {
        await sleepFn(computeDelay(attempt, config), options.signal);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}
