/**
 * BlockSyncer — pulls finalized blocks from the partition node into
 * local storage.
 *
 * Each pass reads the node's round number and applies every block from
 * the next unseen round up to it, in order. Rounds without a block are
 * stepped over. A block that fails to apply is rolled back by the
 * processor and retried on the next pass; the syncer never skips it.
 *
 * Transient RPC failures (network errors, timeouts, 5xx) are retried
 * with backoff inside a pass; stopping the syncer cuts the backoff short.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { BlockProcessor, Storage } from "@tokenwallet/block-processor";
import { RpcError } from "@tokenwallet/sdk";
import { sleep, withRetry } from "@tokenwallet/submitter";
import type { RetryConfig, SleepFn } from "@tokenwallet/submitter";
import type { BlockSource } from "@tokenwallet/types";

export const DEFAULT_SYNC_INTERVAL_MS = 1000;

export const DEFAULT_SYNC_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5000,
  jitterMs: 100,
};

export interface BlockSyncerOptions {
  /** First round to fetch when storage is empty (default: 1) */
  readonly startRound?: bigint | undefined;
  /** Pause between passes in ms */
  readonly intervalMs?: number | undefined;
  readonly retry?: RetryConfig | undefined;
  readonly logger?: Logger | undefined;
  readonly sleepFn?: SleepFn | undefined;
}

export interface SyncStatus {
  /** Last applied round */
  readonly blockNumber: bigint;
  readonly nextRound: bigint;
  readonly running: boolean;
  /** End of the last pass that reached the node's round */
  readonly lastSyncedAt: Date | null;
  /** Message of the error that ended the last pass, null after a good pass */
  readonly lastError: string | null;
}

/** Network errors, timeouts and 5xx answers. */
export function isTransientRpcError(err: unknown): boolean {
  return err instanceof RpcError && (err.statusCode === 0 || err.statusCode >= 500);
}

export class BlockSyncer {
  private readonly source: BlockSource;
  private readonly processor: BlockProcessor;
  private readonly storage: Storage;
  private readonly intervalMs: number;
  private readonly retry: RetryConfig;
  private readonly logger: Logger;
  private readonly sleepFn: SleepFn;

  private nextRound: bigint;
  private lastSyncedAt: Date | null = null;
  private lastError: string | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    source: BlockSource,
    processor: BlockProcessor,
    storage: Storage,
    options: BlockSyncerOptions = {},
  ) {
    this.source = source;
    this.processor = processor;
    this.storage = storage;
    this.intervalMs = options.intervalMs ?? DEFAULT_SYNC_INTERVAL_MS;
    this.retry = options.retry ?? DEFAULT_SYNC_RETRY;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.sleepFn = options.sleepFn ?? sleep;

    const resume = storage.getBlockNumber() + 1n;
    const start = options.startRound ?? 1n;
    this.nextRound = resume > start ? resume : start;
  }

  status(): SyncStatus {
    return {
      blockNumber: this.storage.getBlockNumber(),
      nextRound: this.nextRound,
      running: this.loop !== null,
      lastSyncedAt: this.lastSyncedAt,
      lastError: this.lastError,
    };
  }

  /**
   * Run one pass. Not to be called while the background loop is running.
   *
   * @returns the number of blocks applied
   * @throws the processor's or source's error; blocks applied before it stay applied
   */
  async syncOnce(): Promise<number> {
    try {
      const latest = await this.fetch(() => this.source.getRoundNumber());
      const from = this.nextRound;
      let applied = 0;

      while (this.nextRound <= latest) {
        const round = this.nextRound;
        const block = await this.fetch(() => this.source.getBlock(round));
        if (block !== null) {
          this.processor.processBlock(block);
          applied++;
        }
        this.nextRound = round + 1n;
      }

      if (applied > 0) {
        this.logger.info(
          { from: from.toString(), to: latest.toString(), applied },
          "blocks synced",
        );
      }
      this.lastSyncedAt = new Date();
      this.lastError = null;
      return applied;
    } catch (err) {
      this.lastError = err instanceof Error ? err.message : String(err);
      throw err;
    }
  }

  /** Start the background loop; a no-op when already running. */
  start(): void {
    if (this.loop !== null) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.logger.info({ nextRound: this.nextRound.toString() }, "block sync started");
  }

  /** Stop the loop and wait for the current pass to finish. */
  async stop(): Promise<void> {
    if (this.controller === null || this.loop === null) {
      return;
    }
    this.controller.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
    this.logger.info({ blockNumber: this.storage.getBlockNumber().toString() }, "block sync stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.syncOnce();
      } catch (err) {
        if (signal.aborted) {
          return;
        }
        this.logger.error({ err, round: this.nextRound.toString() }, "block sync failed");
      }
      if (signal.aborted) {
        return;
      }
      try {
        await this.sleepFn(this.intervalMs, signal);
      } catch (err) {
        if (!signal.aborted) {
          this.logger.error({ err }, "block sync wait failed");
        }
        return;
      }
    }
  }

  private fetch<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      config: this.retry,
      shouldRetry: isTransientRpcError,
      sleepFn: this.sleepFn,
      signal: this.controller?.signal,
    });
  }
}
