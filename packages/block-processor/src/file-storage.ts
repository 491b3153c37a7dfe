/**
 * @tokenwallet/block-processor — JSON file Storage.
 *
 * In-memory storage that writes a full snapshot to disk after every
 * committed transaction (i.e. after every applied block). The file is
 * written to a temporary path and renamed into place, so a crash leaves
 * either the previous or the new snapshot.
 *
 * Numbers that may exceed 2^53 are stored as decimal strings.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import {
  feeCreditBillSchema,
  hexSchema,
  toJsonValue,
  tokenSchema,
  tokenTypeSchema,
  txRecordProofSchema,
  uint64Schema,
} from "@tokenwallet/types";
import { InMemoryStorage } from "./memory-storage.js";
import type { StorageSnapshot } from "./memory-storage.js";

export const snapshotSchema: z.ZodType<StorageSnapshot, z.ZodTypeDef, unknown> = z.object({
  blockNumber: uint64Schema,
  tokenTypes: z.array(tokenTypeSchema),
  tokens: z.array(tokenSchema),
  feeCreditBills: z.array(feeCreditBillSchema),
  proofs: z.array(z.object({ txHash: hexSchema, proof: txRecordProofSchema })),
});

/**
 * Read a snapshot file.
 *
 * @returns undefined when the file does not exist
 * @throws {z.ZodError} when the file exists but does not hold a valid snapshot
 */
export function readSnapshotFile(filePath: string): StorageSnapshot | undefined {
  if (!existsSync(filePath)) {
    return undefined;
  }
  const content = readFileSync(filePath, "utf-8");
  return snapshotSchema.parse(JSON.parse(content));
}

export class JsonFileStorage extends InMemoryStorage {
  private readonly _filePath: string;

  constructor(filePath: string) {
    super(readSnapshotFile(filePath));
    this._filePath = filePath;
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Write the current state to disk. */
  flush(): void {
    mkdirSync(dirname(this._filePath), { recursive: true });
    const tmpPath = `${this._filePath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(toJsonValue(this.snapshot())), "utf-8");
    renameSync(tmpPath, this._filePath);
  }

  protected override afterCommit(): void {
    this.flush();
  }
}
