/**
 * @tokenwallet/block-processor — Local ledger view.
 *
 * - Storage interface with in-memory and JSON file implementations
 * - Merkle inclusion proofs for processed records
 * - BlockProcessor: applies finalized blocks atomically
 * - Type hierarchy lookup over any Storage
 */

// Errors
export { BlockProcessorError } from "./errors.js";
export type { BlockProcessorErrorCode } from "./errors.js";

// Storage
export type { Storage } from "./storage.js";
export { InMemoryStorage } from "./memory-storage.js";
export type { StorageSnapshot } from "./memory-storage.js";
export { JsonFileStorage, readSnapshotFile, snapshotSchema } from "./file-storage.js";

// Merkle proofs
export { MerkleTree, verifyTxProof } from "./merkle.js";
export type { MerklePath } from "./merkle.js";

// Type hierarchy
export { getTypeHierarchy } from "./hierarchy.js";

// Processor
export { BlockProcessor } from "./processor.js";
export type { BlockProcessorOptions } from "./processor.js";
