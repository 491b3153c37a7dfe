/**
 * @tokenwallet/backend — Token indexer backend.
 *
 * Syncs finalized partition blocks into local storage and serves the
 * wallet's read API over HTTP.
 *
 * @packageDocumentation
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions } from "./app.js";
export {
  BlockSyncer,
  isTransientRpcError,
  DEFAULT_SYNC_INTERVAL_MS,
  DEFAULT_SYNC_RETRY,
} from "./services/block-syncer.js";
export type { BlockSyncerOptions, SyncStatus } from "./services/block-syncer.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
