/**
 * @tokenwallet/backend — Entry point.
 *
 * Loads config, opens storage, starts the block syncer and the HTTP
 * server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { BlockProcessor, InMemoryStorage, JsonFileStorage } from "@tokenwallet/block-processor";
import type { Storage } from "@tokenwallet/block-processor";
import { PartitionRpcClient } from "@tokenwallet/sdk";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { BlockSyncer } from "./services/block-syncer.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const storage: Storage =
    config.DATA_FILE === undefined ? new InMemoryStorage() : new JsonFileStorage(config.DATA_FILE);
  if (config.DATA_FILE === undefined) {
    logger.warn("DATA_FILE not set, synced state is kept in memory only");
  }

  const partition = new PartitionRpcClient({
    baseUrl: config.PARTITION_RPC_URL,
    timeout: config.RPC_TIMEOUT_MS,
  });

  const syncer = new BlockSyncer(
    partition,
    new BlockProcessor(storage, { logger: logger.child({ component: "block-processor" }) }),
    storage,
    {
      startRound: config.START_ROUND,
      intervalMs: config.SYNC_INTERVAL_MS,
      logger: logger.child({ component: "block-syncer" }),
    },
  );

  const app = createApp({
    storage,
    forwarder: partition,
    networkId: config.NETWORK_ID,
    partitionId: config.PARTITION_ID,
    syncer,
    logger: logger.child({ component: "http" }),
  });

  syncer.start();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      partition: config.PARTITION_RPC_URL,
      blockNumber: storage.getBlockNumber().toString(),
    },
    "Token backend started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await syncer.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
