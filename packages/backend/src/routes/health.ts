/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: 503 until the block syncer has caught
 *               up once, and while its last pass failed
 */

import { Hono } from "hono";
import type { Storage } from "@tokenwallet/block-processor";
import type { AppEnv } from "../types/api-contract.js";
import type { BlockSyncer } from "../services/block-syncer.js";

export function createHealthRoutes(storage: Storage, syncer?: BlockSyncer): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const blockNumber = storage.getBlockNumber().toString();
    const timestamp = new Date().toISOString();

    if (syncer === undefined) {
      return c.json({ status: "ready", blockNumber, timestamp });
    }

    const sync = syncer.status();
    const ready = sync.lastSyncedAt !== null && sync.lastError === null;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        blockNumber,
        sync: {
          running: sync.running,
          lastSyncedAt: sync.lastSyncedAt?.toISOString() ?? null,
          lastError: sync.lastError,
        },
        timestamp,
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
