/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { Storage } from "@tokenwallet/block-processor";
import type { TransactionForwarder } from "@tokenwallet/types";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestContext } from "./middleware/request-context.js";
import { requestLogger } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTokenRoutes } from "./routes/tokens.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import type { BlockSyncer } from "./services/block-syncer.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly storage: Storage;
  /** Receives POST /api/v1/transactions */
  readonly forwarder: TransactionForwarder;
  readonly networkId: number;
  readonly partitionId: number;
  /** Drives /ready; without it the app is always ready */
  readonly syncer?: BlockSyncer | undefined;
  /** Parent of the per-request loggers (default: silent) */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestContext(options.logger ?? pino({ level: "silent" })));
  app.use("*", requestLogger());

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler());
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `no route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(options.storage, options.syncer));
  app.route("/api/v1", createTokenRoutes(options.storage));
  app.route(
    "/api/v1/transactions",
    createTransactionRoutes({
      forwarder: options.forwarder,
      networkId: options.networkId,
      partitionId: options.partitionId,
    }),
  );

  return app;
}
