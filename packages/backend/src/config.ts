/**
 * @tokenwallet/backend — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(9654),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Partition node
  PARTITION_RPC_URL: z.string().url().default("http://localhost:26866/rpc"),
  PARTITION_ID: z.coerce.number().int().min(0).max(0xffffffff).default(2),
  NETWORK_ID: z.coerce.number().int().min(0).max(0xffff).default(3),
  RPC_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),

  // Block sync
  SYNC_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
  START_ROUND: z.coerce.bigint().min(1n).default(1n),

  // Storage; in-memory when unset
  DATA_FILE: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
