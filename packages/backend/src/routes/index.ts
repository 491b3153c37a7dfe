/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTokenRoutes } from "./tokens.js";
export { createTransactionRoutes } from "./transactions.js";
export type { TransactionRouteDeps } from "./transactions.js";
