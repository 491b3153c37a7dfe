/**
 * Request logging middleware.
 *
 * One line per request on the request's logger. Health checks are polled
 * constantly by orchestrators and go to debug; server errors go to error.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const HEALTH_CHECK_PATHS: ReadonlySet<string> = new Set(["/health", "/ready"]);

export function requestLogger(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    await next();

    const { method, path } = c.req;
    const status = c.res.status;
    const level = status >= 500 ? "error" : HEALTH_CHECK_PATHS.has(path) ? "debug" : "info";

    c.get("log")[level]({ method, path, status, durationMs: Date.now() - start }, `${method} ${path} ${status}`);
  };
}
