/**
 * Request context middleware.
 *
 * Takes the caller's X-Request-Id (or a new UUID), echoes it on the
 * response and binds it to a child logger for the rest of the chain.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

export function requestContext(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    c.set("requestId", requestId);
    c.set("log", logger.child({ requestId }));
    await next();
    c.header(REQUEST_ID_HEADER, requestId);
  };
}
