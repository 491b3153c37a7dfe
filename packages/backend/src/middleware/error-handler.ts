/**
 * Global error handler.
 *
 * Produces the error envelope for everything a route throws. Errors
 * carrying a code from the backend's catalogue (block processor lookups,
 * partition RPC failures, request validation) keep their code and
 * message; anything else is logged on the request's logger and reported
 * as INTERNAL_ERROR.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../types/api-contract.js";
import { ERROR_STATUS, createErrorEnvelope, isApiErrorCode } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";
import { RequestValidationError } from "./validate.js";

function knownCode(err: Error): ApiErrorCode | undefined {
  if (!("code" in err) || typeof err.code !== "string") return undefined;
  return isApiErrorCode(err.code) && err.code !== "INTERNAL_ERROR" ? err.code : undefined;
}

/**
 * Create the handler registered as Hono's onError.
 */
export function createErrorHandler(): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof RequestValidationError) {
      const details = err.issues.length > 0 ? { issues: err.issues } : undefined;
      return c.json(createErrorEnvelope(err.code, err.message, details), ERROR_STATUS[err.code]);
    }

    const code = knownCode(err);
    if (code === undefined) {
      c.get("log").error({ err }, "unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), ERROR_STATUS.INTERNAL_ERROR);
    }

    return c.json(createErrorEnvelope(code, err.message), ERROR_STATUS[code]);
  };
}
