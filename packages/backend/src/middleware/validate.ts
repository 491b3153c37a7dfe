/**
 * Zod validation for path parameters, query strings and JSON bodies.
 *
 * Failures surface as 400 VALIDATION_ERROR through the error handler,
 * with the zod issues under `details.issues`.
 */

import type { MiddlewareHandler } from "hono";
import type { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  readonly code = "VALIDATION_ERROR";
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

function formatZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parse `value` with `schema`.
 *
 * @param what - names the input in the error message, e.g. "query"
 * @throws {RequestValidationError}
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(`invalid ${what}`, formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Validate the JSON request body and expose it as `validatedBody`.
 */
export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): MiddlewareHandler<AppEnv & { Variables: { validatedBody: T } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new RequestValidationError("Invalid JSON in request body");
    }

    c.set("validatedBody", validateInput(schema, body, "request body"));
    await next();
  };
}
