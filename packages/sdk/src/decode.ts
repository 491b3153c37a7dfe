/**
 * @tokenwallet/sdk — Response decoding.
 */

import type { z } from "zod";
import { RpcError } from "./types.js";

/**
 * Validate a response value against a wire schema.
 *
 * @throws {RpcError} INVALID_RESPONSE listing the first issue
 */
export function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string,
  statusCode = 200,
): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const where = issue === undefined || issue.path.length === 0 ? "" : ` at ${issue.path.join(".")}`;
  throw new RpcError(
    "INVALID_RESPONSE",
    `invalid ${what} in response${where}: ${issue?.message ?? "unknown error"}`,
    statusCode,
    result.error.issues,
  );
}
