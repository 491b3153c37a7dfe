/**
 * Error codes the backend answers with, and the envelope they travel in:
 * { error: { code, message, details? } }
 *
 * Codes raised by the block processor and the partition RPC client keep
 * their name on the wire; the HTTP status is looked up here.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";

export const ERROR_STATUS = {
  // Request
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,

  // Synced state
  TOKEN_NOT_FOUND: 404,
  TYPE_NOT_FOUND: 404,
  FEE_CREDIT_BILL_NOT_FOUND: 404,
  PROOF_NOT_FOUND: 404,

  // Partition node
  RPC_ERROR: 400,
  CLIENT_ERROR: 400,
  NETWORK_ERROR: 502,
  SERVER_ERROR: 502,
  INVALID_RESPONSE: 502,
  TIMEOUT: 504,

  INTERNAL_ERROR: 500,
} as const satisfies Record<string, ContentfulStatusCode>;

export type ApiErrorCode = keyof typeof ERROR_STATUS;

export function isApiErrorCode(code: string): code is ApiErrorCode {
  return Object.hasOwn(ERROR_STATUS, code);
}

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}
