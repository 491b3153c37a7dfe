/**
 * @tokenwallet/sdk — SDK types.
 *
 * Types specific to the client layer.
 * Domain types are imported from @tokenwallet/types.
 */

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration shared by the HTTP-based clients.
 */
export interface HttpClientConfig {
  /** Base URL, e.g. "http://localhost:9654" */
  readonly baseUrl: string;
  /** Sent as X-Api-Key when set */
  readonly apiKey?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
  /** Sleep between retries (injectable for testing) */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface HttpResponse {
  /** `data` of the `{ data }` envelope, or the whole body when there is none */
  readonly data: unknown;
  /** Parsed body */
  readonly body: unknown;
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Cursor pagination metadata as served by the backend.
 */
export interface Pagination {
  readonly hasMore: boolean;
  /** Pass back as `offsetKey` to read the next page */
  readonly cursor?: string | undefined;
  readonly limit: number;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Failed request: HTTP error status, JSON-RPC error, timeout, network
 * failure, or a response that does not decode.
 */
export class RpcError extends Error {
  /** Server error code (e.g. "NOT_FOUND") or a client-side one ("TIMEOUT", "NETWORK_ERROR", "INVALID_RESPONSE") */
  readonly code: string;
  /** HTTP status code, 0 when no response was received */
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "RpcError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
