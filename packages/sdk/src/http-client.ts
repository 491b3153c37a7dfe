/**
 * @tokenwallet/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - API key and request ID headers
 * - Timeout handling
 * - Retry with exponential backoff for 5xx and network errors
 * - Error normalization into RpcError
 *
 * Bodies are returned as `unknown`; callers decode them with the zod
 * wire schemas.
 */

import { z } from "zod";
import type { HttpClientConfig, HttpResponse } from "./types.js";
import { RpcError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const errorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function unwrapData(body: unknown): unknown {
  if (typeof body === "object" && body !== null && "data" in body) {
    return body.data;
  }
  return body;
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of ["content-type", "x-request-id", "retry-after"]) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }
  return result;
}

function backoff(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt), 10000);
}

// =============================================================================
// HTTP Client
// =============================================================================

export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(config: HttpClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.sleepFn = config.sleepFn ?? sleep;
  }

  async get(path: string): Promise<HttpResponse> {
    return this.request("GET", path);
  }

  async post(path: string, body: unknown): Promise<HttpResponse> {
    return this.request("POST", path, body);
  }

  private async request(method: string, path: string, body?: unknown): Promise<HttpResponse> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
    };
    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);
        const responseBody = await parseResponseBody(response);

        if (response.ok) {
          return {
            data: unwrapData(responseBody),
            body: responseBody,
            status: response.status,
            headers: extractHeaders(response),
          };
        }

        const envelope = errorEnvelopeSchema.safeParse(responseBody);
        const error = envelope.success ? envelope.data.error : undefined;

        // 4xx → don't retry
        if (response.status < 500) {
          throw new RpcError(
            error?.code ?? "CLIENT_ERROR",
            error?.message ?? `HTTP ${response.status}`,
            response.status,
            error?.details,
          );
        }

        if (attempt < this.maxRetries) {
          lastError = new RpcError("SERVER_ERROR", `HTTP ${response.status}`, response.status);
          await this.sleepFn(backoff(attempt));
          continue;
        }

        throw new RpcError(
          error?.code ?? "SERVER_ERROR",
          error?.message ?? `HTTP ${response.status} after ${attempt + 1} attempts`,
          response.status,
          error?.details,
        );
      } catch (error) {
        if (error instanceof RpcError) {
          throw error;
        }

        // Network errors → retry
        if (attempt < this.maxRetries) {
          lastError = error instanceof Error ? error : new Error(String(error));
          await this.sleepFn(backoff(attempt));
          continue;
        }

        throw new RpcError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : (lastError?.message ?? "network error"),
          0,
        );
      }
    }

    throw new RpcError("NETWORK_ERROR", lastError?.message ?? "request failed after all retries", 0);
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new RpcError("TIMEOUT", `request timed out after ${this.timeout}ms`, 0);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
