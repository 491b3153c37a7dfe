/**
 * Shared test fixtures: a scripted fetch and wire-format token values.
 */

import { vi } from "vitest";

export interface MockReply {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
  error?: Error;
}

export interface RecordedRequest {
  url: string;
  method: string;
  /** Lowercased header names */
  headers: Record<string, string>;
  body: unknown;
}

export function mockFetch(replies: MockReply[]) {
  const requests: RecordedRequest[] = [];
  let callIndex = 0;

  const fetchFn = vi.fn<typeof fetch>(async (input, init) => {
    const reply = replies[callIndex];
    callIndex++;
    if (reply === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${callIndex})`);
    }

    const headers: Record<string, string> = {};
    for (const [name, value] of new Headers(init?.headers)) {
      headers[name] = value;
    }
    requests.push({
      url: typeof input === "string" ? input : input instanceof URL ? input.href : input.url,
      method: init?.method ?? "GET",
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });

    if (reply.error !== undefined) {
      throw reply.error;
    }
    const body = reply.body !== undefined ? JSON.stringify(reply.body) : "";
    return new Response(body, {
      status: reply.status,
      headers: reply.headers ?? { "content-type": "application/json" },
    });
  });

  return { fetchFn, requests };
}

export const TOKEN_ID = "aa".repeat(32) + "21";
export const TYPE_ID = "bb".repeat(32) + "20";
export const OWNER = "cc".repeat(20);

export function wireToken(id: string, amount: string) {
  return {
    kind: "fungible",
    id,
    typeId: TYPE_ID,
    typeName: "Gold",
    symbol: "GLD",
    owner: OWNER,
    counter: "4",
    txHash: "dd".repeat(32),
    lockStatus: 0,
    amount,
    decimals: 2,
    burned: false,
  };
}

export function wireType(id: string, parentTypeId: string | null) {
  return {
    kind: "fungible",
    id,
    parentTypeId,
    symbol: "GLD",
    name: "Gold",
    icon: null,
    subTypeCreationPredicate: "01",
    tokenMintingPredicate: "01",
    tokenTypeOwnerPredicate: "01",
    creator: null,
    txHash: "ee".repeat(32),
    decimalPlaces: 2,
  };
}
