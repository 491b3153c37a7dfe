import { describe, it, expect } from "vitest";
import pino from "pino";
import { createTestApp, jsonRequest } from "../setup.js";

function capture(level: pino.Level) {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ level }, { write: (line: string) => void lines.push(JSON.parse(line)) });
  return { logger, lines };
}

describe("request logger", () => {
  it("logs API requests at info with the request ID bound", async () => {
    const { logger, lines } = capture("info");
    const { app } = createTestApp({ logger });

    await app.request(jsonRequest("/api/v1/tokens/zz", "GET", undefined, { "X-Request-Id": "req-1" }));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      requestId: "req-1",
      method: "GET",
      path: "/api/v1/tokens/zz",
      status: 400,
      msg: "GET /api/v1/tokens/zz 400",
    });
    expect(lines[0]?.["durationMs"]).toEqual(expect.any(Number));
  });

  it("keeps health checks at debug", async () => {
    const info = capture("info");
    await createTestApp({ logger: info.logger }).app.request("/health");
    expect(info.lines).toEqual([]);

    const debug = capture("debug");
    await createTestApp({ logger: debug.logger }).app.request("/ready");
    expect(debug.lines).toHaveLength(1);
    expect(debug.lines[0]).toMatchObject({ level: 20, path: "/ready", status: 200 });
  });

  it("generates a request ID when the client sends none", async () => {
    const { logger, lines } = capture("info");
    const { app } = createTestApp({ logger });

    const res = await app.request("/api/v1/round-number");

    const requestId = res.headers.get("X-Request-Id");
    expect(requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(lines[0]).toMatchObject({ requestId, status: 200 });
  });
});
