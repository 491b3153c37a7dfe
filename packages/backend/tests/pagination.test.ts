/**
 * Tests for key-based pagination.
 */

import { describe, it, expect } from "vitest";
import { paginate, PaginationQuerySchema } from "../src/types/pagination.js";

interface Item {
  id: string;
}

const items: Item[] = [{ id: "0a" }, { id: "0b" }, { id: "0c" }, { id: "0d" }, { id: "0e" }];
const getId = (item: Item) => item.id;

describe("paginate", () => {
  it("returns the first page and the next key", () => {
    expect(paginate(items, { limit: 2 }, getId)).toEqual({
      data: [{ id: "0a" }, { id: "0b" }],
      pagination: { hasMore: true, cursor: "0c", limit: 2 },
    });
  });

  it("starts at the offset key, inclusive", () => {
    expect(paginate(items, { limit: 2, offsetKey: "0c" }, getId)).toEqual({
      data: [{ id: "0c" }, { id: "0d" }],
      pagination: { hasMore: true, cursor: "0e", limit: 2 },
    });
  });

  it("has no cursor on the last page", () => {
    expect(paginate(items, { limit: 2, offsetKey: "0e" }, getId)).toEqual({
      data: [{ id: "0e" }],
      pagination: { hasMore: false, limit: 2 },
    });
  });

  it("returns everything when the list fits exactly", () => {
    expect(paginate(items, { limit: 5 }, getId).pagination).toEqual({ hasMore: false, limit: 5 });
  });

  it("resumes after a removed key", () => {
    expect(paginate(items, { limit: 10, offsetKey: "0bb" }, getId).data).toEqual([
      { id: "0c" },
      { id: "0d" },
      { id: "0e" },
    ]);
  });
});

describe("PaginationQuerySchema", () => {
  it("defaults and coerces the limit", () => {
    expect(PaginationQuerySchema.parse({})).toEqual({ limit: 100 });
    expect(PaginationQuerySchema.parse({ limit: "25", offsetKey: "0c" })).toEqual({ limit: 25, offsetKey: "0c" });
  });

  it("rejects limits outside 1..100 and non-hex keys", () => {
    expect(PaginationQuerySchema.safeParse({ limit: "0" }).success).toBe(false);
    expect(PaginationQuerySchema.safeParse({ limit: "101" }).success).toBe(false);
    expect(PaginationQuerySchema.safeParse({ offsetKey: "xyz" }).success).toBe(false);
  });
});
