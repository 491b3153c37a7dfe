/**
 * Key-based pagination over ID-sorted lists.
 *
 * The cursor is the ID of the first item of the next page and is sent
 * back as `offsetKey`. List endpoints return
 * `{ data, pagination: { hasMore, cursor?, limit } }`.
 */

import { z } from "zod";
import { hexSchema } from "@tokenwallet/types";

export const MAX_PAGE_SIZE = 100;

export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
  offsetKey: hexSchema.optional(),
});

export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;

export interface PaginationMeta {
  readonly hasMore: boolean;
  /** Absent on the last page */
  readonly cursor?: string;
  readonly limit: number;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

/**
 * Cut one page out of a list sorted ascending by `getKey`.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => string,
): PaginatedResponse<T> {
  const offsetKey = query.offsetKey;
  const from = offsetKey === undefined ? items : items.filter((item) => getKey(item) >= offsetKey);

  // Fetch one extra to detect hasMore
  const page = from.slice(0, query.limit + 1);
  const next = page[query.limit];
  const data = page.slice(0, query.limit);

  if (next === undefined) {
    return { data, pagination: { hasMore: false, limit: query.limit } };
  }
  return { data, pagination: { hasMore: true, cursor: getKey(next), limit: query.limit } };
}
