/**
 * @tokenwallet/sdk — Tokens backend client.
 *
 * RpcClient over the indexer's REST API. Lists are read page by page
 * until the backend reports no more items; unknown units come back as
 * null (or an empty hierarchy) instead of an error.
 */

import { z } from "zod";
import type {
  FeeCreditBill,
  Hex,
  RpcClient,
  TokenKindFilter,
  TokenTypeUnit,
  TokenUnit,
  TransactionOrder,
  TxRecordProof,
} from "@tokenwallet/types";
import {
  feeCreditBillSchema,
  hexSchema,
  toJsonValue,
  tokenSchema,
  tokenTypeSchema,
  txRecordProofSchema,
  uint64Schema,
} from "@tokenwallet/types";
import { decode } from "./decode.js";
import { HttpClient } from "./http-client.js";
import type { HttpClientConfig, Pagination } from "./types.js";
import { RpcError } from "./types.js";

const API = "/api/v1";

/** Page size requested for list endpoints. */
export const DEFAULT_PAGE_SIZE = 100;

const paginationSchema: z.ZodType<Pagination, z.ZodTypeDef, unknown> = z.object({
  hasMore: z.boolean(),
  cursor: z.string().optional(),
  limit: z.number().int().positive(),
});

function pageSchema<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z.object({ data: z.array(item), pagination: paginationSchema });
}

const roundNumberSchema = z.object({ roundNumber: uint64Schema });
const txHashSchema = z.object({ txHash: hexSchema });

export class TokensBackendClient implements RpcClient {
  private readonly http: HttpClient;
  private readonly pageSize: number;

  constructor(config: HttpClientConfig & { readonly pageSize?: number | undefined }) {
    this.http = new HttpClient(config);
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async getRoundNumber(): Promise<bigint> {
    const res = await this.http.get(`${API}/round-number`);
    return decode(roundNumberSchema, res.data, "round number").roundNumber;
  }

  async sendTransaction(tx: TransactionOrder): Promise<Hex> {
    const res = await this.http.post(`${API}/transactions`, toJsonValue(tx));
    return decode(txHashSchema, res.data, "transaction hash", res.status).txHash;
  }

  async getTransactionProof(txHash: Hex): Promise<TxRecordProof | null> {
    return this.getOrNull(`${API}/transactions/${txHash}/proof`, txRecordProofSchema, "proof");
  }

  async getToken(id: Hex): Promise<TokenUnit | null> {
    return this.getOrNull(`${API}/tokens/${id}`, tokenSchema, "token");
  }

  async getTokens(kind: TokenKindFilter, ownerPredicate: Hex): Promise<readonly TokenUnit[]> {
    return this.getAll(`${API}/kinds/${kind}/owners/${ownerPredicate}/tokens`, tokenSchema, "tokens");
  }

  async getTokenTypes(kind: TokenKindFilter, creator?: Hex): Promise<readonly TokenTypeUnit[]> {
    const query: Record<string, string> = creator === undefined ? {} : { creator };
    return this.getAll(`${API}/kinds/${kind}/types`, tokenTypeSchema, "token types", query);
  }

  async getTypeHierarchy(id: Hex): Promise<readonly TokenTypeUnit[]> {
    const hierarchy = await this.getOrNull(
      `${API}/types/${id}/hierarchy`,
      z.array(tokenTypeSchema),
      "type hierarchy",
    );
    return hierarchy ?? [];
  }

  async getFeeCreditRecord(id: Hex): Promise<FeeCreditBill | null> {
    return this.getOrNull(`${API}/fee-credit-bills/${id}`, feeCreditBillSchema, "fee credit bill");
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private async getOrNull<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    what: string,
  ): Promise<T | null> {
    try {
      const res = await this.http.get(path);
      return decode(schema, res.data, what, res.status);
    } catch (error) {
      if (error instanceof RpcError && error.statusCode === 404) {
        return null;
      }
      throw error;
    }
  }

  private async getAll<T>(
    path: string,
    item: z.ZodType<T, z.ZodTypeDef, unknown>,
    what: string,
    query: Record<string, string> = {},
  ): Promise<T[]> {
    const schema = pageSchema(item);
    const items: T[] = [];
    let cursor: string | undefined;

    for (;;) {
      const params = new URLSearchParams({ ...query, limit: String(this.pageSize) });
      if (cursor !== undefined) params.set("offsetKey", cursor);

      const res = await this.http.get(`${path}?${params.toString()}`);
      const page = decode(schema, res.body, what, res.status);
      items.push(...page.data);

      if (!page.pagination.hasMore || page.pagination.cursor === undefined) {
        return items;
      }
      cursor = page.pagination.cursor;
    }
  }
}
