/**
 * Read routes over the synced storage.
 *
 * GET /api/v1/round-number                      — Last synced round
 * GET /api/v1/tokens/:id                        — Single token
 * GET /api/v1/kinds/:kind/owners/:owner/tokens  — Tokens by owner predicate (paginated)
 * GET /api/v1/kinds/:kind/types                 — Token types, optionally by creator (paginated)
 * GET /api/v1/types/:id/hierarchy               — Type and its ancestors, type first
 * GET /api/v1/fee-credit-bills/:id              — Fee credit bill
 * GET /api/v1/transactions/:hash/proof          — Record and inclusion proof
 *
 * Bodies use the wire encoding: uint64 as decimal strings, bytes as hex.
 */

import { Hono } from "hono";
import type { Storage } from "@tokenwallet/block-processor";
import { getTypeHierarchy } from "@tokenwallet/block-processor";
import { toJsonValue } from "@tokenwallet/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  KindParamSchema,
  ListTypesQuerySchema,
  OwnerTokensParamSchema,
  TxHashParamSchema,
  UnitIdParamSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate, PaginationQuerySchema } from "../types/pagination.js";
import type { PaginatedResponse } from "../types/pagination.js";
import { validateInput } from "../middleware/validate.js";

function page<T>(result: PaginatedResponse<T>) {
  return { data: result.data.map((item) => toJsonValue(item)), pagination: result.pagination };
}

export function createTokenRoutes(storage: Storage): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/round-number", (c) => {
    return c.json({ data: { roundNumber: storage.getBlockNumber().toString() } });
  });

  routes.get("/tokens/:id", (c) => {
    const { id } = validateInput(UnitIdParamSchema, c.req.param(), "token ID");
    const token = storage.getToken(id);
    if (token === undefined) {
      return c.json(createErrorEnvelope("TOKEN_NOT_FOUND", `token ${id} not found`), 404);
    }
    return c.json({ data: toJsonValue(token) });
  });

  routes.get("/kinds/:kind/owners/:owner/tokens", (c) => {
    const { kind, owner } = validateInput(OwnerTokensParamSchema, c.req.param(), "path");
    const query = validateInput(PaginationQuerySchema, c.req.query(), "query");

    const tokens = storage.getTokens(kind, owner);
    return c.json(page(paginate(tokens, query, (t) => t.id)));
  });

  routes.get("/kinds/:kind/types", (c) => {
    const { kind } = validateInput(KindParamSchema, c.req.param(), "path");
    const { creator, ...query } = validateInput(ListTypesQuerySchema, c.req.query(), "query");

    const types = storage.getTokenTypes(kind, creator);
    return c.json(page(paginate(types, query, (t) => t.id)));
  });

  routes.get("/types/:id/hierarchy", (c) => {
    const { id } = validateInput(UnitIdParamSchema, c.req.param(), "type ID");
    const hierarchy = getTypeHierarchy(storage, id);
    return c.json({ data: hierarchy.map((t) => toJsonValue(t)) });
  });

  routes.get("/fee-credit-bills/:id", (c) => {
    const { id } = validateInput(UnitIdParamSchema, c.req.param(), "fee credit record ID");
    const bill = storage.getFeeCreditBill(id);
    if (bill === undefined) {
      return c.json(createErrorEnvelope("FEE_CREDIT_BILL_NOT_FOUND", `fee credit bill ${id} not found`), 404);
    }
    return c.json({ data: toJsonValue(bill) });
  });

  routes.get("/transactions/:hash/proof", (c) => {
    const { hash } = validateInput(TxHashParamSchema, c.req.param(), "transaction hash");
    const proof = storage.getTxProof(hash);
    if (proof === undefined) {
      return c.json(createErrorEnvelope("PROOF_NOT_FOUND", `proof for transaction ${hash} not found`), 404);
    }
    return c.json({ data: toJsonValue(proof) });
  });

  return routes;
}
