/**
 * Request DTO schemas for path and query parameters.
 */

import { z } from "zod";
import { hexSchema, unitIdSchema } from "@tokenwallet/types";
import { PaginationQuerySchema } from "./pagination.js";

export const KindParamSchema = z.object({
  kind: z.enum(["all", "fungible", "nft"]),
});

export const UnitIdParamSchema = z.object({ id: unitIdSchema });

export const OwnerTokensParamSchema = KindParamSchema.extend({
  owner: hexSchema.min(1, "owner predicate must not be empty"),
});

export const TxHashParamSchema = z.object({
  hash: hexSchema.length(64, "expected 32-byte transaction hash"),
});

export const ListTypesQuerySchema = PaginationQuerySchema.extend({
  creator: hexSchema.min(1).optional(),
});

export type KindParam = z.infer<typeof KindParamSchema>;
export type OwnerTokensParam = z.infer<typeof OwnerTokensParamSchema>;
export type ListTypesQuery = z.infer<typeof ListTypesQuerySchema>;
