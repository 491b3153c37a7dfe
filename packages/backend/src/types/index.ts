/**
 * Type barrel — re-exports all public types from @tokenwallet/backend.
 */

// DTOs
export {
  KindParamSchema,
  UnitIdParamSchema,
  OwnerTokensParamSchema,
  TxHashParamSchema,
  ListTypesQuerySchema,
} from "./dto.js";
export type { KindParam, OwnerTokensParam, ListTypesQuery } from "./dto.js";

// Error
export { createErrorEnvelope, isApiErrorCode, ERROR_STATUS } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { paginate, PaginationQuerySchema, MAX_PAGE_SIZE } from "./pagination.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
