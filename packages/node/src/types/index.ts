/**
 * Type barrel — re-exports all public types from @warden/node.
 */

export type { AppEnv } from "./api-contract.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";
export { createErrorEnvelope } from "./error.js";
export type {
  ListJournalQuery,
  NamespaceView,
  VaultView,
  VaultAddressView,
  RuleView,
} from "./dto.js";
export { PaginationQuerySchema, ListJournalQuerySchema } from "./dto.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
