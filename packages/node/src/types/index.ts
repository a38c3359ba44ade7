/**
 * Type barrel — re-exports all public types from @phasevault/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  IdParamSchema,
  SubmitTransactionSchema,
  WithdrawalSchema,
  ListTransactionsQuerySchema,
  ListEventsQuerySchema,
  toTransactionView,
  toVestingTypeView,
  toScheduleView,
} from "./dto.js";
export type {
  SubmitTransactionDto,
  WithdrawalDto,
  ListTransactionsQuery,
  ListEventsQuery,
  TransactionView,
  VestingTypeView,
  ScheduleView,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
