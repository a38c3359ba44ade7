/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain error codes (WalletError, VestingError, LedgerError,
 * ChainError) to HTTP status codes. Several packages share a code
 * (NOT_OWNER, INSUFFICIENT_BALANCE); they share its status too.
 */

import type { Context } from "hono";
import { createErrorEnvelope, RequestError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Request
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,

  // Authorization
  NOT_OWNER: 403,

  // Wallet
  TRANSACTION_NOT_FOUND: 404,
  ALREADY_EXECUTED: 409,
  ALREADY_APPROVED: 409,
  NOT_APPROVED: 422,
  VALUE_MISMATCH: 422,
  INSUFFICIENT_BALANCE: 422,
  INVALID_OWNERS: 400,
  INVALID_THRESHOLD: 400,
  UNKNOWN_CALL: 400,
  INVALID_ADDRESS: 400,

  // Vesting
  TYPE_EXISTS: 409,
  TYPE_NOT_FOUND: 404,
  INVALID_TYPE_ID: 400,
  INVALID_PHASES: 400,
  SCHEDULE_EXISTS: 409,
  SCHEDULE_NOT_FOUND: 404,
  SCHEDULE_DISABLED: 422,
  ZERO_AMOUNT: 400,
  INSUFFICIENT_FUNDING: 422,
  NOTHING_TO_RELEASE: 422,
  CANNOT_RECOVER_VESTED_TOKEN: 422,
  TOKEN_NOT_FOUND: 404,
  INVALID_START_TIME: 400,
  INVALID_BENEFICIARY: 400,
  TRANSFER_FAILED: 422,

  // Token
  INSUFFICIENT_ALLOWANCE: 422,
  INVALID_AMOUNT: 400,
  INVALID_METADATA: 400,

  // Chain
  UNKNOWN_CONTRACT: 404,
  INVALID_CALLDATA: 400,
  UNKNOWN_METHOD: 400,
  ADDRESS_IN_USE: 409,
};

function errorCodeOf(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

export function statusForCode(code: string | undefined): ErrorStatus {
  return (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCodeOf(err);
  const status = statusForCode(code);

  if (status === 500) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const details = err instanceof RequestError ? err.details : undefined;
  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, details), status);
}
