/**
 * @phasevault/ledger — Fungible token ledger and token arithmetic.
 *
 * Provides:
 * - TokenLedger: allowance-based token contract on the substrate
 * - bigint amount helpers (decimal parse/format, mul-div)
 *
 * Design rules:
 * - All types are readonly
 * - No floating point anywhere
 * - Fail-closed: invalid operations throw, never silently succeed
 */

export { TokenLedger } from "./token-ledger.js";

export { parseAmount, formatAmount, mulDiv, assertNonNegative } from "./money-math.js";

export type { TokenMetadata, TokenLedgerOptions, TokenSummary, LedgerErrorCode } from "./types.js";
export { LedgerError } from "./types.js";
