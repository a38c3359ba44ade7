/**
 * @phasevault/ledger — Deterministic token arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Whole-token decimal strings are converted to/from base units via
 * decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Token amounts are never negative
 * - Division always rounds toward zero (floor for non-negative operands)
 */

import { LedgerError } from "./types.js";

// ─── Decimal Conversion ──────────────────────────────────────────────────

/**
 * Parse a whole-token decimal string into base units.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  assertDecimals(decimals);
  const trimmed = amount.trim();
  if (trimmed === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert base units back to a whole-token decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  assertDecimals(decimals);
  assertNonNegative(scaled);
  if (decimals === 0) {
    return scaled.toString();
  }

  const str = scaled.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * `floor(a * b / denominator)` without intermediate rounding.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  assertNonNegative(a);
  assertNonNegative(b);
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Denominator must be positive, got ${denominator}`);
  }
  return (a * b) / denominator;
}

/**
 * Throws LedgerError INVALID_AMOUNT for negative amounts.
 */
export function assertNonNegative(amount: bigint): void {
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative, got ${amount}`);
  }
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    throw new LedgerError("INVALID_METADATA", `Decimals must be an integer in [0, 36], got ${decimals}`);
  }
}
