/**
 * Tests for the deterministic token arithmetic.
 *
 * Covers:
 * - parseAmount / formatAmount conversions
 * - mulDiv flooring
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import { parseAmount, formatAmount, mulDiv, assertNonNegative } from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses zero", () => {
    expect(parseAmount("0", 18)).toBe(0n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("1.5", 6)).toBe(1_500_000n);
  });

  it("handles 18-decimal token amounts beyond Number precision", () => {
    expect(parseAmount("123456789.123456789123456789", 18)).toBe(123456789123456789123456789n);
  });

  it("ignores surrounding whitespace", () => {
    expect(parseAmount("  42 ", 0)).toBe(42n);
  });

  it("rejects too many decimal places", () => {
    expect(() => parseAmount("1.123", 2)).toThrow(LedgerError);
  });

  it("rejects negative amounts", () => {
    expect(() => parseAmount("-1", 2)).toThrow(/Invalid amount format/);
  });

  it("rejects non-numeric strings", () => {
    expect(() => parseAmount("abc", 2)).toThrow(LedgerError);
    expect(() => parseAmount("1e18", 18)).toThrow(LedgerError);
    expect(() => parseAmount("", 2)).toThrow(/Invalid amount/);
  });

  it("rejects invalid decimal counts", () => {
    expect(() => parseAmount("1", -1)).toThrow(/Decimals must be an integer/);
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with fixed decimals", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
    expect(formatAmount(100_000_000n, 6)).toBe("100.000000");
  });

  it("pads small amounts with leading zeros", () => {
    expect(formatAmount(5n, 4)).toBe("0.0005");
  });

  it("formats zero-decimal tokens as integers", () => {
    expect(formatAmount(10_000n, 0)).toBe("10000");
  });

  it("inverts parseAmount", () => {
    expect(parseAmount(formatAmount(6_500_000_000_000_000_000_000n, 18), 18)).toBe(6_500_000_000_000_000_000_000n);
  });

  it("rejects negative amounts", () => {
    expect(() => formatAmount(-1n, 2)).toThrow(LedgerError);
  });
});

// ─── mulDiv ──────────────────────────────────────────────────────────────

describe("mulDiv", () => {
  it("computes a * b / d exactly when divisible", () => {
    expect(mulDiv(10_000n, 30n, 100n)).toBe(3_000n);
  });

  it("floors the result", () => {
    expect(mulDiv(10n, 1n, 3n)).toBe(3n);
    expect(mulDiv(2n, 1n, 3n)).toBe(0n);
  });

  it("keeps full precision on large intermediates", () => {
    const a = 10n ** 30n;
    expect(mulDiv(a, a, 10n ** 40n)).toBe(10n ** 20n);
  });

  it("rejects a non-positive denominator", () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow(/Denominator must be positive/);
  });

  it("rejects negative operands", () => {
    expect(() => mulDiv(-1n, 1n, 1n)).toThrow(LedgerError);
  });
});

describe("assertNonNegative", () => {
  it("accepts zero and rejects negatives", () => {
    expect(() => assertNonNegative(0n)).not.toThrow();
    expect(() => assertNonNegative(-5n)).toThrow(/must not be negative/);
  });
});
