/**
 * Phase Math — fixed-point vesting arithmetic.
 *
 * For a schedule `(startTime, A, phases)` at time `t`, each phase
 * contributes
 *
 *   0                                       before  startTime + start
 *   A · pct / 100                           from    startTime + end
 *   A · pct · elapsed / (duration · 100)    in between
 *
 * Contributions are computed scaled by PRECISION, summed, and divided by
 * PRECISION once at the end, so the only rounding is one final floor.
 *
 * Rules:
 * - Pure functions; the caller supplies the clock reading
 * - Phase boundaries are computed in bigint
 * - A phase with `start == end` unlocks in full at its offset
 * - Vested never exceeds the allocation and never decreases as t grows
 */

import { mulDiv } from "@phasevault/ledger";
import type { VestingPhase } from "./types.js";
import { VestingError } from "./types.js";

export const PRECISION = 10n ** 18n;

/** 100 % expressed in basis points */
export const BASIS_POINTS = 10_000n;

const PERCENT = 100n;

// =============================================================================
// Validation
// =============================================================================

/**
 * Throws VestingError INVALID_PHASES unless the phases form a valid
 * template: at least one phase, integer offsets, `start ≤ end`, each
 * phase starting no earlier than the previous one ends, integer
 * percentages in [0, 100] summing to exactly 100.
 */
export function validatePhases(phases: readonly VestingPhase[]): void {
  if (phases.length === 0) {
    throw new VestingError("INVALID_PHASES", "A vesting type needs at least one phase");
  }

  let total = 0;
  let previousEnd = 0;
  phases.forEach((phase, index) => {
    if (!isOffset(phase.start) || !isOffset(phase.end)) {
      throw new VestingError(
        "INVALID_PHASES",
        `Phase ${index}: offsets must be non-negative integer seconds`,
      );
    }
    if (phase.start > phase.end) {
      throw new VestingError("INVALID_PHASES", `Phase ${index}: start ${phase.start} is after end ${phase.end}`);
    }
    if (phase.start < previousEnd) {
      throw new VestingError(
        "INVALID_PHASES",
        `Phase ${index}: starts at ${phase.start}, before the previous phase ends at ${previousEnd}`,
      );
    }
    if (!Number.isInteger(phase.percentage) || phase.percentage < 0 || phase.percentage > 100) {
      throw new VestingError(
        "INVALID_PHASES",
        `Phase ${index}: percentage must be an integer in [0, 100], got ${phase.percentage}`,
      );
    }
    total += phase.percentage;
    previousEnd = phase.end;
  });

  if (total !== 100) {
    throw new VestingError("INVALID_PHASES", `Phase percentages sum to ${total}, expected 100`);
  }
}

function isOffset(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Accrual
// =============================================================================

/**
 * One phase's contribution at `now`, scaled by PRECISION.
 */
export function scaledPhaseContribution(
  allocation: bigint,
  startTime: number,
  phase: VestingPhase,
  now: number,
): bigint {
  const at = BigInt(now);
  const phaseStart = BigInt(startTime) + BigInt(phase.start);
  const phaseEnd = BigInt(startTime) + BigInt(phase.end);
  if (at < phaseStart) return 0n;

  const full = allocation * BigInt(phase.percentage) * PRECISION;
  if (at >= phaseEnd) return full / PERCENT;

  return mulDiv(full, at - phaseStart, (phaseEnd - phaseStart) * PERCENT);
}

/**
 * Amount vested at `now` (floor).
 */
export function vestedAmountAt(
  allocation: bigint,
  startTime: number,
  phases: readonly VestingPhase[],
  now: number,
): bigint {
  let scaled = 0n;
  for (const phase of phases) {
    scaled += scaledPhaseContribution(allocation, startTime, phase, now);
  }
  return scaled / PRECISION;
}

/**
 * `part / whole` in basis points (floor). Zero when `whole` is zero.
 */
export function toBasisPoints(part: bigint, whole: bigint): number {
  if (whole === 0n) return 0;
  return Number(mulDiv(part, BASIS_POINTS, whole));
}
