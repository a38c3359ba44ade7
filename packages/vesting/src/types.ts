/**
 * @phasevault/vesting — Types for vesting templates and schedules.
 *
 * Rules:
 * - All types are readonly; records are replaced, never mutated
 * - Phase offsets and times are integer seconds
 * - Percentages are integers in [0, 100] and sum to 100 per template
 * - Amounts are bigint base units of the vested token
 */

import type { Address } from "@phasevault/types";

// =============================================================================
// Templates
// =============================================================================

/**
 * One linear unlock window, relative to the schedule start.
 */
export interface VestingPhase {
  /** Seconds after the schedule start when unlocking begins */
  readonly start: number;

  /** Seconds after the schedule start when the phase is fully unlocked */
  readonly end: number;

  /** Share of the allocation unlocked by this phase */
  readonly percentage: number;
}

/**
 * A published, immutable phase template.
 */
export interface VestingType {
  readonly id: number;
  readonly phases: readonly VestingPhase[];
}

// =============================================================================
// Schedules
// =============================================================================

export interface VestingSchedule {
  readonly beneficiary: Address;
  readonly typeId: number;
  readonly startTime: number;

  /** Owned copy of the template's phases at creation time */
  readonly phases: readonly VestingPhase[];

  readonly totalAllocation: bigint;
  readonly releasedAmount: bigint;
  readonly disabled: boolean;
}

export interface ScheduleRequest {
  readonly beneficiary: Address;
  readonly typeId: number;
  readonly amount: bigint;

  /** Default: the current clock reading */
  readonly startTime?: number | undefined;
}

export interface VestedAmount {
  readonly vested: bigint;
  readonly released: bigint;
  readonly releasable: bigint;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VestingEngineOptions {
  /** Administrator: the only caller of privileged operations */
  readonly owner: Address;

  /** The token being vested */
  readonly token: Address;
}

// =============================================================================
// Error
// =============================================================================

export type VestingErrorCode =
  | "NOT_OWNER"
  | "TYPE_EXISTS"
  | "TYPE_NOT_FOUND"
  | "INVALID_TYPE_ID"
  | "INVALID_PHASES"
  | "SCHEDULE_EXISTS"
  | "SCHEDULE_NOT_FOUND"
  | "SCHEDULE_DISABLED"
  | "ZERO_AMOUNT"
  | "INSUFFICIENT_FUNDING"
  | "NOTHING_TO_RELEASE"
  | "CANNOT_RECOVER_VESTED_TOKEN"
  | "TOKEN_NOT_FOUND"
  | "INVALID_START_TIME"
  | "INVALID_BENEFICIARY"
  | "TRANSFER_FAILED"
  | "INVARIANT_VIOLATION";

export class VestingError extends Error {
  public readonly code: VestingErrorCode;
  constructor(code: VestingErrorCode, message: string) {
    super(message);
    this.name = "VestingError";
    this.code = code;
  }
}
