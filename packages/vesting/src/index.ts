/**
 * @phasevault/vesting — Phased token vesting.
 *
 * Provides:
 * - VestingEngine: catalog, schedules, release and termination on the substrate
 * - VestingCatalog: immutable phase templates
 * - Fixed-point phase math
 *
 * @packageDocumentation
 */

export { VestingEngine } from "./vesting-engine.js";
export { VestingCatalog, copyPhases } from "./catalog.js";
export {
  PRECISION,
  BASIS_POINTS,
  validatePhases,
  scaledPhaseContribution,
  vestedAmountAt,
  toBasisPoints,
} from "./phase-math.js";

export type {
  VestingPhase,
  VestingType,
  VestingSchedule,
  ScheduleRequest,
  VestedAmount,
  VestingEngineOptions,
  VestingErrorCode,
} from "./types.js";
export { VestingError } from "./types.js";
