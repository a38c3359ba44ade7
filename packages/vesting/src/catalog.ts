/**
 * Vesting Catalog — published phase templates, keyed by integer id.
 *
 * Rules:
 * - Ids are non-negative safe integers, used once
 * - Templates are validated on publication and frozen afterwards
 * - Readers get the stored template; schedules take their own copy
 */

import { validatePhases } from "./phase-math.js";
import type { VestingPhase, VestingType } from "./types.js";
import { VestingError } from "./types.js";

export class VestingCatalog {
  private readonly types: Map<number, VestingType>;

  constructor(types: ReadonlyMap<number, VestingType> = new Map()) {
    this.types = new Map(types);
  }

  /**
   * Validate and publish a template.
   */
  add(id: number, phases: readonly VestingPhase[]): VestingType {
    if (!Number.isSafeInteger(id) || id < 0) {
      throw new VestingError("INVALID_TYPE_ID", `Vesting type ids are non-negative integers, got ${id}`);
    }
    if (this.types.has(id)) {
      throw new VestingError("TYPE_EXISTS", `Vesting type ${id} already exists`);
    }
    validatePhases(phases);

    const type: VestingType = Object.freeze({ id, phases: copyPhases(phases) });
    this.types.set(id, type);
    return type;
  }

  get(id: number): VestingType {
    const type = this.types.get(id);
    if (!type) {
      throw new VestingError("TYPE_NOT_FOUND", `Vesting type ${id} not found`);
    }
    return type;
  }

  has(id: number): boolean {
    return this.types.has(id);
  }

  /** Templates in id order. */
  list(): readonly VestingType[] {
    return [...this.types.values()].sort((a, b) => a.id - b.id);
  }

  clone(): VestingCatalog {
    return new VestingCatalog(this.types);
  }
}

/**
 * Deep, frozen copy of a phase list.
 */
export function copyPhases(phases: readonly VestingPhase[]): readonly VestingPhase[] {
  return Object.freeze(
    phases.map((phase) =>
      Object.freeze({ start: phase.start, end: phase.end, percentage: phase.percentage }),
    ),
  );
}
