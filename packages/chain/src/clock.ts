/**
 * Clocks — the substrate's time source, in integer seconds.
 */

import type { Clock } from "@phasevault/types";
import { ChainError } from "./types.js";

/**
 * Wall-clock time, truncated to whole seconds.
 */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Used by tests and replays.
 *
 * Refuses to move backward.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    assertSeconds(start);
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  /**
   * Jump to an absolute time.
   *
   * @throws ChainError CLOCK_REGRESSION if `timestamp` is in the past
   */
  set(timestamp: number): void {
    assertSeconds(timestamp);
    if (timestamp < this._now) {
      throw new ChainError(
        "CLOCK_REGRESSION",
        `Clock cannot move backward from ${this._now} to ${timestamp}`,
      );
    }
    this._now = timestamp;
  }

  advance(seconds: number): void {
    this.set(this._now + seconds);
  }
}

function assertSeconds(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ChainError(
      "CLOCK_REGRESSION",
      `Timestamps must be non-negative integer seconds, got ${value}`,
    );
  }
}
