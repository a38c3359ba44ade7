import { describe, it, expect } from "vitest";
import { VestingCatalog } from "../src/catalog.js";
import { VestingError } from "../src/types.js";

const PHASES = [
  { start: 0, end: 100, percentage: 40 },
  { start: 100, end: 200, percentage: 60 },
];

describe("VestingCatalog", () => {
  it("publishes and returns templates", () => {
    const catalog = new VestingCatalog();
    const type = catalog.add(1, PHASES);

    expect(type).toEqual({ id: 1, phases: PHASES });
    expect(catalog.get(1)).toBe(type);
    expect(catalog.has(1)).toBe(true);
    expect(catalog.has(2)).toBe(false);
  });

  it("stores a frozen copy of the phases", () => {
    const phases = [{ start: 0, end: 10, percentage: 100 }];
    const catalog = new VestingCatalog();
    catalog.add(3, phases);

    phases[0] = { start: 0, end: 99, percentage: 100 };

    expect(catalog.get(3).phases).toEqual([{ start: 0, end: 10, percentage: 100 }]);
    expect(Object.isFrozen(catalog.get(3).phases[0])).toBe(true);
  });

  it("refuses to reuse an id", () => {
    const catalog = new VestingCatalog();
    catalog.add(1, PHASES);
    expect(() => catalog.add(1, [{ start: 0, end: 0, percentage: 100 }])).toThrow(VestingError);
    expect(catalog.get(1).phases).toHaveLength(2);
  });

  it("leaves the catalog unchanged when validation fails", () => {
    const catalog = new VestingCatalog();
    expect(() => catalog.add(5, [{ start: 0, end: 10, percentage: 90 }])).toThrow(/sum to 90/);
    expect(catalog.list()).toEqual([]);
  });

  it("rejects ids that are not non-negative integers", () => {
    expect(() => new VestingCatalog().add(-1, PHASES)).toThrow(/non-negative integers/);
    expect(() => new VestingCatalog().add(1.5, PHASES)).toThrow(VestingError);
  });

  it("lists templates in id order", () => {
    const catalog = new VestingCatalog();
    catalog.add(7, PHASES);
    catalog.add(2, PHASES);
    expect(catalog.list().map((type) => type.id)).toEqual([2, 7]);
  });

  it("reports unknown ids", () => {
    expect(() => new VestingCatalog().get(42)).toThrow("Vesting type 42 not found");
  });

  it("clones independently", () => {
    const original = new VestingCatalog();
    original.add(1, PHASES);
    const copy = original.clone();
    copy.add(2, PHASES);

    expect(original.has(2)).toBe(false);
    expect(copy.has(1)).toBe(true);
  });
});
