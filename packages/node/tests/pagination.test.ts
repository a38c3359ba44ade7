/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import { encodeCursor, decodeCursor, paginate } from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads back an encoded position", () => {
    expect(decodeCursor(encodeCursor(42))).toBe(42);
  });

  it("returns undefined for invalid base64 JSON", () => {
    expect(decodeCursor("!!!not-base64!!!")).toBeUndefined();
    expect(decodeCursor(Buffer.from("not json").toString("base64url"))).toBeUndefined();
  });

  it("returns undefined for foreign shapes", () => {
    expect(decodeCursor(Buffer.from(JSON.stringify({ p: "7" })).toString("base64url"))).toBeUndefined();
    expect(decodeCursor(Buffer.from(JSON.stringify({ p: 1.5 })).toString("base64url"))).toBeUndefined();
    expect(decodeCursor(Buffer.from("null").toString("base64url"))).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

describe("paginate", () => {
  const items = [1, 2, 3, 4, 5].map((position) => ({ position }));
  const positionOf = (item: { position: number }): number => item.position;

  it("returns everything when it fits", () => {
    expect(paginate(items, { limit: 10 }, positionOf)).toEqual({
      data: items,
      pagination: { cursor: null, hasMore: false },
    });
  });

  it("continues after the cursor", () => {
    const first = paginate(items, { limit: 2 }, positionOf);
    expect(first.data).toEqual([{ position: 1 }, { position: 2 }]);
    expect(first.pagination).toEqual({ cursor: encodeCursor(2), hasMore: true });

    const last = paginate(items, { cursor: encodeCursor(4), limit: 2 }, positionOf);
    expect(last.data).toEqual([{ position: 5 }]);
    expect(last.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores an unreadable cursor", () => {
    expect(paginate(items, { cursor: "garbage", limit: 1 }, positionOf).data).toEqual([{ position: 1 }]);
  });
});
