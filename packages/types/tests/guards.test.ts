/**
 * Runtime type guard tests for @phasevault/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  ZERO_ADDRESS,
  isAddress,
  canonicalAddress,
  isCallResult,
  isFungibleToken,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Chain guards
// =============================================================================

describe("isAddress", () => {
  it("accepts a 20-byte hex address", () => {
    expect(isAddress("0x1111111111111111111111111111111111111111")).toBe(true);
  });

  it("accepts mixed case", () => {
    expect(isAddress("0xAbCdEf0000000000000000000000000000000000")).toBe(true);
  });

  it("accepts the zero address", () => {
    expect(isAddress(ZERO_ADDRESS)).toBe(true);
  });

  it("rejects missing prefix", () => {
    expect(isAddress("1111111111111111111111111111111111111111")).toBe(false);
  });

  it("rejects wrong length", () => {
    expect(isAddress("0x1234")).toBe(false);
    expect(isAddress(`${ZERO_ADDRESS}00`)).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isAddress("0xZZ11111111111111111111111111111111111111")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("canonicalAddress", () => {
  it("lower-cases a mixed-case address", () => {
    expect(canonicalAddress("0xAbCdEf0123456789aBcDeF0123456789AbCdEf01")).toBe(
      "0xabcdef0123456789abcdef0123456789abcdef01",
    );
  });

  it("returns undefined for anything else", () => {
    expect(canonicalAddress("0x1234")).toBeUndefined();
  });
});

describe("isCallResult", () => {
  it("accepts success", () => {
    expect(isCallResult({ status: "success" })).toBe(true);
  });

  it("accepts a revert with reason", () => {
    expect(isCallResult({ status: "reverted", reason: "nope" })).toBe(true);
  });

  it("rejects a revert without reason", () => {
    expect(isCallResult({ status: "reverted" })).toBe(false);
  });

  it("rejects unknown status", () => {
    expect(isCallResult({ status: "pending" })).toBe(false);
    expect(isCallResult("success")).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const metadata = {
  eventId: "evt-1",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "0x1111111111111111111111111111111111111111",
  emitter: "0x2222222222222222222222222222222222222222",
  correlationId: "call-1",
  source: "wallet",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    expect(isEventSource("wallet")).toBe(true);
    expect(isEventSource("vesting")).toBe(true);
    expect(isEventSource("token")).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("treasury")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts complete metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects metadata without emitter", () => {
    const { emitter: _emitter, ...rest } = metadata;
    expect(isEventMetadata(rest)).toBe(false);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "registrum" })).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a well-formed event", () => {
    expect(
      isDomainEvent({ type: "wallet.deposit", metadata, payload: { amount: "1" } }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(isDomainEvent({ type: "wallet.deposit", metadata, payload: null })).toBe(false);
  });

  it("rejects missing type", () => {
    expect(isDomainEvent({ metadata, payload: {} })).toBe(false);
  });
});

describe("isFungibleToken", () => {
  const address = "0x3333333333333333333333333333333333333333" as const;

  it("accepts a target exposing balanceOf and transfer", () => {
    const token = {
      address,
      receiveCall: () => undefined,
      balanceOf: () => 0n,
      transfer: () => true,
    };
    expect(isFungibleToken(token)).toBe(true);
  });

  it("rejects a plain call target", () => {
    expect(isFungibleToken({ address, receiveCall: () => undefined })).toBe(false);
  });
});
