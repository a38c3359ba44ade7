/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types, used at system boundaries
 * (HTTP inputs, decoded call data, deserialized events).
 */

import type { Address, CallResult, CallTarget, FungibleToken } from "./chain.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Chain guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/** The lower-case form of `value`, or undefined if it is not an address. */
export function canonicalAddress(value: string): Address | undefined {
  const lower = value.toLowerCase();
  return isAddress(lower) ? lower : undefined;
}

export function isCallResult(value: unknown): value is CallResult {
  if (value === null || typeof value !== "object") return false;
  if (!("status" in value)) return false;
  if (value.status === "success") return true;
  return (
    value.status === "reverted" &&
    "reason" in value &&
    typeof value.reason === "string"
  );
}

export function isFungibleToken(
  target: CallTarget,
): target is CallTarget & FungibleToken {
  return (
    "balanceOf" in target &&
    typeof target.balanceOf === "function" &&
    "transfer" in target &&
    typeof target.transfer === "function"
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["wallet", "vesting", "token"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  return (
    "eventId" in value &&
    typeof value.eventId === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "actor" in value &&
    typeof value.actor === "string" &&
    "emitter" in value &&
    typeof value.emitter === "string" &&
    "correlationId" in value &&
    typeof value.correlationId === "string" &&
    "source" in value &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  return (
    "type" in value &&
    typeof value.type === "string" &&
    "metadata" in value &&
    isEventMetadata(value.metadata) &&
    "payload" in value &&
    value.payload !== null &&
    typeof value.payload === "object"
  );
}
