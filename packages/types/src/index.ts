/**
 * @phasevault/types — Shared domain types for the PhaseVault stack.
 *
 * Used across all packages:
 * - Addresses, clocks and call primitives
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Chain types
export type {
  Address,
  Payload,
  Clock,
  CallContext,
  CallRequest,
  CallResult,
  CallTarget,
  FungibleToken,
} from "./chain.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
  EventValue,
} from "./event.js";

// Runtime type guards
export {
  ZERO_ADDRESS,
  isAddress,
  canonicalAddress,
  isCallResult,
  isFungibleToken,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
