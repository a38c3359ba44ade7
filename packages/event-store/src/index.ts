/**
 * @phasevault/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a hash-chained global log
 * - Custody domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  StoredEventContent,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";

// Custody domain events
export { CUSTODY_EVENTS, contractStreamId } from "./custody-events.js";
export type {
  CustodyEventType,
  WalletDepositPayload,
  WalletSubmissionPayload,
  WalletApprovalPayload,
  WalletExecutionPayload,
  WalletExecutionFailurePayload,
  VestingTypeAddedPayload,
  VestingScheduleCreatedPayload,
  VestingReleasedPayload,
  VestingRevokedPayload,
  VestingDisabledPayload,
  VestingTokenRecoveredPayload,
  TokenTransferPayload,
  TokenApprovalPayload,
} from "./custody-events.js";
