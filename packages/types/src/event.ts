/**
 * Event Types
 *
 * Append-only event architecture.
 * Every observable state change of a contract is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which contract)
 * - Payloads hold JSON values only; amounts travel as decimal strings
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Which subsystem emitted an event.
 */
export type EventSource = "wallet" | "vesting" | "token";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp, derived from the substrate clock */
  readonly timestamp: string;

  /** Address that caused this event */
  readonly actor: string;

  /** Address of the contract that emitted the event */
  readonly emitter: string;

  /** ID for grouping events raised by the same top-level call */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A JSON value that can live in an event payload.
 */
export type EventValue =
  | string
  | number
  | boolean
  | null
  | readonly EventValue[]
  | { readonly [key: string]: EventValue };

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g. "wallet.submission", "vesting.released") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, EventValue>>;
}
