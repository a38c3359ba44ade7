/**
 * @phasevault/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. The substrate keeps its whole state in
 * memory, so the event log lives next to it and shares its lifetime.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 * - No durability guarantees
 */

import type { DomainEvent } from "@phasevault/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _subscribers = new Set<EventHandler>();

  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const fromVersion = stream.length + 1;
    const stored: StoredEvent[] = events.map((event, i) => {
      const content = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = {
        ...content,
        hash: computeEventHash(content, previousHash),
        previousHash,
      };
      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
      return record;
    });

    for (const handler of this._subscribers) {
      for (const record of stored) {
        handler(record);
      }
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);

    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
