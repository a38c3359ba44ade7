/**
 * @phasevault/chain — In-process execution substrate.
 *
 * Hosts contracts at deterministic addresses, holds native balances and
 * runs calls inside atomic frames.
 *
 * Rules:
 * - A frame either commits everything it did or nothing
 * - Frames checkpoint native balances, the contract registry and every
 *   contract's state on entry, and restore them on revert
 * - Events raised inside a frame are held back until the outermost frame
 *   commits, then stamped and appended to the event store in order
 * - `call` never throws for a failing destination; it returns `reverted`
 * - The clock is sampled once per outermost operation; `now()` and the
 *   event timestamps inside it all see that reading
 *
 * Design:
 * - Contract addresses follow the EVM CREATE rule (deployer + nonce)
 * - Single-threaded and synchronous; callers are serialized by the host
 */

import { getContractAddress } from "viem";
import type {
  Address,
  CallRequest,
  CallResult,
  Clock,
  DomainEvent,
  FungibleToken,
} from "@phasevault/types";
import { isFungibleToken } from "@phasevault/types";
import { contractStreamId, InMemoryEventStore, type EventStore } from "@phasevault/event-store";
import { normalizeAddress } from "./calldata.js";
import type { Contract } from "./contract.js";
import { ChainError, type ChainContext, type EmittedEvent } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface ChainOptions {
  readonly clock: Clock;

  /** Where committed events go. Default: a fresh InMemoryEventStore */
  readonly events?: EventStore;
}

export type ContractFactory<T extends Contract> = (chain: ChainContext, address: Address) => T;

interface Frame {
  readonly balances: Map<Address, bigint>;
  readonly contracts: Map<Address, Contract>;
  readonly nonces: Map<Address, number>;
  readonly restores: readonly (() => void)[];
  readonly events: EmittedEvent[];
}

// =============================================================================
// Chain
// =============================================================================

export class Chain implements ChainContext {
  readonly clock: Clock;
  readonly events: EventStore;

  private balances = new Map<Address, bigint>();
  private contracts = new Map<Address, Contract>();
  private nonces = new Map<Address, number>();
  private readonly frames: Frame[] = [];

  private pinnedTime: number | undefined;
  private eventCounter = 0;
  private operationCounter = 0;
  private correlationId = "";

  constructor(options: ChainOptions) {
    this.clock = options.clock;
    this.events = options.events ?? new InMemoryEventStore();
  }

  // ─── Time ──────────────────────────────────────────────────────────

  now(): number {
    return this.pinnedTime ?? this.clock.now();
  }

  /**
   * Run read-only `fn` with the clock pinned to a single reading.
   */
  view<T>(fn: () => T): T {
    if (this.pinnedTime !== undefined) return fn();
    this.pinnedTime = this.clock.now();
    try {
      return fn();
    } finally {
      this.pinnedTime = undefined;
    }
  }

  // ─── Native value ──────────────────────────────────────────────────

  nativeBalanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /**
   * Credit genesis funds to an account.
   *
   * @throws ChainError INVALID_AMOUNT if `amount` is negative
   */
  fund(account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new ChainError("INVALID_AMOUNT", `Cannot fund a negative amount: ${amount}`);
    }
    const target = normalizeAddress(account);
    this.balances.set(target, this.nativeBalanceOf(target) + amount);
  }

  transferNative(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new ChainError("INVALID_AMOUNT", `Cannot transfer a negative amount: ${amount}`);
    }
    if (amount === 0n) return;

    const available = this.nativeBalanceOf(from);
    if (available < amount) {
      throw new ChainError(
        "INSUFFICIENT_BALANCE",
        `Insufficient native balance in ${from}: have ${available}, need ${amount}`,
      );
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.nativeBalanceOf(to) + amount);
  }

  // ─── Contracts ─────────────────────────────────────────────────────

  /**
   * Deploy a contract at the next CREATE address of `deployer`.
   *
   * @throws ChainError ADDRESS_IN_USE
   */
  deploy<T extends Contract>(deployer: Address, factory: ContractFactory<T>): T {
    return this.transact(() => {
      const from = normalizeAddress(deployer);
      const nonce = this.nonces.get(from) ?? 0;
      const address = normalizeAddress(getContractAddress({ from, nonce: BigInt(nonce) }));
      if (this.contracts.has(address)) {
        throw new ChainError("ADDRESS_IN_USE", `A contract is already deployed at ${address}`);
      }

      this.nonces.set(from, nonce + 1);
      const contract = factory(this, address);
      this.contracts.set(address, contract);
      return contract;
    });
  }

  contractAt(address: Address): Contract | undefined {
    return this.contracts.get(address);
  }

  tokenAt(address: Address): FungibleToken | undefined {
    const contract = this.contracts.get(address);
    return contract !== undefined && isFungibleToken(contract) ? contract : undefined;
  }

  // ─── Execution ─────────────────────────────────────────────────────

  /**
   * Run `fn` atomically. If it throws, every effect is undone and the
   * error propagates.
   */
  transact<T>(fn: () => T): T {
    return this.view(() => {
      this.openFrame();
      let result: T;
      try {
        result = fn();
      } catch (error) {
        this.revertFrame();
        throw error;
      }
      this.commitFrame();
      return result;
    });
  }

  /**
   * Deliver a call in its own frame. Value is credited before the
   * destination runs. A payload sent to an address with no contract
   * reverts; an empty one is a plain transfer.
   */
  call(request: CallRequest): CallResult {
    try {
      this.transact(() => {
        this.transferNative(request.from, request.to, request.value);
        const target = this.contracts.get(request.to);
        if (target === undefined) {
          if (request.payload.length > 0) {
            throw new ChainError("UNKNOWN_CONTRACT", `No contract at ${request.to}`);
          }
          return;
        }
        target.receiveCall({ sender: request.from, value: request.value, payload: request.payload });
      });
    } catch (error) {
      return { status: "reverted", reason: describeError(error), code: errorCode(error) };
    }
    return { status: "success" };
  }

  // ─── Events ────────────────────────────────────────────────────────

  emit(event: EmittedEvent): void {
    const frame = this.frames.at(-1);
    if (frame === undefined) {
      this.transact(() => this.emit(event));
      return;
    }
    frame.events.push(event);
  }

  // ─── Frames ────────────────────────────────────────────────────────

  private openFrame(): void {
    if (this.frames.length === 0) {
      this.operationCounter += 1;
      this.correlationId = `op-${this.operationCounter}`;
    }
    this.frames.push({
      balances: new Map(this.balances),
      contracts: new Map(this.contracts),
      nonces: new Map(this.nonces),
      restores: [...this.contracts.values()].map((contract) => contract.checkpoint()),
      events: [],
    });
  }

  private revertFrame(): void {
    const frame = this.popFrame();
    this.balances = frame.balances;
    this.contracts = frame.contracts;
    this.nonces = frame.nonces;
    for (const restore of frame.restores) restore();
  }

  private commitFrame(): void {
    const frame = this.popFrame();
    const parent = this.frames.at(-1);
    if (parent !== undefined) {
      parent.events.push(...frame.events);
      return;
    }
    for (const event of frame.events) {
      this.record(event);
    }
  }

  private popFrame(): Frame {
    const frame = this.frames.pop();
    if (frame === undefined) {
      throw new Error("Frame stack underflow");
    }
    return frame;
  }

  private record(event: EmittedEvent): void {
    this.eventCounter += 1;
    const domainEvent: DomainEvent = {
      type: event.type,
      metadata: {
        eventId: `evt-${this.eventCounter}`,
        timestamp: new Date(this.now() * 1000).toISOString(),
        actor: event.actor,
        emitter: event.emitter,
        correlationId: this.correlationId,
        source: event.source,
      },
      payload: event.payload,
    };
    this.events.append(contractStreamId(event.source, event.emitter), [domainEvent]);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
