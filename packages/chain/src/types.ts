/**
 * @phasevault/chain — Substrate types.
 *
 * What a contract sees of the host it runs on, and the errors the host
 * raises.
 *
 * Rules:
 * - Every operation is synchronous and runs to completion
 * - Native value moves only through `transferNative`
 * - Events are raised through `emit`; the host stamps metadata
 */

import type {
  Address,
  CallRequest,
  CallResult,
  Clock,
  EventSource,
  EventValue,
  FungibleToken,
} from "@phasevault/types";

// =============================================================================
// Context
// =============================================================================

/**
 * An event raised by a contract, before the host stamps it.
 */
export interface EmittedEvent {
  readonly source: EventSource;
  readonly emitter: Address;
  readonly actor: Address;
  readonly type: string;
  readonly payload: Readonly<Record<string, EventValue>>;
}

/**
 * The host as seen from inside a contract.
 */
export interface ChainContext {
  readonly clock: Clock;

  /** Current time in seconds, fixed for the whole of the running operation. */
  now(): number;

  nativeBalanceOf(account: Address): bigint;

  /**
   * Move native value between accounts.
   *
   * @throws ChainError INSUFFICIENT_BALANCE / INVALID_AMOUNT
   */
  transferNative(from: Address, to: Address, amount: bigint): void;

  /**
   * Perform a call in its own frame. A failing destination is reported
   * as a `reverted` result; nothing it did survives.
   */
  call(request: CallRequest): CallResult;

  /**
   * Run `fn` atomically: if it throws, everything it did is undone and
   * the error propagates.
   */
  transact<T>(fn: () => T): T;

  /** The token deployed at `address`, if any. */
  tokenAt(address: Address): FungibleToken | undefined;

  emit(event: EmittedEvent): void;
}

// =============================================================================
// Errors
// =============================================================================

export type ChainErrorCode =
  | "UNKNOWN_CONTRACT"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_CALLDATA"
  | "UNKNOWN_METHOD"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "CLOCK_REGRESSION"
  | "ADDRESS_IN_USE";

export class ChainError extends Error {
  public readonly code: ChainErrorCode;
  constructor(code: ChainErrorCode, message: string) {
    super(message);
    this.name = "ChainError";
    this.code = code;
  }
}
