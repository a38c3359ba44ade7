/**
 * Chain Types
 *
 * Execution primitives shared by the custody substrate and the
 * contracts that run on it.
 *
 * Rules:
 * - Addresses are 20-byte hex strings, lower-cased at every boundary
 * - Amounts are bigint base units; never floating point
 * - Timestamps and durations are integer seconds
 * - A call either succeeds or reverts; a revert is a value, not a throw
 */

/**
 * A 20-byte account or contract address (`0x` + 40 hex chars).
 */
export type Address = `0x${string}`;

/**
 * Opaque call data. Only the destination interprets it.
 */
export type Payload = Uint8Array;

/**
 * Read-only time source, in integer seconds.
 *
 * Never goes backward between operations. An operation reads it once and
 * uses that reading throughout.
 */
export interface Clock {
  now(): number;
}

/**
 * A call as seen by its destination.
 */
export interface CallContext {
  /** Immediate caller */
  readonly sender: Address;

  /** Native value carried by the call (already credited to the destination) */
  readonly value: bigint;

  /** Raw call data */
  readonly payload: Payload;
}

/**
 * A call request handed to the substrate.
 */
export interface CallRequest {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly payload: Payload;
}

/**
 * Outcome of a forwarded call.
 *
 * Reverted calls leave no trace: value transfers and events raised inside
 * the call are discarded.
 */
export type CallResult =
  | { readonly status: "success" }
  | {
      readonly status: "reverted";
      readonly reason: string;
      /** Error code of the destination's failure, when it carried one */
      readonly code?: string | undefined;
    };

/**
 * Anything deployed on the substrate that can receive calls.
 */
export interface CallTarget {
  readonly address: Address;
  receiveCall(context: CallContext): void;
}

/**
 * The slice of a fungible token ledger the core depends on.
 *
 * `transfer` moves `amount` from `caller` and reports success; a failed
 * transfer either returns false or throws.
 */
export interface FungibleToken {
  readonly address: Address;
  balanceOf(account: Address): bigint;
  transfer(caller: Address, to: Address, amount: bigint): boolean;
}
