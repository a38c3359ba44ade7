/**
 * Contract — base class for everything deployed on the substrate.
 *
 * A contract owns an address and a method table. Calls arrive as opaque
 * payloads; an empty payload is a plain value transfer, anything else is
 * decoded and dispatched by method name.
 *
 * Rules:
 * - Handlers validate before they mutate
 * - `checkpoint` captures all mutable state; the substrate calls the
 *   returned function to put it back when a frame reverts
 * - Unknown methods revert
 * - Plain value transfers revert unless the contract accepts them
 */

import type { Address, CallContext, CallTarget, EventValue, EventSource } from "@phasevault/types";
import { decodeCall, type CallRoutes } from "./calldata.js";
import { ChainError, type ChainContext } from "./types.js";

export abstract class Contract implements CallTarget {
  abstract readonly source: EventSource;

  private _routes: CallRoutes | undefined;

  constructor(
    protected readonly chain: ChainContext,
    public readonly address: Address,
  ) {}

  /** The externally callable methods of this contract. */
  protected abstract routes(): CallRoutes;

  abstract checkpoint(): () => void;

  receiveCall(context: CallContext): void {
    if (context.payload.length === 0) {
      this.receiveValue(context);
      return;
    }

    const { method, args } = decodeCall(context.payload);
    this._routes ??= this.routes();
    const handler = Object.hasOwn(this._routes, method) ? this._routes[method] : undefined;
    if (handler === undefined) {
      throw new ChainError("UNKNOWN_METHOD", `Contract ${this.address} has no method "${method}"`);
    }
    handler(context, args);
  }

  /**
   * Plain value transfer (empty payload).
   */
  protected receiveValue(context: CallContext): void {
    throw new ChainError(
      "UNKNOWN_METHOD",
      `Contract ${this.address} does not accept plain transfers (from ${context.sender})`,
    );
  }

  /** Run `fn` as one all-or-nothing step. */
  protected atomically<T>(fn: () => T): T {
    return this.chain.transact(fn);
  }

  protected emit(type: string, actor: Address, payload: Readonly<Record<string, EventValue>>): void {
    this.chain.emit({ source: this.source, emitter: this.address, actor, type, payload });
  }
}
