/**
 * @phasevault/ledger — Fungible token ledger.
 *
 * An allowance-based token contract living on the substrate. It is the
 * collaborator the vesting engine pays out of and the wallet mints
 * through.
 *
 * API surface:
 * - balanceOf() / totalSupply / allowance() — reads
 * - transfer() / approve() / transferFrom() — holder operations
 * - mint() — owner only
 * - burnFrom() — spends the caller's allowance
 *
 * Rules:
 * - Balances never go negative; supply equals the sum of balances
 * - Nothing is sent to the zero address; mint and burn use it as the
 *   counterparty in their transfer events
 * - Every operation validates before it mutates
 * - Accounts are keyed by their lower-case address
 */

import { z } from "zod";
import type { Address, CallContext, EventSource, FungibleToken } from "@phasevault/types";
import { ZERO_ADDRESS, canonicalAddress } from "@phasevault/types";
import { Contract, addressSchema, amountSchema, route, type CallRoutes, type ChainContext } from "@phasevault/chain";
import {
  CUSTODY_EVENTS,
  type TokenApprovalPayload,
  type TokenTransferPayload,
} from "@phasevault/event-store";
import { assertNonNegative } from "./money-math.js";
import { LedgerError, type TokenLedgerOptions, type TokenSummary } from "./types.js";

export class TokenLedger extends Contract implements FungibleToken {
  override readonly source: EventSource = "token";

  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly owner: Address;

  private _balances = new Map<Address, bigint>();
  private _allowances = new Map<Address, Map<Address, bigint>>();
  private _totalSupply = 0n;

  constructor(chain: ChainContext, address: Address, options: TokenLedgerOptions) {
    super(chain, address);
    if (options.name.trim() === "" || options.symbol.trim() === "") {
      throw new LedgerError("INVALID_METADATA", "Token name and symbol must be non-empty");
    }
    if (!Number.isInteger(options.decimals) || options.decimals < 0 || options.decimals > 36) {
      throw new LedgerError("INVALID_METADATA", `Decimals must be an integer in [0, 36], got ${options.decimals}`);
    }

    this.name = options.name;
    this.symbol = options.symbol;
    this.decimals = options.decimals;
    this.owner = toAccount(options.owner);

    const initialSupply = options.initialSupply ?? 0n;
    if (initialSupply > 0n) {
      this.credit(toAccount(options.initialHolder ?? options.owner), initialSupply, this.owner);
    }
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: Address): bigint {
    const key = canonicalAddress(account);
    return key === undefined ? 0n : (this._balances.get(key) ?? 0n);
  }

  allowance(holder: Address, spender: Address): bigint {
    const holderKey = canonicalAddress(holder);
    const spenderKey = canonicalAddress(spender);
    if (holderKey === undefined || spenderKey === undefined) return 0n;
    return this._allowances.get(holderKey)?.get(spenderKey) ?? 0n;
  }

  summary(): TokenSummary {
    return {
      address: this.address,
      name: this.name,
      symbol: this.symbol,
      decimals: this.decimals,
      owner: this.owner,
      totalSupply: this._totalSupply,
    };
  }

  // ─── Holder Operations ─────────────────────────────────────────────────

  transfer(caller: Address, to: Address, amount: bigint): boolean {
    const sender = toAccount(caller);
    this.move(sender, toAccount(to), amount, sender);
    return true;
  }

  approve(caller: Address, spender: Address, amount: bigint): boolean {
    const holder = toAccount(caller);
    const approved = toAccount(spender);
    assertNonNegative(amount);
    assertRecipient(approved);

    this.setAllowance(holder, approved, amount);
    this.emit(CUSTODY_EVENTS.TOKEN_APPROVAL, holder, {
      owner: holder,
      spender: approved,
      amount: amount.toString(),
    } satisfies TokenApprovalPayload);
    return true;
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean {
    const spender = toAccount(caller);
    const holder = toAccount(from);
    const remaining = this.spendableAllowance(holder, spender, amount);
    this.move(holder, toAccount(to), amount, spender);
    this.setAllowance(holder, spender, remaining);
    return true;
  }

  // ─── Supply ────────────────────────────────────────────────────────────

  mint(caller: Address, to: Address, amount: bigint): void {
    if (canonicalAddress(caller) !== this.owner) {
      throw new LedgerError("NOT_OWNER", `Only the token owner can mint (caller ${caller})`);
    }
    const recipient = toAccount(to);
    assertNonNegative(amount);
    assertRecipient(recipient);
    this.credit(recipient, amount, this.owner);
  }

  /**
   * Destroy `amount` of `from`'s tokens, spending the caller's allowance.
   */
  burnFrom(caller: Address, from: Address, amount: bigint): void {
    const spender = toAccount(caller);
    const holder = toAccount(from);
    const remaining = this.spendableAllowance(holder, spender, amount);
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new LedgerError("INSUFFICIENT_BALANCE", `Cannot burn ${amount} from ${holder}: balance is ${balance}`);
    }

    this.setAllowance(holder, spender, remaining);
    this._balances.set(holder, balance - amount);
    this._totalSupply -= amount;
    this.emitTransfer(spender, holder, ZERO_ADDRESS, amount);
  }

  // ─── Substrate ─────────────────────────────────────────────────────────

  protected override routes(): CallRoutes {
    return {
      transfer: route(z.tuple([addressSchema, amountSchema]), ({ sender }, [to, amount]) => {
        this.transfer(sender, to, amount);
      }),
      approve: route(z.tuple([addressSchema, amountSchema]), ({ sender }, [spender, amount]) => {
        this.approve(sender, spender, amount);
      }),
      transferFrom: route(
        z.tuple([addressSchema, addressSchema, amountSchema]),
        ({ sender }, [from, to, amount]) => {
          this.transferFrom(sender, from, to, amount);
        },
      ),
      mint: route(z.tuple([addressSchema, amountSchema]), ({ sender }, [to, amount]) => {
        this.mint(sender, to, amount);
      }),
      burnFrom: route(z.tuple([addressSchema, amountSchema]), ({ sender }, [from, amount]) => {
        this.burnFrom(sender, from, amount);
      }),
    };
  }

  protected override receiveValue(context: CallContext): void {
    throw new LedgerError("INVALID_AMOUNT", `Token ${this.symbol} does not accept native value from ${context.sender}`);
  }

  override checkpoint(): () => void {
    const balances = new Map(this._balances);
    const allowances = new Map(
      [...this._allowances].map(([holder, spenders]): [Address, Map<Address, bigint>] => [holder, new Map(spenders)]),
    );
    const totalSupply = this._totalSupply;
    return () => {
      this._balances = balances;
      this._allowances = allowances;
      this._totalSupply = totalSupply;
    };
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private move(from: Address, to: Address, amount: bigint, actor: Address): void {
    assertNonNegative(amount);
    assertRecipient(to);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient ${this.symbol} balance in ${from}: have ${balance}, need ${amount}`,
      );
    }

    this._balances.set(from, balance - amount);
    this._balances.set(to, this.balanceOf(to) + amount);
    this.emitTransfer(actor, from, to, amount);
  }

  private credit(to: Address, amount: bigint, actor: Address): void {
    this._balances.set(to, this.balanceOf(to) + amount);
    this._totalSupply += amount;
    this.emitTransfer(actor, ZERO_ADDRESS, to, amount);
  }

  private spendableAllowance(holder: Address, spender: Address, amount: bigint): bigint {
    assertNonNegative(amount);
    const allowed = this.allowance(holder, spender);
    if (allowed < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of ${spender} over ${holder} is ${allowed}, need ${amount}`,
      );
    }
    return allowed - amount;
  }

  private setAllowance(holder: Address, spender: Address, amount: bigint): void {
    const spenders = this._allowances.get(holder) ?? new Map<Address, bigint>();
    spenders.set(spender, amount);
    this._allowances.set(holder, spenders);
  }

  private emitTransfer(actor: Address, from: Address, to: Address, amount: bigint): void {
    this.emit(CUSTODY_EVENTS.TOKEN_TRANSFER, actor, {
      from,
      to,
      amount: amount.toString(),
    } satisfies TokenTransferPayload);
  }
}

function toAccount(value: Address): Address {
  const account = canonicalAddress(value);
  if (account === undefined) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${value}"`);
  }
  return account;
}

function assertRecipient(account: Address): void {
  if (account === ZERO_ADDRESS) {
    throw new LedgerError("INVALID_ADDRESS", "The zero address cannot receive tokens or allowances");
  }
}
