/**
 * Multisig Wallet — N-of-M threshold approval for arbitrary calls.
 *
 * Owners propose `(destination, value, payload)`; once enough distinct
 * owners approve, the wallet forwards the call through the substrate
 * exactly once.
 *
 * Rules:
 * - The owner set and threshold are fixed at construction
 * - Submitting counts as the submitter's approval
 * - Reaching the threshold exactly triggers one execution attempt
 * - A reverted forward is recorded, not propagated; the transaction stays
 *   executable and anyone may retry it
 * - A transaction is marked executed before it is forwarded, so a
 *   re-entrant execute cannot run it twice
 * - Value attached to transactions is held by the wallet until they run
 */

import type { Address, CallContext, EventSource, Payload } from "@phasevault/types";
import { ZERO_ADDRESS, canonicalAddress } from "@phasevault/types";
import { Contract, payloadToHex, type CallRoutes, type ChainContext } from "@phasevault/chain";
import {
  CUSTODY_EVENTS,
  type WalletApprovalPayload,
  type WalletDepositPayload,
  type WalletExecutionFailurePayload,
  type WalletExecutionPayload,
  type WalletSubmissionPayload,
} from "@phasevault/event-store";
import {
  WalletError,
  type ApprovalResult,
  type ExecutionResult,
  type MultisigTransaction,
  type MultisigWalletOptions,
  type TransactionFilter,
  type TransactionStatus,
} from "./types.js";

// =============================================================================
// Wallet
// =============================================================================

export class MultisigWallet extends Contract {
  override readonly source: EventSource = "wallet";

  private readonly owners: ReadonlySet<Address>;
  private readonly threshold: number;
  private transactions: Map<number, MultisigTransaction> = new Map();
  private nextId = 0;

  constructor(chain: ChainContext, address: Address, options: MultisigWalletOptions) {
    super(chain, address);

    if (options.owners.length === 0) {
      throw new WalletError("INVALID_OWNERS", "At least one owner is required");
    }

    const owners = new Set<Address>();
    for (const candidate of options.owners) {
      const owner = canonicalAddress(candidate);
      if (owner === undefined || owner === ZERO_ADDRESS) {
        throw new WalletError("INVALID_OWNERS", `Invalid owner address: "${candidate}"`);
      }
      if (owners.has(owner)) {
        throw new WalletError("INVALID_OWNERS", `Duplicate owner: ${owner}`);
      }
      owners.add(owner);
    }

    if (!Number.isInteger(options.required) || options.required < 1 || options.required > owners.size) {
      throw new WalletError(
        "INVALID_THRESHOLD",
        `Threshold must be between 1 and ${owners.size}, got ${options.required}`,
      );
    }

    this.owners = owners;
    this.threshold = options.required;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Proposals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose a call. `attachedValue` is native value the caller sends
   * along: it must equal `value` when `value` is non-zero, and is kept as
   * a plain deposit otherwise.
   *
   * Returns the new transaction id.
   */
  submitTransaction(
    caller: Address,
    destination: Address,
    value: bigint,
    payload: Payload,
    attachedValue = 0n,
  ): number {
    const owner = this.ownerOf(caller);
    const target = this.toAddress(destination, "destination");

    if (value < 0n || attachedValue < 0n) {
      throw new WalletError("VALUE_MISMATCH", "Values must not be negative");
    }
    if (value > 0n && attachedValue !== value) {
      throw new WalletError(
        "VALUE_MISMATCH",
        `Transaction value ${value} must be attached in full, got ${attachedValue}`,
      );
    }

    const available = this.chain.nativeBalanceOf(owner);
    if (available < attachedValue) {
      throw new WalletError(
        "INSUFFICIENT_BALANCE",
        `Caller ${owner} cannot attach ${attachedValue}: balance is ${available}`,
      );
    }

    this.chain.transferNative(owner, this.address, attachedValue);
    if (value === 0n && attachedValue > 0n) {
      this.recordDeposit(owner, attachedValue);
    }

    return this.propose(owner, target, value, payload);
  }

  /**
   * Propose sending `amount` of the wallet's own balance to `destination`.
   * The balance must cover `amount` on top of everything already
   * reserved by unexecuted transactions.
   */
  submitWithdrawal(caller: Address, destination: Address, amount: bigint): number {
    const owner = this.ownerOf(caller);
    const target = this.toAddress(destination, "destination");

    if (amount <= 0n) {
      throw new WalletError("VALUE_MISMATCH", `Withdrawal amount must be positive, got ${amount}`);
    }

    const balance = this.balance();
    const reserved = this.reservedValue();
    if (balance < reserved + amount) {
      throw new WalletError(
        "INSUFFICIENT_BALANCE",
        `Cannot withdraw ${amount}: balance ${balance}, already reserved ${reserved}`,
      );
    }

    return this.propose(owner, target, amount, new Uint8Array(0));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Approval & execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Approve a transaction. The approval that brings the count to the
   * threshold also executes it.
   */
  approveTransaction(caller: Address, id: number): MultisigTransaction {
    return this.approve(caller, id).transaction;
  }

  /**
   * Approve a transaction and report the forwarded call's result when the
   * approval executed it.
   */
  approve(caller: Address, id: number): ApprovalResult {
    const owner = this.ownerOf(caller);
    const transaction = this.getTransaction(id);

    if (transaction.executed) {
      throw new WalletError("ALREADY_EXECUTED", `Transaction ${id} has already been executed`);
    }
    if (transaction.approvedBy.includes(owner)) {
      throw new WalletError("ALREADY_APPROVED", `${owner} has already approved transaction ${id}`);
    }

    const approved: MultisigTransaction = {
      ...transaction,
      approvedBy: [...transaction.approvedBy, owner],
      approvalCount: transaction.approvalCount + 1,
    };
    this.transactions.set(id, approved);
    this.emit(CUSTODY_EVENTS.WALLET_APPROVAL, owner, {
      transactionId: id,
      owner,
      approvalCount: approved.approvalCount,
    } satisfies WalletApprovalPayload);

    if (approved.approvalCount === this.threshold) {
      return this.executeTransaction(owner, id);
    }
    return { transaction: approved, result: undefined };
  }

  /**
   * Forward an approved transaction. Anyone may call this.
   *
   * A reverted forward does not throw: it is reported in the result and
   * as a `wallet.execution_failure` event.
   */
  executeTransaction(caller: Address, id: number): ExecutionResult {
    const executor = this.toAddress(caller, "caller");
    const transaction = this.getTransaction(id);

    if (transaction.executed) {
      throw new WalletError("ALREADY_EXECUTED", `Transaction ${id} has already been executed`);
    }
    if (transaction.approvalCount < this.threshold) {
      throw new WalletError(
        "NOT_APPROVED",
        `Transaction ${id} has ${transaction.approvalCount} of ${this.threshold} approvals`,
      );
    }

    this.transactions.set(id, { ...transaction, executed: true });

    const result = this.chain.call({
      from: this.address,
      to: transaction.destination,
      value: transaction.value,
      payload: transaction.payload,
    });

    if (result.status === "success") {
      this.emit(CUSTODY_EVENTS.WALLET_EXECUTION, executor, {
        transactionId: id,
      } satisfies WalletExecutionPayload);
      return { transaction: this.getTransaction(id), result };
    }

    const failed: MultisigTransaction = {
      ...transaction,
      executed: false,
      failedAttempts: transaction.failedAttempts + 1,
    };
    this.transactions.set(id, failed);
    this.emit(CUSTODY_EVENTS.WALLET_EXECUTION_FAILURE, executor, {
      transactionId: id,
      reason: result.reason,
      code: result.code ?? null,
    } satisfies WalletExecutionFailurePayload);
    return { transaction: failed, result };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getTransaction(id: number): MultisigTransaction {
    const transaction = this.transactions.get(id);
    if (!transaction) {
      throw new WalletError("TRANSACTION_NOT_FOUND", `Transaction ${id} not found`);
    }
    return transaction;
  }

  /**
   * Transactions in id order. Both kinds are included by default.
   */
  listTransactions(filter: TransactionFilter = {}): readonly MultisigTransaction[] {
    const pending = filter.pending ?? true;
    const executed = filter.executed ?? true;
    return [...this.transactions.values()].filter((tx) => (tx.executed ? executed : pending));
  }

  statusOf(id: number): TransactionStatus {
    const transaction = this.getTransaction(id);
    if (transaction.executed) return "executed";
    return transaction.approvalCount >= this.threshold ? "approved" : "pending";
  }

  isApprovedBy(id: number, owner: Address): boolean {
    const account = canonicalAddress(owner);
    return account !== undefined && this.getTransaction(id).approvedBy.includes(account);
  }

  getApprovals(id: number): readonly Address[] {
    return this.getTransaction(id).approvedBy;
  }

  getOwners(): readonly Address[] {
    return [...this.owners];
  }

  isOwner(account: Address): boolean {
    const address = canonicalAddress(account);
    return address !== undefined && this.owners.has(address);
  }

  get required(): number {
    return this.threshold;
  }

  get transactionCount(): number {
    return this.nextId;
  }

  /** Native value committed to transactions that have not run yet. */
  reservedValue(): bigint {
    let reserved = 0n;
    for (const transaction of this.transactions.values()) {
      if (!transaction.executed) reserved += transaction.value;
    }
    return reserved;
  }

  balance(): bigint {
    return this.chain.nativeBalanceOf(this.address);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Substrate
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Plain transfers are deposits; the wallet exposes no callable methods.
   */
  override receiveCall(context: CallContext): void {
    if (context.payload.length > 0) {
      throw new WalletError("UNKNOWN_CALL", `The wallet accepts no call data (from ${context.sender})`);
    }
    super.receiveCall(context);
  }

  protected override receiveValue(context: CallContext): void {
    if (context.value > 0n) {
      this.recordDeposit(context.sender, context.value);
    }
  }

  protected override routes(): CallRoutes {
    return {};
  }

  override checkpoint(): () => void {
    const transactions = new Map(this.transactions);
    const nextId = this.nextId;
    return () => {
      this.transactions = transactions;
      this.nextId = nextId;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private propose(caller: Address, destination: Address, value: bigint, payload: Payload): number {
    const id = this.nextId;
    const transaction: MultisigTransaction = {
      id,
      destination,
      value,
      payload: payload.slice(),
      executed: false,
      approvalCount: 0,
      approvedBy: [],
      submittedBy: caller,
      failedAttempts: 0,
    };

    this.transactions.set(id, transaction);
    this.nextId = id + 1;
    this.emit(CUSTODY_EVENTS.WALLET_SUBMISSION, caller, {
      transactionId: id,
      destination: transaction.destination,
      value: value.toString(),
      payload: payloadToHex(transaction.payload),
    } satisfies WalletSubmissionPayload);

    this.approve(caller, id);
    return id;
  }

  private recordDeposit(sender: Address, amount: bigint): void {
    this.emit(CUSTODY_EVENTS.WALLET_DEPOSIT, sender, {
      sender,
      amount: amount.toString(),
    } satisfies WalletDepositPayload);
  }

  /** The caller as a stored owner address. */
  private ownerOf(caller: Address): Address {
    const owner = canonicalAddress(caller);
    if (owner === undefined || !this.owners.has(owner)) {
      throw new WalletError("NOT_OWNER", `${caller} is not an owner`);
    }
    return owner;
  }

  private toAddress(value: string, role: string): Address {
    const address = canonicalAddress(value);
    if (address === undefined) {
      throw new WalletError("INVALID_ADDRESS", `Invalid ${role}: "${value}"`);
    }
    return address;
  }
}
