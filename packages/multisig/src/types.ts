/**
 * @phasevault/multisig — Types for the threshold wallet.
 *
 * Rules:
 * - All types are readonly; transactions are replaced, never mutated
 * - Transaction ids are dense: 0, 1, 2, ... in submission order
 */

import type { Address, CallResult, Payload } from "@phasevault/types";

// =============================================================================
// Transactions
// =============================================================================

/**
 * Where a transaction is in its lifecycle.
 *
 * - pending: fewer approvals than the threshold
 * - approved: threshold reached, not yet executed successfully
 * - executed: forwarded successfully (terminal)
 */
export type TransactionStatus = "pending" | "approved" | "executed";

export interface MultisigTransaction {
  readonly id: number;
  readonly destination: Address;

  /** Native value forwarded with the call */
  readonly value: bigint;

  /** Call data, forwarded verbatim */
  readonly payload: Payload;

  readonly executed: boolean;
  readonly approvalCount: number;

  /** Approving owners, in approval order */
  readonly approvedBy: readonly Address[];

  readonly submittedBy: Address;

  /** Number of forwards that reverted */
  readonly failedAttempts: number;
}

export interface TransactionFilter {
  readonly pending?: boolean;
  readonly executed?: boolean;
}

export interface ExecutionResult {
  readonly transaction: MultisigTransaction;
  readonly result: CallResult;
}

export interface ApprovalResult {
  readonly transaction: MultisigTransaction;

  /** The forwarded call's outcome; undefined when the approval did not execute */
  readonly result: CallResult | undefined;
}

// =============================================================================
// Configuration
// =============================================================================

export interface MultisigWalletOptions {
  readonly owners: readonly Address[];

  /** Approvals needed before a transaction executes (1 ≤ required ≤ owners) */
  readonly required: number;
}

// =============================================================================
// Error
// =============================================================================

export type WalletErrorCode =
  | "NOT_OWNER"
  | "TRANSACTION_NOT_FOUND"
  | "ALREADY_EXECUTED"
  | "ALREADY_APPROVED"
  | "NOT_APPROVED"
  | "VALUE_MISMATCH"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_OWNERS"
  | "INVALID_THRESHOLD"
  | "UNKNOWN_CALL"
  | "INVALID_ADDRESS";

export class WalletError extends Error {
  public readonly code: WalletErrorCode;
  constructor(code: WalletErrorCode, message: string) {
    super(message);
    this.name = "WalletError";
    this.code = code;
  }
}
