/**
 * @phasevault/event-store — Custody domain event definitions.
 *
 * The catalog of every event raised by the contracts on the substrate.
 *
 * Naming convention: `<source>.<action>`
 *
 * Payload rules:
 * - JSON values only (amounts are decimal strings of base units)
 * - Addresses are lower-case hex
 * - Payloads are declared as type aliases so they satisfy the
 *   `Record<string, EventValue>` shape of DomainEvent payloads
 */

import type { EventSource } from "@phasevault/types";

export const CUSTODY_EVENTS = {
  // Wallet
  WALLET_DEPOSIT: "wallet.deposit",
  WALLET_SUBMISSION: "wallet.submission",
  WALLET_APPROVAL: "wallet.approval",
  WALLET_EXECUTION: "wallet.execution",
  WALLET_EXECUTION_FAILURE: "wallet.execution_failure",

  // Vesting
  VESTING_TYPE_ADDED: "vesting.type_added",
  VESTING_SCHEDULE_CREATED: "vesting.schedule_created",
  VESTING_RELEASED: "vesting.released",
  VESTING_REVOKED: "vesting.revoked",
  VESTING_DISABLED: "vesting.disabled",
  VESTING_TOKEN_RECOVERED: "vesting.token_recovered",

  // Token
  TOKEN_TRANSFER: "token.transfer",
  TOKEN_APPROVAL: "token.approval",
} as const;

export type CustodyEventType = (typeof CUSTODY_EVENTS)[keyof typeof CUSTODY_EVENTS];

/**
 * Stream that holds every event emitted by one contract.
 */
export function contractStreamId(source: EventSource, address: string): string {
  return `${source}:${address}`;
}

// =============================================================================
// Wallet Events
// =============================================================================

export type WalletDepositPayload = {
  readonly sender: string;
  readonly amount: string;
};

export type WalletSubmissionPayload = {
  readonly transactionId: number;
  readonly destination: string;
  readonly value: string;
  /** 0x-prefixed hex of the call data */
  readonly payload: string;
};

export type WalletApprovalPayload = {
  readonly transactionId: number;
  readonly owner: string;
  readonly approvalCount: number;
};

export type WalletExecutionPayload = {
  readonly transactionId: number;
};

export type WalletExecutionFailurePayload = {
  readonly transactionId: number;
  readonly reason: string;
  readonly code: string | null;
};

// =============================================================================
// Vesting Events
// =============================================================================

export type VestingTypeAddedPayload = {
  readonly typeId: number;
  readonly phaseCount: number;
};

export type VestingScheduleCreatedPayload = {
  readonly beneficiary: string;
  readonly typeId: number;
  readonly amount: string;
  readonly startTime: number;
};

export type VestingReleasedPayload = {
  readonly beneficiary: string;
  readonly amount: string;
};

export type VestingRevokedPayload = {
  readonly beneficiary: string;
  readonly returnedAmount: string;
};

export type VestingDisabledPayload = {
  readonly beneficiary: string;
  readonly releasedAmount: string;
  readonly forfeitedAmount: string;
};

export type VestingTokenRecoveredPayload = {
  readonly token: string;
  readonly amount: string;
};

// =============================================================================
// Token Events
// =============================================================================

export type TokenTransferPayload = {
  readonly from: string;
  readonly to: string;
  readonly amount: string;
};

export type TokenApprovalPayload = {
  readonly owner: string;
  readonly spender: string;
  readonly amount: string;
};
