/**
 * @phasevault/multisig — Threshold-approval wallet.
 *
 * Provides:
 * - MultisigWallet: submit / approve / execute state machine on the substrate
 * - Transaction and error types
 *
 * @packageDocumentation
 */

export { MultisigWallet } from "./wallet.js";

export type {
  TransactionStatus,
  MultisigTransaction,
  TransactionFilter,
  ExecutionResult,
  ApprovalResult,
  MultisigWalletOptions,
  WalletErrorCode,
} from "./types.js";
export { WalletError } from "./types.js";
