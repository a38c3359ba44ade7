/**
 * @phasevault/ledger — Types for the token ledger.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint base units
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@phasevault/types";

// ─── Token Types ─────────────────────────────────────────────────────────

export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  /** Number of decimal places between base units and whole tokens. */
  readonly decimals: number;
}

export interface TokenLedgerOptions extends TokenMetadata {
  /** The only address allowed to mint. */
  readonly owner: Address;

  /** Minted to `initialHolder` at deployment. Default: 0 */
  readonly initialSupply?: bigint;

  /** Default: the owner */
  readonly initialHolder?: Address;
}

/**
 * Point-in-time view of the ledger, for read surfaces.
 */
export interface TokenSummary extends TokenMetadata {
  readonly address: Address;
  readonly owner: Address;
  readonly totalSupply: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "NOT_OWNER"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_METADATA";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
