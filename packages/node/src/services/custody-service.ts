/**
 * CustodyService — Composition root for the custody deployment.
 *
 * Deploys a token, a multisig wallet and a vesting engine on one chain.
 * The wallet owns the token (only it can mint) and administers the
 * vesting engine, so every privileged action goes through a
 * threshold-approved wallet transaction.
 *
 * Route handlers delegate to this service; they never touch contracts
 * directly. Each mutating call runs in one chain transaction, so a
 * failure leaves no trace.
 */

import type { Logger } from "pino";
import type { Address, Clock, Payload } from "@phasevault/types";
import { Chain, SystemClock } from "@phasevault/chain";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
  Subscription,
} from "@phasevault/event-store";
import { TokenLedger, type TokenMetadata, type TokenSummary } from "@phasevault/ledger";
import {
  MultisigWallet,
  type ApprovalResult,
  type ExecutionResult,
  type MultisigTransaction,
  type TransactionStatus,
} from "@phasevault/multisig";
import {
  VestingEngine,
  type VestedAmount,
  type VestingSchedule,
  type VestingType,
} from "@phasevault/vesting";

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyServiceConfig {
  readonly owners: readonly Address[];
  readonly required: number;
  readonly token: TokenMetadata;

  /** Base units minted to the wallet at deployment. Default: 0 */
  readonly initialSupply?: bigint;

  /** Address whose nonce derives the contract addresses */
  readonly deployer: Address;

  /** Default: SystemClock */
  readonly clock?: Clock;

  /** Receives every committed domain event at debug level */
  readonly logger?: Logger;
}

export interface WalletSummary {
  readonly address: Address;
  readonly owners: readonly Address[];
  readonly required: number;
  readonly balance: bigint;
  readonly reservedValue: bigint;
  readonly transactionCount: number;
}

export interface ScheduleStatus {
  readonly schedule: VestingSchedule;
  readonly amounts: VestedAmount;
  readonly vestedBps: number;
}

export interface AccountBalances {
  readonly native: bigint;
  readonly token: bigint;
  readonly vested: VestedAmount | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class CustodyService {
  readonly chain: Chain;
  readonly wallet: MultisigWallet;
  readonly token: TokenLedger;
  readonly vesting: VestingEngine;

  private readonly subscription: Subscription | undefined;
  private _ready = false;

  constructor(config: CustodyServiceConfig) {
    this.chain = new Chain({ clock: config.clock ?? new SystemClock() });

    const logger = config.logger;
    this.subscription = logger?.isLevelEnabled("debug")
      ? this.chain.events.subscribeAll((stored) => {
          logger.debug(
            {
              type: stored.event.type,
              streamId: stored.streamId,
              globalPosition: stored.globalPosition,
              actor: stored.event.metadata.actor,
              correlationId: stored.event.metadata.correlationId,
            },
            "domain event",
          );
        })
      : undefined;

    this.wallet = this.chain.deploy(config.deployer, (ctx, address) =>
      new MultisigWallet(ctx, address, { owners: config.owners, required: config.required }),
    );
    const walletAddress = this.wallet.address;
    this.token = this.chain.deploy(config.deployer, (ctx, address) =>
      new TokenLedger(ctx, address, {
        ...config.token,
        owner: walletAddress,
        initialSupply: config.initialSupply ?? 0n,
        initialHolder: walletAddress,
      }),
    );
    const tokenAddress = this.token.address;
    this.vesting = this.chain.deploy(config.deployer, (ctx, address) =>
      new VestingEngine(ctx, address, { owner: walletAddress, token: tokenAddress }),
    );

    this._ready = true;
  }

  // ─── Wallet ────────────────────────────────────────────────────────

  walletSummary(): WalletSummary {
    return {
      address: this.wallet.address,
      owners: this.wallet.getOwners(),
      required: this.wallet.required,
      balance: this.wallet.balance(),
      reservedValue: this.wallet.reservedValue(),
      transactionCount: this.wallet.transactionCount,
    };
  }

  listTransactions(status?: TransactionStatus): readonly MultisigTransaction[] {
    const all = this.wallet.listTransactions();
    return status === undefined ? all : all.filter((transaction) => this.wallet.statusOf(transaction.id) === status);
  }

  getTransaction(id: number): MultisigTransaction {
    return this.wallet.getTransaction(id);
  }

  statusOf(id: number): TransactionStatus {
    return this.wallet.statusOf(id);
  }

  submitTransaction(
    caller: Address,
    destination: Address,
    value: bigint,
    payload: Payload,
    attachedValue: bigint,
  ): MultisigTransaction {
    return this.chain.transact(() => {
      const id = this.wallet.submitTransaction(caller, destination, value, payload, attachedValue);
      return this.wallet.getTransaction(id);
    });
  }

  submitWithdrawal(caller: Address, destination: Address, amount: bigint): MultisigTransaction {
    return this.chain.transact(() => {
      const id = this.wallet.submitWithdrawal(caller, destination, amount);
      return this.wallet.getTransaction(id);
    });
  }

  approveTransaction(caller: Address, id: number): ApprovalResult {
    return this.chain.transact(() => this.wallet.approve(caller, id));
  }

  executeTransaction(caller: Address, id: number): ExecutionResult {
    return this.chain.transact(() => this.wallet.executeTransaction(caller, id));
  }

  // ─── Vesting ───────────────────────────────────────────────────────

  listVestingTypes(): readonly VestingType[] {
    return this.vesting.listVestingTypes();
  }

  getVestingType(id: number): VestingType {
    return this.vesting.getVestingType(id);
  }

  scheduleStatus(beneficiary: Address): ScheduleStatus {
    return this.chain.view(() => ({
      schedule: this.vesting.getSchedule(beneficiary),
      amounts: this.vesting.getVestedAmount(beneficiary),
      vestedBps: this.vesting.getVestedPercentage(beneficiary),
    }));
  }

  release(caller: Address): bigint {
    return this.chain.transact(() => this.vesting.release(caller));
  }

  // ─── Tokens ────────────────────────────────────────────────────────

  tokenSummary(): TokenSummary {
    return this.token.summary();
  }

  balancesOf(account: Address): AccountBalances {
    return {
      native: this.chain.nativeBalanceOf(account),
      token: this.token.balanceOf(account),
      vested: this.vesting.hasSchedule(account) ? this.vesting.getVestedAmount(account) : undefined,
    };
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.chain.events.readAll(options);
  }

  // ─── Health & Integrity ──────────────────────────────────────────

  checkIntegrity(): EventStoreIntegrityResult {
    return this.chain.events.verifyIntegrity();
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this._ready = false;
  }
}
