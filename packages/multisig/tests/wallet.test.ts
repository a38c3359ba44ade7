/**
 * Tests for MultisigWallet.
 *
 * Verifies:
 * - Construction: owner set and threshold validation
 * - Submission: auto-approval, attached value, deposits
 * - Approval: threshold-triggered execution, duplicate approvals
 * - Execution: failed forwards stay retryable, re-entrancy guard
 * - Withdrawals against reserved value
 * - Forwarded token operations (mint, burnFrom)
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address, CallContext, EventSource } from "@phasevault/types";
import { Chain, Contract, ManualClock, EMPTY_PAYLOAD, encodeCall, type CallRoutes } from "@phasevault/chain";
import { TokenLedger } from "@phasevault/ledger";
import { MultisigWallet } from "../src/wallet.js";
import { WalletError, type MultisigWalletOptions } from "../src/types.js";

// =============================================================================
// Fixtures
// =============================================================================

const OWNER_1: Address = "0x1111111111111111111111111111111111111111";
const OWNER_2: Address = "0x2222222222222222222222222222222222222222";
const OWNER_3: Address = "0x3333333333333333333333333333333333333333";
const ADDR_4: Address = "0x4444444444444444444444444444444444444444";
const DEPLOYER: Address = "0x9999999999999999999999999999999999999999";

const ONE_ETH = 10n ** 18n;

/** Rejects every call. */
class Reverter extends Contract {
  override readonly source: EventSource = "token";

  protected override routes(): CallRoutes {
    return {};
  }

  protected override receiveValue(): void {
    throw new Error("always reverts");
  }

  override checkpoint(): () => void {
    return () => undefined;
  }
}

/** Tries to execute a wallet transaction again while receiving its value. */
class Reentrant extends Contract {
  override readonly source: EventSource = "token";
  wallet: MultisigWallet | undefined;
  transactionId = 0;
  attempts: string[] = [];

  protected override routes(): CallRoutes {
    return {};
  }

  protected override receiveValue(context: CallContext): void {
    try {
      this.wallet?.executeTransaction(this.address, this.transactionId);
      this.attempts.push("executed");
    } catch (error) {
      this.attempts.push(error instanceof WalletError ? error.code : `unexpected from ${context.sender}`);
    }
  }

  override checkpoint(): () => void {
    const attempts = [...this.attempts];
    return () => {
      this.attempts = attempts;
    };
  }
}

let chain: Chain;
let wallet: MultisigWallet;

function deployWallet(options: MultisigWalletOptions): MultisigWallet {
  return chain.deploy(DEPLOYER, (ctx, address) => new MultisigWallet(ctx, address, options));
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}

function walletEventTypes(): string[] {
  return chain.events.read(`wallet:${wallet.address}`).map((stored) => stored.event.type);
}

beforeEach(() => {
  chain = new Chain({ clock: new ManualClock(1_700_000_000) });
  chain.fund(OWNER_1, 10n * ONE_ETH);
  wallet = deployWallet({ owners: [OWNER_1, OWNER_2, OWNER_3], required: 2 });
});

// =============================================================================
// Construction
// =============================================================================

describe("construction", () => {
  it("exposes owners and threshold", () => {
    expect(wallet.getOwners()).toEqual([OWNER_1, OWNER_2, OWNER_3]);
    expect(wallet.required).toBe(2);
    expect(wallet.isOwner(OWNER_2)).toBe(true);
    expect(wallet.isOwner(ADDR_4)).toBe(false);
    expect(wallet.transactionCount).toBe(0);
  });

  it("lower-cases owner addresses", () => {
    const mixed = deployWallet({ owners: ["0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA"], required: 1 });
    expect(mixed.getOwners()).toEqual(["0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa"]);
  });

  it("rejects empty, duplicate and zero-address owner sets", () => {
    expect(thrownBy(() => deployWallet({ owners: [], required: 1 }))).toMatchObject({ code: "INVALID_OWNERS" });
    expect(
      thrownBy(() => deployWallet({ owners: [OWNER_1, OWNER_1], required: 1 })),
    ).toMatchObject({ code: "INVALID_OWNERS" });
    expect(
      thrownBy(() =>
        deployWallet({ owners: [OWNER_1, "0x0000000000000000000000000000000000000000"], required: 1 }),
      ),
    ).toMatchObject({ code: "INVALID_OWNERS" });
  });

  it("rejects out-of-range thresholds", () => {
    for (const required of [0, 4, 1.5]) {
      expect(
        thrownBy(() => deployWallet({ owners: [OWNER_1, OWNER_2, OWNER_3], required })),
      ).toMatchObject({ code: "INVALID_THRESHOLD" });
    }
  });
});

// =============================================================================
// Submit → approve → execute
// =============================================================================

describe("native transfer through the wallet", () => {
  it("executes when the second owner approves, and only once", () => {
    const id = chain.transact(() =>
      wallet.submitTransaction(OWNER_1, ADDR_4, ONE_ETH, EMPTY_PAYLOAD, ONE_ETH),
    );

    expect(id).toBe(0);
    expect(wallet.getTransaction(id)).toMatchObject({ approvalCount: 1, executed: false });
    expect(wallet.statusOf(id)).toBe("pending");
    expect(wallet.balance()).toBe(ONE_ETH);
    expect(wallet.reservedValue()).toBe(ONE_ETH);

    const approved = chain.transact(() => wallet.approveTransaction(OWNER_2, id));

    expect(approved).toMatchObject({ approvalCount: 2, executed: true, approvedBy: [OWNER_1, OWNER_2] });
    expect(chain.nativeBalanceOf(ADDR_4)).toBe(ONE_ETH);
    expect(wallet.balance()).toBe(0n);
    expect(wallet.reservedValue()).toBe(0n);
    expect(wallet.statusOf(id)).toBe("executed");

    expect(thrownBy(() => wallet.approveTransaction(OWNER_3, id))).toMatchObject({ code: "ALREADY_EXECUTED" });
    expect(wallet.getTransaction(id).approvalCount).toBe(2);

    expect(walletEventTypes()).toEqual([
      "wallet.submission",
      "wallet.approval",
      "wallet.approval",
      "wallet.execution",
    ]);
  });

  it("requires the full value to be attached", () => {
    expect(
      thrownBy(() => wallet.submitTransaction(OWNER_1, ADDR_4, ONE_ETH, EMPTY_PAYLOAD, ONE_ETH - 1n)),
    ).toMatchObject({ code: "VALUE_MISMATCH" });
    expect(wallet.transactionCount).toBe(0);
    expect(chain.nativeBalanceOf(OWNER_1)).toBe(10n * ONE_ETH);
  });

  it("rejects attaching more than the caller holds", () => {
    expect(
      thrownBy(() => wallet.submitTransaction(OWNER_2, ADDR_4, ONE_ETH, EMPTY_PAYLOAD, ONE_ETH)),
    ).toMatchObject({ code: "INSUFFICIENT_BALANCE" });
  });

  it("keeps value attached to a zero-value proposal as a deposit", () => {
    chain.transact(() => wallet.submitTransaction(OWNER_1, ADDR_4, 0n, EMPTY_PAYLOAD, 3n));

    expect(wallet.balance()).toBe(3n);
    expect(wallet.reservedValue()).toBe(0n);
    expect(walletEventTypes()).toEqual(["wallet.deposit", "wallet.submission", "wallet.approval"]);
  });

  it("rejects malformed destinations", () => {
    expect(
      thrownBy(() => wallet.submitTransaction(OWNER_1, "0x1234", 0n, EMPTY_PAYLOAD)),
    ).toMatchObject({ code: "INVALID_ADDRESS" });
  });

  it("executes at submission when one approval suffices", () => {
    const solo = deployWallet({ owners: [OWNER_1], required: 1 });
    chain.transact(() => solo.submitTransaction(OWNER_1, ADDR_4, 5n, EMPTY_PAYLOAD, 5n));

    expect(solo.getTransaction(0).executed).toBe(true);
    expect(chain.nativeBalanceOf(ADDR_4)).toBe(5n);
  });
});

// =============================================================================
// Authorization & preconditions
// =============================================================================

describe("authorization", () => {
  it("rejects non-owners", () => {
    expect(
      thrownBy(() => wallet.submitTransaction(ADDR_4, ADDR_4, 0n, EMPTY_PAYLOAD)),
    ).toMatchObject({ code: "NOT_OWNER" });

    const id = wallet.submitTransaction(OWNER_1, ADDR_4, 0n, EMPTY_PAYLOAD);
    const error = thrownBy(() => wallet.approveTransaction(ADDR_4, id));
    expect(error).toBeInstanceOf(WalletError);
    expect(error).toMatchObject({ code: "NOT_OWNER" });
  });

  it("rejects a second approval from the same owner without changing state", () => {
    const id = wallet.submitTransaction(OWNER_1, ADDR_4, 0n, EMPTY_PAYLOAD);

    expect(thrownBy(() => wallet.approveTransaction(OWNER_1, id))).toMatchObject({ code: "ALREADY_APPROVED" });
    expect(wallet.getApprovals(id)).toEqual([OWNER_1]);
    expect(wallet.isApprovedBy(id, OWNER_1)).toBe(true);
    expect(wallet.isApprovedBy(id, OWNER_2)).toBe(false);
  });

  it("reports unknown transactions", () => {
    expect(thrownBy(() => wallet.approveTransaction(OWNER_1, 7))).toMatchObject({ code: "TRANSACTION_NOT_FOUND" });
    expect(thrownBy(() => wallet.getTransaction(0))).toMatchObject({ code: "TRANSACTION_NOT_FOUND" });
  });

  it("refuses to execute below the threshold", () => {
    const id = wallet.submitTransaction(OWNER_1, ADDR_4, 0n, EMPTY_PAYLOAD);
    expect(thrownBy(() => wallet.executeTransaction(ADDR_4, id))).toMatchObject({ code: "NOT_APPROVED" });
  });

  it("accepts owner addresses in any letter case", () => {
    const checksummed: Address = "0xAbCdEf0123456789aBcDeF0123456789AbCdEf01";
    const upper: Address = "0xFEDCBA9876543210FEDCBA9876543210FEDCBA98";
    const mixed = deployWallet({ owners: [checksummed, upper], required: 2 });

    expect(mixed.isOwner(checksummed)).toBe(true);
    const id = mixed.submitTransaction(checksummed, ADDR_4, 0n, EMPTY_PAYLOAD);
    expect(mixed.isApprovedBy(id, checksummed)).toBe(true);
    expect(
      thrownBy(() => mixed.approveTransaction("0xabcdef0123456789abcdef0123456789abcdef01", id)),
    ).toMatchObject({ code: "ALREADY_APPROVED" });

    const executed = chain.transact(() => mixed.approveTransaction("0xfedcba9876543210fedcba9876543210fedcba98", id));
    expect(executed).toMatchObject({
      executed: true,
      approvedBy: [
        "0xabcdef0123456789abcdef0123456789abcdef01",
        "0xfedcba9876543210fedcba9876543210fedcba98",
      ],
    });
  });
});

// =============================================================================
// Failed execution
// =============================================================================

describe("forwarding to a destination that always reverts", () => {
  it("stays unexecuted across retries and never spends the reserved value", () => {
    const reverter = chain.deploy(DEPLOYER, (ctx, address) => new Reverter(ctx, address));

    const id = chain.transact(() => wallet.submitTransaction(OWNER_1, reverter.address, 5n, EMPTY_PAYLOAD, 5n));
    const afterApproval = chain.transact(() => wallet.approveTransaction(OWNER_2, id));

    expect(afterApproval).toMatchObject({ executed: false, failedAttempts: 1, approvalCount: 2 });
    expect(wallet.statusOf(id)).toBe("approved");

    for (let attempt = 0; attempt < 3; attempt++) {
      const { result, transaction } = chain.transact(() => wallet.executeTransaction(ADDR_4, id));
      expect(result).toEqual({ status: "reverted", reason: "always reverts", code: undefined });
      expect(transaction.executed).toBe(false);
    }

    expect(wallet.getTransaction(id)).toMatchObject({ executed: false, failedAttempts: 4 });
    expect(wallet.balance()).toBe(5n);
    expect(chain.nativeBalanceOf(reverter.address)).toBe(0n);
    expect(wallet.reservedValue()).toBe(5n);

    const failures = chain.events
      .read(`wallet:${wallet.address}`)
      .filter((stored) => stored.event.type === "wallet.execution_failure");
    expect(failures).toHaveLength(4);
    expect(new Set(failures.map((stored) => stored.event.metadata.eventId)).size).toBe(4);
    expect(failures[0]?.event.payload).toEqual({ transactionId: 0, reason: "always reverts", code: null });
  });

  it("reports the forwarded call's result from the approval that executes", () => {
    const reverter = chain.deploy(DEPLOYER, (ctx, address) => new Reverter(ctx, address));
    const id = chain.transact(() => wallet.submitTransaction(OWNER_1, reverter.address, 5n, EMPTY_PAYLOAD, 5n));

    const { transaction, result } = chain.transact(() => wallet.approve(OWNER_2, id));

    expect(result).toEqual({ status: "reverted", reason: "always reverts", code: undefined });
    expect(transaction).toMatchObject({ executed: false, failedAttempts: 1 });
  });

  it("reports no result for an approval below the threshold", () => {
    const strict = deployWallet({ owners: [OWNER_1, OWNER_2, OWNER_3], required: 3 });
    const id = strict.submitTransaction(OWNER_1, ADDR_4, 0n, EMPTY_PAYLOAD);

    const approval = strict.approve(OWNER_2, id);

    expect(approval.result).toBeUndefined();
    expect(approval.transaction.approvalCount).toBe(2);
  });

  it("blocks re-entrant execution of the transaction being forwarded", () => {
    const reentrant = chain.deploy(DEPLOYER, (ctx, address) => new Reentrant(ctx, address));
    reentrant.wallet = wallet;

    const id = chain.transact(() => wallet.submitTransaction(OWNER_1, reentrant.address, 2n, EMPTY_PAYLOAD, 2n));
    reentrant.transactionId = id;
    chain.transact(() => wallet.approveTransaction(OWNER_2, id));

    expect(reentrant.attempts).toEqual(["ALREADY_EXECUTED"]);
    expect(wallet.getTransaction(id).executed).toBe(true);
    expect(chain.nativeBalanceOf(reentrant.address)).toBe(2n);
  });
});

// =============================================================================
// Deposits & withdrawals
// =============================================================================

describe("deposits", () => {
  it("accepts plain transfers and logs them", () => {
    const result = chain.call({ from: OWNER_1, to: wallet.address, value: 7n, payload: EMPTY_PAYLOAD });

    expect(result).toEqual({ status: "success" });
    expect(wallet.balance()).toBe(7n);
    const [deposit] = chain.events.read(`wallet:${wallet.address}`);
    expect(deposit?.event.payload).toEqual({ sender: OWNER_1, amount: "7" });
  });

  it("rejects call data", () => {
    const result = chain.call({ from: OWNER_1, to: wallet.address, value: 7n, payload: encodeCall("anything") });

    expect(result).toMatchObject({ status: "reverted", code: "UNKNOWN_CALL" });
    expect(wallet.balance()).toBe(0n);
    expect(wallet.transactionCount).toBe(0);
  });
});

describe("submitWithdrawal", () => {
  beforeEach(() => {
    chain.call({ from: OWNER_1, to: wallet.address, value: 10n, payload: EMPTY_PAYLOAD });
  });

  it("pays out of the wallet balance once approved", () => {
    const id = chain.transact(() => wallet.submitWithdrawal(OWNER_1, ADDR_4, 4n));
    expect(wallet.reservedValue()).toBe(4n);

    chain.transact(() => wallet.approveTransaction(OWNER_3, id));
    expect(chain.nativeBalanceOf(ADDR_4)).toBe(4n);
    expect(wallet.balance()).toBe(6n);
  });

  it("refuses to reserve more than the balance", () => {
    wallet.submitWithdrawal(OWNER_1, ADDR_4, 4n);
    expect(thrownBy(() => wallet.submitWithdrawal(OWNER_2, ADDR_4, 7n))).toMatchObject({
      code: "INSUFFICIENT_BALANCE",
    });
    expect(wallet.transactionCount).toBe(1);
    expect(wallet.submitWithdrawal(OWNER_2, ADDR_4, 6n)).toBe(1);
  });

  it("rejects non-positive amounts", () => {
    expect(thrownBy(() => wallet.submitWithdrawal(OWNER_1, ADDR_4, 0n))).toMatchObject({ code: "VALUE_MISMATCH" });
  });
});

// =============================================================================
// Queries
// =============================================================================

describe("listTransactions", () => {
  it("filters by execution state", () => {
    wallet.submitTransaction(OWNER_1, ADDR_4, 0n, EMPTY_PAYLOAD);
    const second = wallet.submitTransaction(OWNER_1, ADDR_4, 0n, EMPTY_PAYLOAD);
    chain.transact(() => wallet.approveTransaction(OWNER_2, second));

    expect(wallet.listTransactions().map((tx) => tx.id)).toEqual([0, 1]);
    expect(wallet.listTransactions({ executed: false }).map((tx) => tx.id)).toEqual([0]);
    expect(wallet.listTransactions({ pending: false }).map((tx) => tx.id)).toEqual([1]);
    expect(wallet.listTransactions({ pending: false, executed: false })).toEqual([]);
  });
});

// =============================================================================
// Forwarded token operations
// =============================================================================

describe("token administration through the wallet", () => {
  let token: TokenLedger;

  beforeEach(() => {
    token = chain.deploy(DEPLOYER, (ctx, address) =>
      new TokenLedger(ctx, address, { name: "Phase", symbol: "PHS", decimals: 18, owner: wallet.address }),
    );
  });

  it("mints through an approved transaction", () => {
    const mintAmount = 1_000_000n * ONE_ETH;
    const id = wallet.submitTransaction(OWNER_1, token.address, 0n, encodeCall("mint", [ADDR_4, mintAmount]));
    chain.transact(() => wallet.approveTransaction(OWNER_2, id));

    expect(token.balanceOf(ADDR_4)).toBe(mintAmount);
  });

  it("burns through an allowance granted to the wallet", () => {
    const mintAmount = 1_000_000n * ONE_ETH;
    const burnAmount = 500_000n * ONE_ETH;

    const mintId = wallet.submitTransaction(OWNER_1, token.address, 0n, encodeCall("mint", [ADDR_4, mintAmount]));
    chain.transact(() => wallet.approveTransaction(OWNER_2, mintId));

    token.approve(ADDR_4, wallet.address, burnAmount);

    const burnId = wallet.submitTransaction(OWNER_1, token.address, 0n, encodeCall("burnFrom", [ADDR_4, burnAmount]));
    chain.transact(() => wallet.approveTransaction(OWNER_2, burnId));

    expect(token.balanceOf(ADDR_4)).toBe(mintAmount - burnAmount);
    expect(token.totalSupply).toBe(mintAmount - burnAmount);
  });

  it("records a revert when the token rejects the call", () => {
    const id = wallet.submitTransaction(OWNER_1, token.address, 0n, encodeCall("burnFrom", [ADDR_4, 1n]));
    const { executed, failedAttempts } = chain.transact(() => wallet.approveTransaction(OWNER_2, id));

    expect(executed).toBe(false);
    expect(failedAttempts).toBe(1);
    const last = chain.events.read(`wallet:${wallet.address}`).at(-1);
    expect(last?.event.payload).toMatchObject({ transactionId: id, code: "INSUFFICIENT_ALLOWANCE" });
  });
});
