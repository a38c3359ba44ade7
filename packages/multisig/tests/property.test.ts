/**
 * Property-Based Tests for @phasevault/multisig
 *
 * 1. Threshold exactness: a transaction executes on exactly the
 *    `required`-th distinct approval, whatever the approval order
 * 2. Value forwarded exactly once
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address } from "@phasevault/types";
import { Chain, ManualClock, EMPTY_PAYLOAD } from "@phasevault/chain";
import { MultisigWallet } from "../src/wallet.js";
import { WalletError } from "../src/types.js";

const DEPLOYER: Address = "0x9999999999999999999999999999999999999999";
const RECIPIENT: Address = "0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee";

function ownerAddress(index: number): Address {
  return `0x${String(index + 1).repeat(40)}`;
}

const arbSetup = fc.integer({ min: 1, max: 5 }).chain((ownerCount) =>
  fc.record({
    ownerCount: fc.constant(ownerCount),
    required: fc.integer({ min: 1, max: ownerCount }),
    order: fc.shuffledSubarray(
      Array.from({ length: ownerCount }, (_, i) => i),
      { minLength: ownerCount, maxLength: ownerCount },
    ),
    value: fc.bigInt({ min: 0n, max: 1_000n }),
  }),
);

describe("MultisigWallet properties", () => {
  it("executes exactly when the required-th approval lands", () => {
    fc.assert(
      fc.property(arbSetup, ({ ownerCount, required, order, value }) => {
        const owners = Array.from({ length: ownerCount }, (_, i) => ownerAddress(i));
        const chain = new Chain({ clock: new ManualClock() });
        const wallet = chain.deploy(DEPLOYER, (ctx, address) => new MultisigWallet(ctx, address, { owners, required }));

        const [first, ...rest] = order.map((index) => owners[index] ?? DEPLOYER);
        if (first === undefined) return;
        chain.fund(first, value);

        const id = chain.transact(() => wallet.submitTransaction(first, RECIPIENT, value, EMPTY_PAYLOAD, value));
        let approvals = 1;
        expect(wallet.getTransaction(id).executed).toBe(approvals >= required);

        for (const owner of rest) {
          if (approvals >= required) {
            expect(() => wallet.approveTransaction(owner, id)).toThrow(WalletError);
            continue;
          }
          chain.transact(() => wallet.approveTransaction(owner, id));
          approvals += 1;
          expect(wallet.getTransaction(id).executed).toBe(approvals >= required);
        }

        expect(wallet.getTransaction(id)).toMatchObject({ executed: true, approvalCount: required });
        expect(chain.nativeBalanceOf(RECIPIENT)).toBe(value);
        expect(wallet.balance()).toBe(0n);
      }),
    );
  });
});
