/**
 * Property-based tests for @tallyvault/custody
 *
 * For any sequence of deposits and withdrawals, with transfers that may
 * succeed, be refused or throw:
 *
 * 1. Held amount of each asset equals the sum of user balances
 * 2. Balances are never negative
 * 3. Each user's balance equals committed deposits minus committed withdrawals
 * 4. Total value never exceeds the capacity limit
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { CustodyError } from "../src/types.js";
import {
  ALICE,
  BOB,
  NATIVE,
  USDC,
  WBTC,
  common,
  createHarness,
} from "./fakes.js";
import type { TransferOutcome } from "./fakes.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbUser = fc.constantFrom(ALICE, BOB, "carol");
const arbAsset = fc.constantFrom(NATIVE, USDC, WBTC);
const arbOutcome = fc.constantFrom<TransferOutcome>("ok", "ok", "ok", "refuse", "throw");

/** Amounts between 1 base unit and 1e21. */
const arbAmount = fc.bigInt({ min: 1n, max: 10n ** 21n });

const arbOp = fc.record({
  kind: fc.constantFrom("deposit" as const, "withdraw" as const),
  user: arbUser,
  asset: arbAsset,
  amount: arbAmount,
  outcome: arbOutcome,
});

// =============================================================================
// Properties
// =============================================================================

describe("custody invariants", () => {
  it("conserves balances across any operation sequence", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOp, { maxLength: 40 }), async (ops) => {
        const h = createHarness();
        h.custody.setCapacityLimit("admin", common(250_000n));
        const expected = new Map<string, bigint>();

        for (const op of ops) {
          h.transfers.outcome = op.outcome;
          const key = `${op.user}|${op.asset}`;
          try {
            if (op.kind === "deposit") {
              await h.custody.deposit(op.user, op.asset, op.amount);
              expected.set(key, (expected.get(key) ?? 0n) + op.amount);
            } else {
              await h.custody.withdraw(op.user, op.asset, op.amount);
              expected.set(key, (expected.get(key) ?? 0n) - op.amount);
            }
          } catch (error) {
            if (!(error instanceof CustodyError)) {
              throw error;
            }
          }
        }

        for (const asset of [NATIVE, USDC, WBTC]) {
          let sum = 0n;
          for (const user of [ALICE, BOB, "carol"]) {
            const balance = h.custody.balanceOf(user, asset);
            expect(balance >= 0n).toBe(true);
            expect(balance).toBe(expected.get(`${user}|${asset}`) ?? 0n);
            sum += balance;
          }
          expect(h.custody.heldAmount(asset)).toBe(sum);
        }

        expect((await h.custody.totalValue()) <= common(250_000n)).toBe(true);
      }),
      { numRuns: 100 },
    );
  });

  it("counts only committed operations", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOutcome, { minLength: 1, maxLength: 20 }), async (outcomes) => {
        const h = createHarness();
        let committed = 0;

        for (const outcome of outcomes) {
          h.transfers.outcome = outcome;
          try {
            await h.custody.deposit(ALICE, USDC, 1n);
            committed++;
          } catch (error) {
            expect(error).toBeInstanceOf(CustodyError);
          }
        }

        expect(h.custody.countersOf(ALICE).deposits).toBe(committed);
        expect(h.sink.events).toHaveLength(committed);
      }),
    );
  });
});
