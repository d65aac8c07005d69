/**
 * Tests for the LedgerStore.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { LedgerStore } from "../src/ledger-store.js";
import { ALICE, BOB, NATIVE, USDC, codeOf } from "./fakes.js";

describe("LedgerStore", () => {
  let store: LedgerStore;

  beforeEach(() => {
    store = new LedgerStore();
  });

  it("starts empty", () => {
    expect(store.balanceOf(ALICE, USDC)).toBe(0n);
    expect(store.heldAmount(USDC)).toBe(0n);
    expect(store.countersOf(ALICE)).toEqual({ deposits: 0, withdrawals: 0 });
    expect(store.balancesOf(ALICE)).toEqual([]);
  });

  it("credits balances, held totals and deposit counters", () => {
    const change = store.credit(ALICE, USDC, 100n);
    store.credit(BOB, USDC, 50n);

    expect(change).toEqual({ user: ALICE, assetId: USDC, direction: "credit", amount: 100n, balanceAfter: 100n });
    expect(store.heldAmount(USDC)).toBe(150n);
    expect(store.countersOf(ALICE)).toEqual({ deposits: 1, withdrawals: 0 });
  });

  it("debits and counts withdrawals", () => {
    store.credit(ALICE, USDC, 100n);
    const change = store.debit(ALICE, USDC, 30n);

    expect(change.balanceAfter).toBe(70n);
    expect(store.heldAmount(USDC)).toBe(70n);
    expect(store.countersOf(ALICE)).toEqual({ deposits: 1, withdrawals: 1 });
  });

  it("rejects overdrafts without changing state", () => {
    store.credit(ALICE, USDC, 10n);
    expect(codeOf(() => store.debit(ALICE, USDC, 11n))).toBe("INSUFFICIENT_BALANCE");
    expect(store.balanceOf(ALICE, USDC)).toBe(10n);
    expect(store.countersOf(ALICE).withdrawals).toBe(0);
  });

  it("rejects non-positive amounts", () => {
    expect(codeOf(() => store.credit(ALICE, USDC, 0n))).toBe("NOTHING_TO_DEPOSIT");
    expect(codeOf(() => store.debit(ALICE, USDC, 0n))).toBe("NOTHING_TO_WITHDRAW");
  });

  it("reverts a credit including its counter", () => {
    const change = store.credit(ALICE, USDC, 40n);
    store.revert(change);

    expect(store.balanceOf(ALICE, USDC)).toBe(0n);
    expect(store.heldAmount(USDC)).toBe(0n);
    expect(store.countersOf(ALICE)).toEqual({ deposits: 0, withdrawals: 0 });
  });

  it("reverts a debit by inverse delta, preserving interleaved changes", () => {
    store.credit(ALICE, USDC, 100n);
    const change = store.debit(ALICE, USDC, 60n);
    store.credit(ALICE, USDC, 5n);
    store.revert(change);

    expect(store.balanceOf(ALICE, USDC)).toBe(105n);
    expect(store.heldAmount(USDC)).toBe(105n);
    expect(store.countersOf(ALICE)).toEqual({ deposits: 2, withdrawals: 0 });
  });

  it("refuses to revert a credit that was already spent", () => {
    const change = store.credit(ALICE, USDC, 10n);
    store.debit(ALICE, USDC, 10n);
    expect(codeOf(() => store.revert(change))).toBe("INSUFFICIENT_BALANCE");
  });

  it("lists nonzero balances in first-credited order", () => {
    store.credit(ALICE, NATIVE, 1n);
    store.credit(ALICE, USDC, 2n);
    store.debit(ALICE, NATIVE, 1n);

    expect(store.balancesOf(ALICE)).toEqual([{ assetId: USDC, amount: 2n }]);
  });

  it("loads balances and counters for restore", () => {
    store.load(ALICE, USDC, 7n);
    store.load(BOB, USDC, 3n);
    store.load(ALICE, USDC, 9n);
    store.loadCounters(ALICE, { deposits: 4, withdrawals: 1 });

    expect(store.heldAmount(USDC)).toBe(12n);
    expect(store.countersOf(ALICE)).toEqual({ deposits: 4, withdrawals: 1 });
    expect(store.users()).toEqual([ALICE, BOB]);
    expect(codeOf(() => store.load(ALICE, USDC, -1n))).toBe("INVALID_AMOUNT");
  });
});
