/**
 * @tallyvault/custody — Ledger Store.
 *
 * Per-user, per-asset balances, per-asset held totals and per-user
 * operation counters. Pure state: no external effects, no async.
 *
 * Rules:
 * - Balances are never negative
 * - Held total of an asset = sum of every user's balance of that asset
 * - Every mutation returns a BalanceChange that revert() can undo
 *   while the enclosing operation is still uncommitted
 */

import type { AssetId, Principal } from "@tallyvault/types";
import type {
  AssetBalance,
  BalanceChange,
  OperationCounters,
} from "./types.js";
import { CustodyError } from "./types.js";

const NO_COUNTERS: OperationCounters = { deposits: 0, withdrawals: 0 };

export class LedgerStore {
  private readonly _balances: Map<Principal, Map<AssetId, bigint>> = new Map();
  private readonly _held: Map<AssetId, bigint> = new Map();
  private readonly _counters: Map<Principal, OperationCounters> = new Map();

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Credit `amount` to the user's balance and count one deposit.
   * Throws NOTHING_TO_DEPOSIT unless amount > 0.
   */
  credit(user: Principal, assetId: AssetId, amount: bigint): BalanceChange {
    if (amount <= 0n) {
      throw new CustodyError("NOTHING_TO_DEPOSIT", `Deposit amount must be positive, got ${amount.toString()}`);
    }

    const balanceAfter = this.balanceOf(user, assetId) + amount;
    this._write(user, assetId, balanceAfter);
    this._held.set(assetId, this.heldAmount(assetId) + amount);
    this._bump(user, 1, 0);

    return { user, assetId, direction: "credit", amount, balanceAfter };
  }

  /**
   * Debit `amount` from the user's balance and count one withdrawal.
   *
   * Throws:
   * - NOTHING_TO_WITHDRAW unless amount > 0
   * - INSUFFICIENT_BALANCE if amount exceeds the balance
   */
  debit(user: Principal, assetId: AssetId, amount: bigint): BalanceChange {
    if (amount <= 0n) {
      throw new CustodyError("NOTHING_TO_WITHDRAW", `Withdrawal amount must be positive, got ${amount.toString()}`);
    }
    this.assertCovers(user, assetId, amount);

    const balanceAfter = this.balanceOf(user, assetId) - amount;
    this._write(user, assetId, balanceAfter);
    this._held.set(assetId, this.heldAmount(assetId) - amount);
    this._bump(user, 0, 1);

    return { user, assetId, direction: "debit", amount, balanceAfter };
  }

  /**
   * Undo an uncommitted change, including its counter increment.
   *
   * Applies the inverse delta rather than restoring a saved value, so
   * changes made by other operations in between are preserved.
   */
  revert(change: BalanceChange): void {
    const { user, assetId, amount } = change;
    if (change.direction === "credit") {
      const balance = this.balanceOf(user, assetId);
      if (balance < amount) {
        throw new CustodyError(
          "INSUFFICIENT_BALANCE",
          `Cannot revert credit of ${amount.toString()} for "${user}": balance is ${balance.toString()}`,
        );
      }
      this._write(user, assetId, balance - amount);
      this._held.set(assetId, this.heldAmount(assetId) - amount);
      this._bump(user, -1, 0);
    } else {
      this._write(user, assetId, this.balanceOf(user, assetId) + amount);
      this._held.set(assetId, this.heldAmount(assetId) + amount);
      this._bump(user, 0, -1);
    }
  }

  /**
   * Throw INSUFFICIENT_BALANCE unless the user holds at least `amount`.
   */
  assertCovers(user: Principal, assetId: AssetId, amount: bigint): void {
    const balance = this.balanceOf(user, assetId);
    if (amount > balance) {
      throw new CustodyError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for "${user}" in "${assetId}": has ${balance.toString()}, needs ${amount.toString()}`,
      );
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(user: Principal, assetId: AssetId): bigint {
    return this._balances.get(user)?.get(assetId) ?? 0n;
  }

  /**
   * All nonzero balances of a user, in first-credited order.
   */
  balancesOf(user: Principal): readonly AssetBalance[] {
    const perAsset = this._balances.get(user);
    if (perAsset === undefined) {
      return [];
    }
    return [...perAsset]
      .filter(([, amount]) => amount > 0n)
      .map(([assetId, amount]) => ({ assetId, amount }));
  }

  /**
   * Total amount of an asset held for all users.
   */
  heldAmount(assetId: AssetId): bigint {
    return this._held.get(assetId) ?? 0n;
  }

  countersOf(user: Principal): OperationCounters {
    return this._counters.get(user) ?? NO_COUNTERS;
  }

  users(): readonly Principal[] {
    return [...new Set([...this._balances.keys(), ...this._counters.keys()])];
  }

  // ─── Restore ─────────────────────────────────────────────────────────

  /**
   * Load a balance verbatim (snapshot restore). Does not touch counters.
   */
  load(user: Principal, assetId: AssetId, amount: bigint): void {
    if (amount < 0n) {
      throw new CustodyError("INVALID_AMOUNT", `Restored balance must not be negative, got ${amount.toString()}`);
    }
    const previous = this.balanceOf(user, assetId);
    this._write(user, assetId, amount);
    this._held.set(assetId, this.heldAmount(assetId) - previous + amount);
  }

  loadCounters(user: Principal, counters: OperationCounters): void {
    this._counters.set(user, { ...counters });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _write(user: Principal, assetId: AssetId, amount: bigint): void {
    let perAsset = this._balances.get(user);
    if (perAsset === undefined) {
      perAsset = new Map();
      this._balances.set(user, perAsset);
    }
    perAsset.set(assetId, amount);
  }

  private _bump(user: Principal, deposits: number, withdrawals: number): void {
    const current = this.countersOf(user);
    this._counters.set(user, {
      deposits: current.deposits + deposits,
      withdrawals: current.withdrawals + withdrawals,
    });
  }
}
