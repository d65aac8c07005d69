/**
 * @tallyvault/custody — Capacity & Limit Guard.
 *
 * Owns the two limits and the mark-to-market aggregate.
 *
 * Rules:
 * - Both limits are common-denomination base units
 * - Aggregation walks the registry only, so its cost is bounded by maxAssets
 * - Values are recomputed from live feeds on every check
 * - Limit changes apply to every subsequent operation
 */

import type { AssetId, Principal } from "@tallyvault/types";
import type { AssetRegistry } from "./asset-registry.js";
import type { LedgerStore } from "./ledger-store.js";
import type { PermissionGate } from "./permissions.js";
import type { ValuationEngine } from "./valuation.js";
import type { Limits } from "./types.js";
import { CustodyError } from "./types.js";
import { assertNonNegative } from "./amount-math.js";

export interface LimitGuardDeps {
  readonly gate: PermissionGate;
  readonly registry: AssetRegistry;
  readonly store: LedgerStore;
  readonly valuation: ValuationEngine;
}

export class LimitGuard {
  private readonly _deps: LimitGuardDeps;
  private _capacityLimit: bigint;
  private _withdrawLimit: bigint;

  constructor(deps: LimitGuardDeps, limits: Limits) {
    assertNonNegative(limits.capacityLimit, "Capacity limit");
    assertNonNegative(limits.withdrawLimit, "Withdraw limit");
    this._deps = deps;
    this._capacityLimit = limits.capacityLimit;
    this._withdrawLimit = limits.withdrawLimit;
  }

  get capacityLimit(): bigint {
    return this._capacityLimit;
  }

  get withdrawLimit(): bigint {
    return this._withdrawLimit;
  }

  limits(): Limits {
    return { capacityLimit: this._capacityLimit, withdrawLimit: this._withdrawLimit };
  }

  // ─── Limit management (operator) ────────────────────────────────────

  /**
   * Returns the previous limit.
   */
  setCapacityLimit(actor: Principal, value: bigint): bigint {
    this._deps.gate.require("operator", actor);
    assertNonNegative(value, "Capacity limit");
    const previous = this._capacityLimit;
    this._capacityLimit = value;
    return previous;
  }

  /**
   * Returns the previous limit.
   */
  setWithdrawLimit(actor: Principal, value: bigint): bigint {
    this._deps.gate.require("operator", actor);
    assertNonNegative(value, "Withdraw limit");
    const previous = this._withdrawLimit;
    this._withdrawLimit = value;
    return previous;
  }

  // ─── Checks ─────────────────────────────────────────────────────────

  /**
   * Current value of everything held, summed over registered assets
   * with a nonzero held amount.
   */
  async totalValue(): Promise<bigint> {
    const { registry, store, valuation } = this._deps;
    let total = 0n;
    for (const assetId of registry.listRegistered()) {
      const held = store.heldAmount(assetId);
      if (held === 0n) {
        continue;
      }
      total += await valuation.valueOf(assetId, held);
    }
    return total;
  }

  /**
   * Fail CAPACITY_EXCEEDED if holdings plus the incoming amount would be
   * worth more than the capacity limit. Returns the incoming value.
   */
  async checkCapacity(incomingAssetId: AssetId, incomingAmount: bigint): Promise<bigint> {
    const incoming = await this._deps.valuation.valueOf(incomingAssetId, incomingAmount);
    const total = (await this.totalValue()) + incoming;

    if (total > this._capacityLimit) {
      throw new CustodyError(
        "CAPACITY_EXCEEDED",
        `Aggregate value ${total.toString()} would exceed capacity ${this._capacityLimit.toString()}`,
      );
    }
    return incoming;
  }

  /**
   * Fail WITHDRAW_LIMIT_EXCEEDED if a single withdrawal is worth more
   * than the withdraw limit.
   */
  checkWithdrawLimit(value: bigint): void {
    if (value > this._withdrawLimit) {
      throw new CustodyError(
        "WITHDRAW_LIMIT_EXCEEDED",
        `Withdrawal value ${value.toString()} exceeds limit ${this._withdrawLimit.toString()}`,
      );
    }
  }
}
