/**
 * @tallyvault/custody — Custody facade and transaction protocol.
 *
 * Deposit:  validate → capacity check → credit → pull from user
 * Withdraw: validate → balance check → limit check → debit → push to user
 *
 * Internal state is always mutated before the external transfer is
 * attempted. A failed transfer reverts the mutation, so a failed call
 * leaves no trace in balances, counters or notifications.
 *
 * API surface:
 * - deposit() / withdraw() — the only ways value enters or leaves
 * - receiveDirect() — rejects unsolicited inbound value
 * - registerAsset(), setCapacityLimit(), setWithdrawLimit() — operator
 * - grantRole(), revokeRole() — admin
 * - balance, counter, limit and valuation queries
 * - snapshot() / fromSnapshot()
 */

import { randomUUID } from "node:crypto";
import type { AssetId, DomainEvent, PriceSourceId, Principal } from "@tallyvault/types";
import { AssetRegistry, DEFAULT_MAX_ASSETS } from "./asset-registry.js";
import type { Registration } from "./asset-registry.js";
import { LedgerStore } from "./ledger-store.js";
import { LimitGuard } from "./limit-guard.js";
import { PermissionGate } from "./permissions.js";
import { ValuationEngine } from "./valuation.js";
import { CUSTODY_EVENTS, createCustodyEvent } from "./events.js";
import type { CustodyEventPayloads, CustodyEventType } from "./events.js";
import type {
  AssetBalance,
  AssetMetadata,
  BalanceChange,
  CustodySnapshot,
  Limits,
  NotificationSink,
  OperationCounters,
  OperationKind,
  OperationReceipt,
  PriceOracle,
  Role,
  TransferAgent,
  Valuation,
} from "./types.js";
import { CustodyError } from "./types.js";

// ─── Configuration ───────────────────────────────────────────────────────

export interface CustodyNotifications {
  readonly sink: NotificationSink;
  /** Called when the sink throws. The operation stays committed. */
  readonly onError: (error: unknown, event: DomainEvent) => void;
}

export interface CustodyConfig {
  /** Receives both roles at bootstrap. Ignored when restoring a snapshot. */
  readonly deployer: Principal;
  readonly oracle: PriceOracle;
  readonly metadata: AssetMetadata;
  readonly transfers: TransferAgent;
  readonly limits: Limits;
  readonly maxAssets?: number | undefined;
  readonly commonDecimals?: number | undefined;
  readonly notifications?: CustodyNotifications | undefined;
  readonly idGenerator?: (() => string) | undefined;
  readonly clock?: (() => string) | undefined;
}

interface RestoredState {
  readonly gate: PermissionGate;
  readonly registry: AssetRegistry;
  readonly store: LedgerStore;
  readonly limits: Limits;
}

// ─── Custody ─────────────────────────────────────────────────────────────

export class Custody {
  private readonly _gate: PermissionGate;
  private readonly _registry: AssetRegistry;
  private readonly _store: LedgerStore;
  private readonly _valuation: ValuationEngine;
  private readonly _guard: LimitGuard;
  private readonly _transfers: TransferAgent;
  private readonly _notifications: CustodyNotifications | undefined;
  private readonly _nextId: () => string;
  private readonly _now: () => string;
  private _depth = 0;

  constructor(config: CustodyConfig, restored?: RestoredState) {
    this._gate = restored?.gate ?? PermissionGate.bootstrap(config.deployer);
    this._registry =
      restored?.registry ??
      new AssetRegistry(this._gate, config.maxAssets ?? DEFAULT_MAX_ASSETS);
    this._store = restored?.store ?? new LedgerStore();
    this._valuation = new ValuationEngine(
      this._registry,
      config.oracle,
      config.metadata,
      config.commonDecimals,
    );
    this._guard = new LimitGuard(
      {
        gate: this._gate,
        registry: this._registry,
        store: this._store,
        valuation: this._valuation,
      },
      restored?.limits ?? config.limits,
    );
    this._transfers = config.transfers;
    this._notifications = config.notifications;
    this._nextId = config.idGenerator ?? randomUUID;
    this._now = config.clock ?? (() => new Date().toISOString());
  }

  // ─── Transaction Protocol ────────────────────────────────────────────

  /**
   * Deposit `amount` of `assetId` for `user`.
   *
   * Throws NOTHING_TO_DEPOSIT, INVALID_AMOUNT, ASSET_NOT_REGISTERED,
   * INVALID_PRICE, CAPACITY_EXCEEDED, FAILED_TRANSFER or REENTRANT_CALL.
   */
  async deposit(user: Principal, assetId: AssetId, amount: bigint): Promise<OperationReceipt> {
    this._enter("deposit");
    try {
      // Validating
      if (amount === 0n) {
        throw new CustodyError("NOTHING_TO_DEPOSIT", "Deposit amount is zero");
      }
      this._assertPositive(amount);
      this._registry.lookup(assetId);

      // CapacityChecking
      const value = await this._guard.checkCapacity(assetId, amount);

      // Crediting (before the pull)
      const change = this._store.credit(user, assetId, amount);

      // TransferringIn
      await this._settle(change, () => this._transfers.pullFrom(user, assetId, amount));

      return this._commit("deposit", CUSTODY_EVENTS.DEPOSITED, change, value);
    } finally {
      this._exit();
    }
  }

  /**
   * Withdraw `amount` of `assetId` to `user`.
   *
   * Throws NOTHING_TO_WITHDRAW, INVALID_AMOUNT, ASSET_NOT_REGISTERED,
   * INSUFFICIENT_BALANCE, INVALID_PRICE, WITHDRAW_LIMIT_EXCEEDED,
   * FAILED_TRANSFER or REENTRANT_CALL.
   */
  async withdraw(user: Principal, assetId: AssetId, amount: bigint): Promise<OperationReceipt> {
    this._enter("withdraw");
    try {
      // Validating
      if (amount === 0n) {
        throw new CustodyError("NOTHING_TO_WITHDRAW", "Withdrawal amount is zero");
      }
      this._assertPositive(amount);
      this._registry.lookup(assetId);

      // BalanceChecking
      this._store.assertCovers(user, assetId, amount);

      // LimitChecking
      const value = await this._valuation.valueOf(assetId, amount);
      this._guard.checkWithdrawLimit(value);

      // Debiting (before the push)
      const change = this._store.debit(user, assetId, amount);

      // TransferringOut
      await this._settle(change, () => this._transfers.pushTo(user, assetId, amount));

      return this._commit("withdraw", CUSTODY_EVENTS.WITHDREW, change, value);
    } finally {
      this._exit();
    }
  }

  /**
   * Entry point for value arriving outside deposit(). Always rejects.
   */
  receiveDirect(from: Principal, assetId: AssetId, amount: bigint): never {
    throw new CustodyError(
      "INVALID_DIRECT_TRANSFER",
      `Rejected unsolicited transfer of ${amount.toString()} "${assetId}" from "${from}"; use deposit`,
    );
  }

  // ─── Administrative Surface ──────────────────────────────────────────

  registerAsset(actor: Principal, assetId: AssetId, priceSourceId: PriceSourceId): Registration {
    this._assertIdle("registerAsset");
    const registration = this._registry.register(actor, assetId, priceSourceId);
    this._emit(CUSTODY_EVENTS.ASSET_CONFIGURED, actor, this._nextId(), {
      assetId,
      priceSourceId,
      added: registration.added,
      ...(registration.previousPriceSourceId !== undefined
        ? { previousPriceSourceId: registration.previousPriceSourceId }
        : {}),
    });
    return registration;
  }

  setCapacityLimit(actor: Principal, value: bigint): void {
    this._assertIdle("setCapacityLimit");
    const previous = this._guard.setCapacityLimit(actor, value);
    this._emit(CUSTODY_EVENTS.CAPACITY_CHANGED, actor, this._nextId(), {
      previous: previous.toString(),
      current: value.toString(),
    });
  }

  setWithdrawLimit(actor: Principal, value: bigint): void {
    this._assertIdle("setWithdrawLimit");
    const previous = this._guard.setWithdrawLimit(actor, value);
    this._emit(CUSTODY_EVENTS.WITHDRAW_LIMIT_CHANGED, actor, this._nextId(), {
      previous: previous.toString(),
      current: value.toString(),
    });
  }

  grantRole(actor: Principal, role: Role, principal: Principal): boolean {
    this._assertIdle("grantRole");
    const changed = this._gate.grant(actor, role, principal);
    if (changed) {
      this._emit(CUSTODY_EVENTS.ROLE_GRANTED, actor, this._nextId(), { role, principal });
    }
    return changed;
  }

  revokeRole(actor: Principal, role: Role, principal: Principal): boolean {
    this._assertIdle("revokeRole");
    const changed = this._gate.revoke(actor, role, principal);
    if (changed) {
      this._emit(CUSTODY_EVENTS.ROLE_REVOKED, actor, this._nextId(), { role, principal });
    }
    return changed;
  }

  // ─── Query Surface ───────────────────────────────────────────────────

  balanceOf(user: Principal, assetId: AssetId): bigint {
    return this._store.balanceOf(user, assetId);
  }

  balancesOf(user: Principal): readonly AssetBalance[] {
    return this._store.balancesOf(user);
  }

  countersOf(user: Principal): OperationCounters {
    return this._store.countersOf(user);
  }

  heldAmount(assetId: AssetId): bigint {
    return this._store.heldAmount(assetId);
  }

  get capacityLimit(): bigint {
    return this._guard.capacityLimit;
  }

  get withdrawLimit(): bigint {
    return this._guard.withdrawLimit;
  }

  get commonDecimals(): number {
    return this._valuation.commonDecimals;
  }

  get maxAssets(): number {
    return this._registry.maxAssets;
  }

  /** True while a deposit or withdrawal is in flight. */
  get busy(): boolean {
    return this._depth > 0;
  }

  listAssets(): readonly { readonly assetId: AssetId; readonly priceSourceId: PriceSourceId }[] {
    return this._registry.entries();
  }

  isRegistered(assetId: AssetId): boolean {
    return this._registry.isRegistered(assetId);
  }

  valueOf(assetId: AssetId, amount: bigint): Promise<bigint> {
    return this._valuation.valueOf(assetId, amount);
  }

  quote(assetId: AssetId, amount: bigint): Promise<Valuation> {
    return this._valuation.quote(assetId, amount);
  }

  decimalsOf(assetId: AssetId): Promise<number> {
    this._registry.lookup(assetId);
    return this._valuation.decimalsOf(assetId);
  }

  totalValue(): Promise<bigint> {
    return this._guard.totalValue();
  }

  hasRole(role: Role, principal: Principal): boolean {
    return this._gate.hasRole(role, principal);
  }

  members(role: Role): readonly Principal[] {
    return this._gate.members(role);
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Serializable snapshot of roles, registry, limits, balances and counters.
   */
  snapshot(): CustodySnapshot {
    const users = this._store.users();
    return {
      version: 1,
      roles: { admin: this._gate.members("admin"), operator: this._gate.members("operator") },
      assets: this._registry.entries(),
      maxAssets: this._registry.maxAssets,
      limits: {
        capacityLimit: this._guard.capacityLimit.toString(),
        withdrawLimit: this._guard.withdrawLimit.toString(),
      },
      balances: users.flatMap((user) =>
        this._store.balancesOf(user).map(({ assetId, amount }) => ({
          user,
          assetId,
          amount: amount.toString(),
        })),
      ),
      counters: users.map((user) => ({ user, ...this._store.countersOf(user) })),
      createdAt: this._now(),
    };
  }

  /**
   * Restore a custody instance from a snapshot. Collaborators and options
   * come from `config`; roles, registry, limits and balances from the snapshot.
   */
  static fromSnapshot(snapshot: CustodySnapshot, config: CustodyConfig): Custody {
    const gate = PermissionGate.fromMembers(snapshot.roles);
    const registry = AssetRegistry.fromEntries(gate, snapshot.maxAssets, snapshot.assets);
    const store = new LedgerStore();

    for (const { user, assetId, amount } of snapshot.balances) {
      store.load(user, assetId, BigInt(amount));
    }
    for (const { user, deposits, withdrawals } of snapshot.counters) {
      store.loadCounters(user, { deposits, withdrawals });
    }

    return new Custody(config, {
      gate,
      registry,
      store,
      limits: {
        capacityLimit: BigInt(snapshot.limits.capacityLimit),
        withdrawLimit: BigInt(snapshot.limits.withdrawLimit),
      },
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _enter(operation: OperationKind): void {
    this._assertIdle(operation);
    this._depth++;
  }

  private _exit(): void {
    this._depth--;
  }

  // No mutation starts while a deposit or withdrawal awaits its transfer.
  private _assertIdle(operation: string): void {
    if (this._depth > 0) {
      throw new CustodyError(
        "REENTRANT_CALL",
        `${operation} called while another custody operation is in flight`,
      );
    }
  }

  private _assertPositive(amount: bigint): void {
    if (amount < 0n) {
      throw new CustodyError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
    }
  }

  /**
   * Run the external transfer. On failure, revert `change` and fail
   * FAILED_TRANSFER with the underlying error as cause.
   */
  private async _settle(change: BalanceChange, transfer: () => Promise<boolean>): Promise<void> {
    const direction = change.direction === "credit" ? "in" : "out";
    let ok: boolean;
    try {
      ok = await transfer();
    } catch (error) {
      this._store.revert(change);
      throw new CustodyError(
        "FAILED_TRANSFER",
        `Transfer ${direction} of ${change.amount.toString()} "${change.assetId}" for "${change.user}" threw`,
        { cause: error },
      );
    }
    if (!ok) {
      this._store.revert(change);
      throw new CustodyError(
        "FAILED_TRANSFER",
        `Transfer ${direction} of ${change.amount.toString()} "${change.assetId}" for "${change.user}" was refused`,
      );
    }
  }

  private _commit(
    kind: OperationKind,
    type: typeof CUSTODY_EVENTS.DEPOSITED | typeof CUSTODY_EVENTS.WITHDREW,
    change: BalanceChange,
    value: bigint,
  ): OperationReceipt {
    const operationId = this._nextId();
    const timestamp = this._now();

    this._emit(type, change.user, operationId, {
      user: change.user,
      assetId: change.assetId,
      amount: change.amount.toString(),
      value: value.toString(),
      balanceAfter: change.balanceAfter.toString(),
    }, timestamp);

    return {
      operationId,
      kind,
      user: change.user,
      assetId: change.assetId,
      amount: change.amount,
      value,
      balanceAfter: change.balanceAfter,
      counters: this._store.countersOf(change.user),
      timestamp,
    };
  }

  private _emit<T extends CustodyEventType>(
    type: T,
    actor: Principal,
    correlationId: string,
    payload: CustodyEventPayloads[T],
    timestamp: string = this._now(),
  ): void {
    if (this._notifications === undefined) {
      return;
    }
    const event = createCustodyEvent(type, payload, {
      eventId: this._nextId(),
      timestamp,
      actor,
      correlationId,
    });
    try {
      this._notifications.sink.emit(event);
    } catch (error) {
      this._notifications.onError(error, event);
    }
  }
}
