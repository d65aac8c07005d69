/**
 * CustodyService — Composition root for the HTTP service.
 *
 * Route handlers delegate to this service; they never import the
 * domain packages directly.
 *
 * Wiring:
 * - Custody core with the configured feeds as oracle and metadata
 * - SettlementJournal as the TransferAgent
 * - StreamSink on the shared event store as the notification sink
 * - One SerialExecutor in front of every mutation
 */

import { Custody } from "@tallyvault/custody";
import type {
  AssetBalance,
  CustodySnapshot,
  Limits,
  OperationCounters,
  OperationReceipt,
  Role,
  Valuation,
} from "@tallyvault/custody";
import type { Registration } from "@tallyvault/custody";
import { InMemoryEventStore, StreamSink } from "@tallyvault/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@tallyvault/event-store";
import type { FeedSource, FeedStatus } from "@tallyvault/chain-feeds";
import type { AssetId, DomainEvent, PriceSourceId, Principal } from "@tallyvault/types";
import { SerialExecutor } from "./serial-executor.js";
import { SettlementJournal } from "./settlement-journal.js";

// =============================================================================
// Configuration
// =============================================================================

/** "success", or the error code the operation failed with. */
export type OperationOutcome = string;

export interface CustodyServiceConfig {
  /** Holds both roles on a fresh deployment */
  readonly admin: Principal;
  readonly feeds: FeedSource;
  readonly limits: Limits;
  readonly maxAssets?: number | undefined;
  readonly commonDecimals?: number | undefined;
  /** Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore | undefined;
  /** Restore state instead of starting empty */
  readonly snapshot?: CustodySnapshot | undefined;
  readonly idGenerator?: (() => string) | undefined;
  readonly clock?: (() => string) | undefined;
  /** Called when a committed operation's notification cannot be stored */
  readonly onSinkError?: ((error: unknown, event: DomainEvent) => void) | undefined;
  /** Called once per mutation with its outcome */
  readonly onOperation?: ((operation: string, outcome: OperationOutcome) => void) | undefined;
}

export interface Readiness {
  readonly ready: boolean;
  readonly eventStore: {
    readonly writable: boolean;
    readonly integrity: EventStoreIntegrityResult;
  };
  readonly feeds: FeedStatus;
  readonly sinkFailures: number;
}

// =============================================================================
// Service
// =============================================================================

export class CustodyService {
  readonly custody: Custody;
  readonly eventStore: EventStore;
  readonly journal: SettlementJournal;

  private readonly _feeds: FeedSource;
  private readonly _executor = new SerialExecutor();
  private readonly _onSinkError: ((error: unknown, event: DomainEvent) => void) | undefined;
  private readonly _onOperation: ((operation: string, outcome: OperationOutcome) => void) | undefined;
  private _sinkFailures = 0;

  constructor(config: CustodyServiceConfig) {
    this.eventStore = config.eventStore ?? new InMemoryEventStore({ clock: config.clock });
    this.journal = new SettlementJournal(this.eventStore, {
      idGenerator: config.idGenerator,
      clock: config.clock,
    });
    this._feeds = config.feeds;
    this._onSinkError = config.onSinkError;
    this._onOperation = config.onOperation;

    const custodyConfig = {
      deployer: config.admin,
      oracle: config.feeds,
      metadata: config.feeds,
      transfers: this.journal,
      limits: config.limits,
      maxAssets: config.maxAssets,
      commonDecimals: config.commonDecimals,
      notifications: {
        sink: new StreamSink(this.eventStore),
        onError: (error: unknown, event: DomainEvent) => this._sinkFailed(error, event),
      },
      idGenerator: config.idGenerator,
      clock: config.clock,
    };

    this.custody =
      config.snapshot !== undefined
        ? Custody.fromSnapshot(config.snapshot, custodyConfig)
        : new Custody(custodyConfig);
  }

  // ─── Movements ─────────────────────────────────────────────────────

  deposit(user: Principal, assetId: AssetId, amount: bigint): Promise<OperationReceipt> {
    return this._mutate("deposit", () => this.custody.deposit(user, assetId, amount));
  }

  withdraw(user: Principal, assetId: AssetId, amount: bigint): Promise<OperationReceipt> {
    return this._mutate("withdraw", () => this.custody.withdraw(user, assetId, amount));
  }

  /** Always rejects with INVALID_DIRECT_TRANSFER. */
  receiveDirect(from: Principal, assetId: AssetId, amount: bigint): Promise<never> {
    return this._mutate("direct_transfer", () => this.custody.receiveDirect(from, assetId, amount));
  }

  // ─── Administration ────────────────────────────────────────────────

  registerAsset(actor: Principal, assetId: AssetId, priceSourceId: PriceSourceId): Promise<Registration> {
    return this._mutate("register_asset", () =>
      this.custody.registerAsset(actor, assetId, priceSourceId),
    );
  }

  setCapacityLimit(actor: Principal, value: bigint): Promise<void> {
    return this._mutate("set_capacity_limit", () => this.custody.setCapacityLimit(actor, value));
  }

  setWithdrawLimit(actor: Principal, value: bigint): Promise<void> {
    return this._mutate("set_withdraw_limit", () => this.custody.setWithdrawLimit(actor, value));
  }

  grantRole(actor: Principal, role: Role, principal: Principal): Promise<boolean> {
    return this._mutate("grant_role", () => this.custody.grantRole(actor, role, principal));
  }

  revokeRole(actor: Principal, role: Role, principal: Principal): Promise<boolean> {
    return this._mutate("revoke_role", () => this.custody.revokeRole(actor, role, principal));
  }

  // ─── Queries ───────────────────────────────────────────────────────

  listAssets(): readonly { readonly assetId: AssetId; readonly priceSourceId: PriceSourceId }[] {
    return this.custody.listAssets();
  }

  balanceOf(user: Principal, assetId: AssetId): bigint {
    return this.custody.balanceOf(user, assetId);
  }

  balancesOf(user: Principal): readonly AssetBalance[] {
    return this.custody.balancesOf(user);
  }

  countersOf(user: Principal): OperationCounters {
    return this.custody.countersOf(user);
  }

  /** Amount of an asset held across all users. */
  heldAmount(assetId: AssetId): bigint {
    return this.custody.heldAmount(assetId);
  }

  limits(): Limits {
    return {
      capacityLimit: this.custody.capacityLimit,
      withdrawLimit: this.custody.withdrawLimit,
    };
  }

  get commonDecimals(): number {
    return this.custody.commonDecimals;
  }

  quote(assetId: AssetId, amount: bigint): Promise<Valuation> {
    return this.custody.quote(assetId, amount);
  }

  totalValue(): Promise<bigint> {
    return this.custody.totalValue();
  }

  members(role: Role): readonly Principal[] {
    return this.custody.members(role);
  }

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  snapshot(): CustodySnapshot {
    return this.custody.snapshot();
  }

  /** Mutations queued or running. */
  get pendingOperations(): number {
    return this._executor.pending;
  }

  get sinkFailures(): number {
    return this._sinkFailures;
  }

  /** Resolves once every mutation submitted so far has settled. */
  drain(): Promise<void> {
    return this._executor.idle();
  }

  // ─── Health ────────────────────────────────────────────────────────

  async checkReadiness(): Promise<Readiness> {
    const integrity = this.eventStore.verifyIntegrity();
    const writable = !this.eventStore.halted;
    const feeds = await this._feeds.getStatus();
    return {
      ready: writable && integrity.valid && feeds.connected,
      eventStore: { writable, integrity },
      feeds,
      sinkFailures: this._sinkFailures,
    };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async _mutate<T>(operation: string, task: () => Promise<T> | T): Promise<T> {
    try {
      const result = await this._executor.run(task);
      this._onOperation?.(operation, "success");
      return result;
    } catch (error) {
      this._onOperation?.(operation, outcomeOf(error));
      throw error;
    }
  }

  private _sinkFailed(error: unknown, event: DomainEvent): void {
    this._sinkFailures++;
    this._onSinkError?.(error, event);
  }
}

function outcomeOf(error: unknown): OperationOutcome {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "error";
}
