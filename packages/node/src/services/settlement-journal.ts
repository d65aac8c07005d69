/**
 * Settlement journal — the service's TransferAgent.
 *
 * The custody core never moves assets itself; it asks a TransferAgent.
 * This one records each pull and push as a settlement instruction on
 * the "settlement" stream, for an external settler to execute.
 *
 * A halted journal refuses every transfer, which fails the custody
 * operation and reverts its balance change.
 */

import { randomUUID } from "node:crypto";
import type { TransferAgent } from "@tallyvault/custody";
import type { EventStore } from "@tallyvault/event-store";
import { SETTLEMENT_STREAM } from "@tallyvault/event-store";
import type { AssetId, DomainEvent, Principal } from "@tallyvault/types";

export const SETTLEMENT_EVENTS = {
  PULL_REQUESTED: "settlement.pull_requested",
  PUSH_REQUESTED: "settlement.push_requested",
} as const;

export type SettlementEventType = (typeof SETTLEMENT_EVENTS)[keyof typeof SETTLEMENT_EVENTS];

export interface SettlementJournalOptions {
  readonly idGenerator?: () => string;
  readonly clock?: () => string;
}

export class SettlementJournal implements TransferAgent {
  private readonly _store: EventStore;
  private readonly _nextId: () => string;
  private readonly _now: () => string;

  constructor(store: EventStore, options: SettlementJournalOptions = {}) {
    this._store = store;
    this._nextId = options.idGenerator ?? randomUUID;
    this._now = options.clock ?? (() => new Date().toISOString());
  }

  async pullFrom(user: Principal, assetId: AssetId, amount: bigint): Promise<boolean> {
    return this._record(SETTLEMENT_EVENTS.PULL_REQUESTED, user, assetId, amount);
  }

  async pushTo(user: Principal, assetId: AssetId, amount: bigint): Promise<boolean> {
    return this._record(SETTLEMENT_EVENTS.PUSH_REQUESTED, user, assetId, amount);
  }

  /** Settlement instructions in the order they were recorded. */
  instructions(): readonly DomainEvent[] {
    return this._store.read(SETTLEMENT_STREAM).map((stored) => stored.event);
  }

  private _record(
    type: SettlementEventType,
    user: Principal,
    assetId: AssetId,
    amount: bigint,
  ): boolean {
    if (this._store.halted) {
      return false;
    }
    const instructionId = this._nextId();
    this._store.append(SETTLEMENT_STREAM, [
      {
        type,
        metadata: {
          eventId: instructionId,
          timestamp: this._now(),
          actor: user,
          correlationId: instructionId,
          source: "settlement",
        },
        payload: { user, assetId, amount: amount.toString() },
      },
    ]);
    return true;
  }
}
