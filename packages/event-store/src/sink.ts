/**
 * @tallyvault/event-store — Stream sink.
 *
 * Appends each emitted DomainEvent to one stream. Structurally a custody
 * NotificationSink; append errors are thrown to the caller.
 */

import type { DomainEvent } from "@tallyvault/types";
import type { EventStore } from "./types.js";

export const CUSTODY_STREAM = "custody";
export const SETTLEMENT_STREAM = "settlement";

export class StreamSink {
  private readonly _store: EventStore;
  readonly streamId: string;

  constructor(store: EventStore, streamId: string = CUSTODY_STREAM) {
    this._store = store;
    this.streamId = streamId;
  }

  emit(event: DomainEvent): void {
    this._store.append(this.streamId, [event]);
  }
}
