/**
 * @tallyvault/event-store — In-memory EventStore.
 *
 * Holds the log in arrays for the life of the process. Used by the
 * node service and by tests.
 *
 * Properties:
 * - O(1) amortized append
 * - O(n) reads over the returned window
 * - Synchronous subscriber dispatch, after the batch is stored
 */

import { isDomainEvent } from "@tallyvault/types";
import type { DomainEvent } from "@tallyvault/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of appendedAt timestamps. Default: current ISO time */
  readonly clock?: () => string;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _log: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _now: () => string;
  private _lastHash: string = GENESIS_HASH;
  private _haltReason: string | undefined;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.clock ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
    if (this._haltReason !== undefined) {
      throw new EventStoreError("STORE_HALTED", `Event store is halted: ${this._haltReason}`, streamId);
    }
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    const malformed = events.findIndex((event) => !isDomainEvent(event));
    if (malformed !== -1) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Event ${String(malformed)} of the batch is not a well-formed domain event`,
        streamId,
      );
    }

    const current = this.streamVersion(streamId);
    this._checkExpected(streamId, current, options?.expectedVersion);

    const appendedAt = this._now();
    const batch: StoredEvent[] = [];
    for (const [i, event] of events.entries()) {
      const base: UnhashedEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: current + i + 1,
        globalPosition: this._log.length + i + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(base, previousHash);
      this._lastHash = hash;
      batch.push({ ...base, hash, previousHash });
    }

    const stream = this._streams.get(streamId) ?? [];
    stream.push(...batch);
    this._streams.set(streamId, stream);
    this._log.push(...batch);

    for (const handler of this._subscribers) {
      for (const stored of batch) {
        handler(stored);
      }
    }

    return {
      streamId,
      fromVersion: current + 1,
      toVersion: current + batch.length,
      count: batch.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly StoredEvent[] {
    return [...(this._streams.get(streamId) ?? [])];
  }

  readAll(options: ReadAllOptions = {}): readonly StoredEvent[] {
    const direction = options.direction ?? "forward";
    const from = options.fromPosition ?? (direction === "forward" ? 1 : this._log.length);
    if (!Number.isInteger(from) || from < 0) {
      throw new EventStoreError("INVALID_POSITION", `fromPosition must be a non-negative integer, got ${String(from)}`);
    }

    let result =
      direction === "forward"
        ? this._log.filter((e) => e.globalPosition >= from)
        : this._log.filter((e) => e.globalPosition <= from).reverse();

    const types = options.types;
    if (types !== undefined && types.length > 0) {
      result = result.filter((e) => types.includes(e.event.type));
    }
    if (options.maxCount !== undefined && options.maxCount >= 0) {
      result = result.slice(0, options.maxCount);
    }
    return result;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Halt ───────────────────────────────────────────────────────────

  halt(reason: string): void {
    this._haltReason = reason;
  }

  get halted(): boolean {
    return this._haltReason !== undefined;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _checkExpected(
    streamId: string,
    current: number,
    expected: AppendOptions["expectedVersion"],
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream" && current !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${String(current)}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && current !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(current)}, expected ${String(expected)}`,
        streamId,
      );
    }
  }
}
