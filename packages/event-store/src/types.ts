/**
 * @tallyvault/event-store — Core types.
 *
 * The append-only log behind custody notifications and the settlement
 * journal.
 *
 * Rules:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - Every stored event is hash-linked to the one before it
 * - A halted log refuses appends but still serves reads
 */

import type { DomainEvent } from "@tallyvault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A DomainEvent as persisted, with its position and chain link.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** 1-based position within the stream */
  readonly version: number;

  /** 1-based position across all streams */
  readonly globalPosition: number;

  /** Store-level timestamp, distinct from event.metadata.timestamp */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event plus previousHash */
  readonly hash: string;

  /** Hash of the preceding event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

/** The hashed fields of a StoredEvent, before the hash is known. */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

/**
 * - number: the stream must be at exactly this version
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

/**
 * Window over the whole log, in global position order.
 */
export interface ReadAllOptions {
  /** Inclusive start position. Default: 1 forward, head backward */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
  /** Only events of these types */
  readonly types?: readonly string[];
}

// =============================================================================
// Subscriptions
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Position of the last event checked, 0 for an empty log */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append events to a stream as one batch; all or nothing.
   * Throws EventStoreError on a version conflict, a malformed event,
   * or when halted.
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream in version order. Empty for unknown streams. */
  read(streamId: string): readonly StoredEvent[];

  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /**
   * Called synchronously for every event appended after subscribing.
   * Handler errors propagate to the appender.
   */
  subscribe(handler: EventHandler): Subscription;

  streamVersion(streamId: string): number;

  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;

  /** Refuse further appends. */
  halt(reason: string): void;

  readonly halted: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_EVENT"
  | "INVALID_POSITION"
  | "STORE_HALTED";

export class EventStoreError extends Error {
  public readonly code: EventStoreErrorCode;
  public readonly streamId: string | undefined;

  constructor(code: EventStoreErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
    this.streamId = streamId;
  }
}
