/**
 * @tallyvault/event-store — Append-only, hash-chained event log.
 *
 * Provides:
 * - EventStore interface
 * - InMemoryEventStore
 * - RFC 8785 + SHA-256 hash chain and its verifier
 * - StreamSink, which appends notifications to a stream
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export { StreamSink, CUSTODY_STREAM, SETTLEMENT_STREAM } from "./sink.js";
