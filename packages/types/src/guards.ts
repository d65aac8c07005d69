/**
 * Runtime checks for values that arrive untyped: restored snapshots,
 * events handed to a store.
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

const EVENT_SOURCES: ReadonlySet<string> = new Set<EventSource>(["custody", "settlement"]);

/** A parseable ISO 8601 instant. */
export function isTimestamp(value: unknown): value is string {
  return isNonEmptyString(value) && !Number.isNaN(Date.parse(value));
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    isNonEmptyString(value.eventId) &&
    isTimestamp(value.timestamp) &&
    typeof value.actor === "string" &&
    isNonEmptyString(value.correlationId) &&
    (value.causationId === undefined || isNonEmptyString(value.causationId)) &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    isNonEmptyString(value.type) &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload) &&
    !Array.isArray(value.payload)
  );
}
