/**
 * Domain events.
 *
 * Custody notifications and settlement instructions share one envelope
 * so a single hash-chained log can hold both. Events are never edited
 * after they are written. Amounts in payloads are decimal strings.
 */

export type EventSource = "custody" | "settlement";

export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601 */
  readonly timestamp: string;

  /** Principal whose call produced the event */
  readonly actor: string;

  /** Event that caused this one, e.g. the pull instruction behind a deposit */
  readonly causationId?: string;

  /** Operation id; shared by every event of one custody call */
  readonly correlationId: string;

  readonly source: EventSource;
}

export interface DomainEvent {
  /** `<source>.<name>`, e.g. "custody.deposited" */
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
