import type { DomainEvent } from "@tallyvault/types";

export const TS = "2024-01-15T10:00:00.000Z";

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  id = type,
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${id}`,
      timestamp: TS,
      actor: "alice",
      correlationId: `op-${id}`,
      source: "custody",
    },
    payload,
  };
}
