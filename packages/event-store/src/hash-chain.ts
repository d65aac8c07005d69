/**
 * @tallyvault/event-store — Hash chain.
 *
 * Each event is canonicalized with RFC 8785 (JCS) and hashed with SHA-256
 * together with its predecessor's hash:
 *
 *   hash[1] = sha256(jcs(event[1]) + "genesis")
 *   hash[n] = sha256(jcs(event[n]) + hash[n-1])
 *
 * Editing, dropping or reordering any event breaks every link after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

function canonicalContent(event: UnhashedEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Hex SHA-256 of an event linked to `previousHash`.
 */
export function computeEventHash(event: UnhashedEvent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify a run of events in global position order, starting from genesis.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let expectedPosition = 1;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    const position = stored.globalPosition;

    if (position !== expectedPosition) {
      errors.push({
        position,
        reason: `Gap in log: expected position ${String(expectedPosition)}, found ${String(position)}`,
      });
    }

    if (stored.previousHash !== expectedPrevious) {
      errors.push({
        position,
        reason: `previousHash mismatch at position ${String(position)}`,
      });
    }

    const recomputed = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== recomputed) {
      errors.push({
        position,
        reason: `Hash mismatch at position ${String(position)}: expected "${recomputed}", got "${stored.hash}"`,
      });
    }

    expectedPrevious = stored.hash;
    expectedPosition = position + 1;
    lastVerifiedPosition = position;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
