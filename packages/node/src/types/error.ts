/**
 * Error envelope and the code → status table.
 *
 * Every error response is `{ error: { code, message, details? } }`.
 * Domain codes keep their name on the wire; the HTTP layer adds a few
 * of its own.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { CustodyErrorCode } from "@tallyvault/custody";
import type { EventStoreErrorCode } from "@tallyvault/event-store";
import type { FeedErrorCode } from "@tallyvault/chain-feeds";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "IDEMPOTENCY_KEY_REUSED"
  | "INTERNAL_ERROR";

export type ErrorCode = ApiErrorCode | CustodyErrorCode | EventStoreErrorCode | FeedErrorCode;

export const ERROR_STATUS = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  IDEMPOTENCY_KEY_REUSED: 422,
  INTERNAL_ERROR: 500,

  // custody; UNAUTHORIZED here is a role refusal, not a missing login
  UNAUTHORIZED: 403,
  ASSET_NOT_REGISTERED: 404,
  INVALID_AMOUNT: 400,
  NOTHING_TO_DEPOSIT: 400,
  NOTHING_TO_WITHDRAW: 400,
  INVALID_DIRECT_TRANSFER: 400,
  INSUFFICIENT_BALANCE: 422,
  WITHDRAW_LIMIT_EXCEEDED: 422,
  CAPACITY_EXCEEDED: 422,
  REENTRANT_CALL: 409,
  INVALID_PRICE: 502,
  FAILED_TRANSFER: 502,

  // event store
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_EVENT: 400,
  INVALID_POSITION: 400,
  STORE_HALTED: 503,

  // feeds
  NOT_CONNECTED: 503,
  UNSUPPORTED_CHAIN: 502,
  INVALID_ADDRESS: 502,
  UNKNOWN_PRICE_SOURCE: 502,
  UNKNOWN_ASSET: 502,
  READ_FAILED: 502,
  INVALID_FEED_FILE: 500,
} as const satisfies Record<ErrorCode, ContentfulStatusCode>;

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && Object.hasOwn(ERROR_STATUS, value);
}

export interface ErrorBody {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorBody;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}
