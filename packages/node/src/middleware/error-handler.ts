/**
 * Global error handler, registered with app.onError().
 *
 * An error whose `code` is in ERROR_STATUS answers with that status and
 * keeps its code and message. Everything else, and every code that maps
 * to 500, answers INTERNAL_ERROR without the original message.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope, ERROR_STATUS, isErrorCode } from "../types/error.js";
import type { ErrorCode } from "../types/error.js";

function codeOf(err: Error): ErrorCode | undefined {
  if ("code" in err && isErrorCode(err.code)) {
    return err.code;
  }
  return undefined;
}

export function statusForCode(code: ErrorCode | undefined): ContentfulStatusCode {
  return code === undefined ? 500 : ERROR_STATUS[code];
}

export function handleError(err: Error, c: Context): Response {
  const code = codeOf(err);
  const status = statusForCode(code);

  if (code === undefined || status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code, err.message), status);
}
