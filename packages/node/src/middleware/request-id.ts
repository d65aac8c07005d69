/**
 * Request ID middleware.
 *
 * A caller-supplied X-Request-Id is kept when it is a short token of
 * safe characters, so it can be logged as-is; otherwise a UUID is
 * generated. The id is echoed on every response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(
  generate: () => string = randomUUID,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId = incoming !== undefined && ACCEPTED_ID.test(incoming) ? incoming : generate();
    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
