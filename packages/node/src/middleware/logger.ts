/**
 * Request logging middleware.
 *
 * One entry per request, handed to an injected sink (pino in main.ts).
 * `route` is the path with user and asset segments collapsed, the same
 * label the HTTP metrics use.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { normalizePath } from "./metrics.js";

export interface RequestLogEntry {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly route: string;
  readonly status: number;
  readonly durationMs: number;
  /** Unset on routes outside /api, which skip authentication */
  readonly principal?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const startedAt = now();
    await next();

    const path = c.req.path;
    log({
      requestId: c.get("requestId"),
      method: c.req.method,
      path,
      route: normalizePath(path),
      status: c.res.status,
      durationMs: now() - startedAt,
      principal: c.var.auth?.principal,
    });
  };
}
