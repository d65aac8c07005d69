/**
 * Idempotency-Key handling for POST routes.
 *
 * The first successful response for a key is stored together with a
 * digest of the request body. A retry with the same key and body gets
 * the stored response back marked with X-Idempotent-Replay; a retry
 * with a different body is refused. Keys are scoped to the principal
 * and the path, so two users never collide. A repeat that arrives while
 * the first request is still running waits for it and then replays.
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cachedAt: number;
  /** sha256 of the request body that produced this response */
  readonly requestDigest?: string;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

/** Process-local store; entries lapse after `ttlMs` and are evicted on read. */
export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _entries = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = DAY_MS, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._entries.get(key);
    if (entry !== undefined && this._now() - entry.cachedAt > this._ttlMs) {
      this._entries.delete(key);
      return undefined;
    }
    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this._entries.set(key, response);
  }

  get size(): number {
    return this._entries.size;
  }
}

function digest(body: string): string {
  return createHash("sha256").update(body).digest("hex");
}

function replay(cached: CachedResponse): Response {
  const headers = new Headers(cached.headers);
  headers.set(REPLAY_HEADER, "true");
  return new Response(cached.body, { status: cached.status, headers });
}

export function idempotencyMiddleware(
  store: IdempotencyStore,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  const inFlight = new Map<string, Promise<void>>();

  return async (c, next) => {
    const key = c.req.header(IDEMPOTENCY_HEADER);
    if (c.req.method !== "POST" || key === undefined) {
      await next();
      return;
    }

    const scope = [c.get("auth").principal, c.req.path, key].join(":");
    const requestDigest = digest(await c.req.text());

    for (let pending = inFlight.get(scope); pending !== undefined; pending = inFlight.get(scope)) {
      await pending;
    }

    const cached = store.get(scope);
    if (cached !== undefined) {
      if (cached.requestDigest !== undefined && cached.requestDigest !== requestDigest) {
        return c.json(
          createErrorEnvelope(
            "IDEMPOTENCY_KEY_REUSED",
            `Idempotency key "${key}" was already used with a different request body`,
          ),
          422,
        );
      }
      return replay(cached);
    }

    let settle = (): void => {};
    inFlight.set(scope, new Promise<void>((resolve) => {
      settle = resolve;
    }));
    try {
      await next();

      // failures stay retryable
      if (c.res.status >= 400) {
        return;
      }
      const response = c.res.clone();
      store.set(scope, {
        status: response.status,
        body: await response.text(),
        headers: Object.fromEntries(response.headers.entries()),
        cachedAt: now(),
        requestDigest,
      });
    } finally {
      inFlight.delete(scope);
      settle();
    }
  };
}
