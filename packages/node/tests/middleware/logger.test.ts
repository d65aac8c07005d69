/**
 * Tests for logger and request-id middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { ALICE, asPrincipal, createTestApp, jsonRequest } from "../setup.js";

function captureLogs(): { entries: RequestLogEntry[]; app: ReturnType<typeof createTestApp>["app"] } {
  const entries: RequestLogEntry[] = [];
  const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });
  return { entries, app };
}

describe("loggerMiddleware", () => {
  it("reports method, path, status and request id", async () => {
    const { entries, app } = captureLogs();

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      requestId: "req-1",
      method: "GET",
      path: "/health",
      route: "/health",
      status: 200,
      principal: undefined,
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("includes the acting principal and the error status", async () => {
    const { entries, app } = captureLogs();

    await app.request(
      asPrincipal(ALICE, "/api/v1/assets", "POST", { assetId: "0x01", priceSourceId: "feed" }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ method: "POST", status: 403, principal: ALICE });
  });

  it("collapses user and asset segments into the route", async () => {
    const { entries, app } = captureLogs();

    await app.request(asPrincipal(ALICE, `/api/v1/accounts/${ALICE}/balances/0x01`));

    expect(entries[0]).toMatchObject({
      path: "/api/v1/accounts/alice/balances/0x01",
      route: "/api/v1/accounts/:user/balances/:asset",
    });
  });
});

describe("requestIdMiddleware", () => {
  it("replaces an id with unsafe characters", async () => {
    const { entries, app } = captureLogs();

    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "bad id\twith spaces" }),
    );

    const echoed = res.headers.get("X-Request-Id");
    expect(echoed).not.toBe("bad id\twith spaces");
    expect(echoed).toMatch(/^[0-9a-f-]{36}$/);
    expect(entries[0]?.requestId).toBe(echoed);
  });
});
