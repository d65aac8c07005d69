/**
 * Tests for the administrative routes: assets, limits and roles.
 */

import { describe, it, expect } from "vitest";
import {
  ADMIN,
  ALICE,
  asPrincipal,
  BOB,
  createTestApp,
  NATIVE,
  NATIVE_FEED,
  readJson,
  seedAssets,
  USDC,
  USDC_FEED,
} from "../setup.js";

// =============================================================================
// Assets
// =============================================================================

describe("assets", () => {
  it("lists registered assets in registration order with held amounts", async () => {
    const { app } = createTestApp();
    await seedAssets(app);
    await app.request(asPrincipal(ALICE, "/api/v1/deposits", "POST", { assetId: USDC, amount: "2500000" }));
    await app.request(asPrincipal(BOB, "/api/v1/deposits", "POST", { assetId: USDC, amount: "500000" }));

    const res = await app.request(asPrincipal(ALICE, "/api/v1/assets"));

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      data: {
        assets: [
          { assetId: NATIVE, priceSourceId: NATIVE_FEED, held: "0" },
          { assetId: USDC, priceSourceId: USDC_FEED, held: "3000000" },
        ],
        maxAssets: 10,
      },
    });
  });

  it("re-points an existing asset with 200 and keeps its position", async () => {
    const { app } = createTestApp();
    await seedAssets(app);

    const res = await app.request(
      asPrincipal(ADMIN, "/api/v1/assets", "POST", { assetId: NATIVE, priceSourceId: "feed:other" }),
    );

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      data: {
        assetId: NATIVE,
        priceSourceId: "feed:other",
        added: false,
        previousPriceSourceId: NATIVE_FEED,
      },
    });
    const list = await readJson(await app.request("/api/v1/assets"));
    expect(list).toMatchObject({
      data: { assets: [{ assetId: NATIVE, priceSourceId: "feed:other" }, { assetId: USDC }] },
    });
  });

  it("requires the operator role", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      asPrincipal(ALICE, "/api/v1/assets", "POST", { assetId: NATIVE, priceSourceId: NATIVE_FEED }),
    );

    expect(res.status).toBe(403);
    expect(await readJson(res)).toEqual({
      error: { code: "UNAUTHORIZED", message: 'Principal "alice" lacks the operator role' },
    });
  });

  it("validates the body", async () => {
    const { app } = createTestApp();

    const res = await app.request(asPrincipal(ADMIN, "/api/v1/assets", "POST", { assetId: NATIVE }));

    expect(res.status).toBe(400);
    expect(await readJson(res)).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Request body validation failed" },
    });
  });

  it("rejects a body that is not JSON", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      new Request("http://localhost/api/v1/assets", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid JSON in request body" },
    });
  });
});

// =============================================================================
// Limits
// =============================================================================

describe("limits", () => {
  it("reports both limits in base units and formatted", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/limits");

    expect(await readJson(res)).toEqual({
      data: {
        commonDecimals: 6,
        capacityLimit: { value: "1000000000000", formatted: "1000000.000000" },
        withdrawLimit: { value: "10000000000", formatted: "10000.000000" },
      },
    });
  });

  it("sets the capacity limit from a decimal string", async () => {
    const { app, service } = createTestApp();

    const res = await app.request(
      asPrincipal(ADMIN, "/api/v1/limits/capacity", "PUT", { value: "2500.25" }),
    );

    expect(res.status).toBe(200);
    expect(service.limits().capacityLimit).toBe(2_500_250_000n);
    expect(service.readEvents().map((e) => e.event)).toMatchObject([
      { type: "custody.capacity_changed", payload: { previous: "1000000000000", current: "2500250000" } },
    ]);
  });

  it("sets the withdraw limit", async () => {
    const { app, service } = createTestApp();

    await app.request(asPrincipal(ADMIN, "/api/v1/limits/withdraw", "PUT", { value: "0" }));

    expect(service.limits().withdrawLimit).toBe(0n);
  });

  it("rejects more decimal places than the common denomination has", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      asPrincipal(ADMIN, "/api/v1/limits/capacity", "PUT", { value: "1.1234567" }),
    );

    expect(res.status).toBe(400);
    expect(await readJson(res)).toMatchObject({ error: { code: "INVALID_AMOUNT" } });
  });

  it("requires the operator role", async () => {
    const { app, service } = createTestApp();

    const res = await app.request(asPrincipal(BOB, "/api/v1/limits/withdraw", "PUT", { value: "1" }));

    expect(res.status).toBe(403);
    expect(service.limits().withdrawLimit).toBe(10_000_000_000n);
  });
});

// =============================================================================
// Roles
// =============================================================================

describe("roles", () => {
  it("lists the bootstrap members", async () => {
    const { app } = createTestApp();

    expect(await readJson(await app.request("/api/v1/roles/admin"))).toEqual({
      data: { role: "admin", members: [ADMIN] },
    });
    expect(await readJson(await app.request("/api/v1/roles/operator"))).toEqual({
      data: { role: "operator", members: [ADMIN] },
    });
  });

  it("returns 404 for an unknown role", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/roles/auditor");

    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({
      error: { code: "NOT_FOUND", message: "Unknown role 'auditor'" },
    });
  });

  it("grants operator so the grantee can register assets", async () => {
    const { app } = createTestApp();

    const grant = await app.request(
      asPrincipal(ADMIN, "/api/v1/roles/grant", "POST", { role: "operator", principal: ALICE }),
    );
    expect(await readJson(grant)).toEqual({ data: { role: "operator", principal: ALICE, changed: true } });

    const res = await app.request(
      asPrincipal(ALICE, "/api/v1/assets", "POST", { assetId: USDC, priceSourceId: USDC_FEED }),
    );
    expect(res.status).toBe(201);
  });

  it("answers changed: false for a repeated grant and emits nothing", async () => {
    const { app, service } = createTestApp();
    const body = { role: "operator", principal: ALICE };

    await app.request(asPrincipal(ADMIN, "/api/v1/roles/grant", "POST", body));
    const again = await app.request(asPrincipal(ADMIN, "/api/v1/roles/grant", "POST", body));

    expect(await readJson(again)).toMatchObject({ data: { changed: false } });
    expect(service.readEvents().map((e) => e.event.type)).toEqual(["custody.role_granted"]);
  });

  it("revokes a role", async () => {
    const { app, service } = createTestApp();

    const res = await app.request(
      asPrincipal(ADMIN, "/api/v1/roles/revoke", "POST", { role: "operator", principal: ADMIN }),
    );

    expect(await readJson(res)).toEqual({ data: { role: "operator", principal: ADMIN, changed: true } });
    expect(service.members("operator")).toEqual([]);
    expect(service.members("admin")).toEqual([ADMIN]);
  });

  it("requires the admin role; operator alone is not enough", async () => {
    const { app } = createTestApp();
    await app.request(asPrincipal(ADMIN, "/api/v1/roles/grant", "POST", { role: "operator", principal: ALICE }));

    const res = await app.request(
      asPrincipal(ALICE, "/api/v1/roles/grant", "POST", { role: "operator", principal: BOB }),
    );

    expect(res.status).toBe(403);
    expect(await readJson(res)).toEqual({
      error: { code: "UNAUTHORIZED", message: 'Principal "alice" lacks the admin role' },
    });
  });
});
