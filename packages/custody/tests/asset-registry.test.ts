/**
 * Tests for the AssetRegistry.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AssetRegistry, DEFAULT_MAX_ASSETS } from "../src/asset-registry.js";
import { PermissionGate } from "../src/permissions.js";
import { ADMIN, ALICE, NATIVE, NATIVE_FEED, USDC, USDC_FEED, codeOf } from "./fakes.js";

describe("AssetRegistry", () => {
  let gate: PermissionGate;
  let registry: AssetRegistry;

  beforeEach(() => {
    gate = PermissionGate.bootstrap(ADMIN);
    registry = new AssetRegistry(gate);
  });

  it("defaults to ten assets", () => {
    expect(DEFAULT_MAX_ASSETS).toBe(10);
    expect(registry.maxAssets).toBe(10);
  });

  it("registers assets in order", () => {
    const first = registry.register(ADMIN, NATIVE, NATIVE_FEED);
    registry.register(ADMIN, USDC, USDC_FEED);

    expect(first).toEqual({
      assetId: NATIVE,
      priceSourceId: NATIVE_FEED,
      added: true,
      previousPriceSourceId: undefined,
    });
    expect(registry.listRegistered()).toEqual([NATIVE, USDC]);
    expect(registry.lookup(USDC)).toBe(USDC_FEED);
    expect(registry.size).toBe(2);
  });

  it("re-registration replaces the price source without duplicating", () => {
    registry.register(ADMIN, USDC, USDC_FEED);
    const again = registry.register(ADMIN, USDC, "feed:other");

    expect(again.added).toBe(false);
    expect(again.previousPriceSourceId).toBe(USDC_FEED);
    expect(registry.lookup(USDC)).toBe("feed:other");
    expect(registry.listRegistered()).toEqual([USDC]);
  });

  it("requires the operator role", () => {
    expect(codeOf(() => registry.register(ALICE, USDC, USDC_FEED))).toBe("UNAUTHORIZED");
    expect(registry.isRegistered(USDC)).toBe(false);
  });

  it("fails lookup of unknown assets", () => {
    expect(codeOf(() => registry.lookup(USDC))).toBe("ASSET_NOT_REGISTERED");
  });

  it("refuses new assets at the bound but still re-points existing ones", () => {
    const small = new AssetRegistry(gate, 2);
    small.register(ADMIN, "a", "feed:a");
    small.register(ADMIN, "b", "feed:b");

    expect(codeOf(() => small.register(ADMIN, "c", "feed:c"))).toBe("CAPACITY_EXCEEDED");
    expect(small.register(ADMIN, "a", "feed:a2").added).toBe(false);
    expect(small.listRegistered()).toEqual(["a", "b"]);
  });

  it("rejects a non-positive bound", () => {
    expect(codeOf(() => new AssetRegistry(gate, 0))).toBe("INVALID_AMOUNT");
  });

  it("returns a copy from listRegistered", () => {
    registry.register(ADMIN, USDC, USDC_FEED);
    const list = registry.listRegistered();
    registry.register(ADMIN, NATIVE, NATIVE_FEED);
    expect(list).toEqual([USDC]);
  });

  it("rebuilds from entries and enforces the bound", () => {
    const rebuilt = AssetRegistry.fromEntries(gate, 3, [
      { assetId: USDC, priceSourceId: USDC_FEED },
      { assetId: NATIVE, priceSourceId: NATIVE_FEED },
    ]);
    expect(rebuilt.entries()).toEqual([
      { assetId: USDC, priceSourceId: USDC_FEED },
      { assetId: NATIVE, priceSourceId: NATIVE_FEED },
    ]);

    expect(
      codeOf(() =>
        AssetRegistry.fromEntries(gate, 1, [
          { assetId: USDC, priceSourceId: USDC_FEED },
          { assetId: NATIVE, priceSourceId: NATIVE_FEED },
        ]),
      ),
    ).toBe("CAPACITY_EXCEEDED");
  });
});
