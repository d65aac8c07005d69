/**
 * @tallyvault/custody — Asset Registry.
 *
 * Maps each registered asset to its price source and keeps the ordered,
 * bounded list of registered assets.
 *
 * Rules:
 * - An asset appears in the list at most once
 * - The list never grows past maxAssets; aggregation cost is bounded by it
 * - Re-registration replaces the price source, never duplicates membership
 * - No unregister
 */

import type { AssetId, PriceSourceId, Principal } from "@tallyvault/types";
import type { PermissionGate } from "./permissions.js";
import { CustodyError } from "./types.js";

export const DEFAULT_MAX_ASSETS = 10;

/** Outcome of a register() call. */
export interface Registration {
  readonly assetId: AssetId;
  readonly priceSourceId: PriceSourceId;
  /** True when the asset was appended to the list by this call. */
  readonly added: boolean;
  /** The price source replaced by this call, if any. */
  readonly previousPriceSourceId?: PriceSourceId | undefined;
}

export class AssetRegistry {
  private readonly _sources: Map<AssetId, PriceSourceId> = new Map();
  private readonly _order: AssetId[] = [];
  private readonly _gate: PermissionGate;
  readonly maxAssets: number;

  constructor(gate: PermissionGate, maxAssets: number = DEFAULT_MAX_ASSETS) {
    if (!Number.isInteger(maxAssets) || maxAssets < 1) {
      throw new CustodyError("INVALID_AMOUNT", `maxAssets must be a positive integer, got ${String(maxAssets)}`);
    }
    this._gate = gate;
    this.maxAssets = maxAssets;
  }

  /**
   * Rebuild a registry from its entries, preserving order.
   * Bypasses the permission check; used by snapshot restore only.
   */
  static fromEntries(
    gate: PermissionGate,
    maxAssets: number,
    entries: readonly { readonly assetId: AssetId; readonly priceSourceId: PriceSourceId }[],
  ): AssetRegistry {
    const registry = new AssetRegistry(gate, maxAssets);
    if (entries.length > maxAssets) {
      throw new CustodyError(
        "CAPACITY_EXCEEDED",
        `Snapshot holds ${String(entries.length)} assets, limit is ${String(maxAssets)}`,
      );
    }
    for (const { assetId, priceSourceId } of entries) {
      if (!registry._sources.has(assetId)) {
        registry._order.push(assetId);
      }
      registry._sources.set(assetId, priceSourceId);
    }
    return registry;
  }

  /**
   * Register an asset or re-point it at a new price source.
   * Requires the operator role.
   */
  register(actor: Principal, assetId: AssetId, priceSourceId: PriceSourceId): Registration {
    this._gate.require("operator", actor);

    const previous = this._sources.get(assetId);
    if (previous === undefined) {
      if (this._order.length >= this.maxAssets) {
        throw new CustodyError(
          "CAPACITY_EXCEEDED",
          `Asset registry is full (${String(this.maxAssets)} assets)`,
        );
      }
      this._order.push(assetId);
    }
    this._sources.set(assetId, priceSourceId);

    return {
      assetId,
      priceSourceId,
      added: previous === undefined,
      previousPriceSourceId: previous,
    };
  }

  /**
   * Price source of a registered asset.
   * Throws ASSET_NOT_REGISTERED if absent.
   */
  lookup(assetId: AssetId): PriceSourceId {
    const source = this._sources.get(assetId);
    if (source === undefined) {
      throw new CustodyError("ASSET_NOT_REGISTERED", `Asset not registered: "${assetId}"`);
    }
    return source;
  }

  isRegistered(assetId: AssetId): boolean {
    return this._sources.has(assetId);
  }

  /**
   * Registered assets in registration order.
   */
  listRegistered(): readonly AssetId[] {
    return [...this._order];
  }

  entries(): readonly { readonly assetId: AssetId; readonly priceSourceId: PriceSourceId }[] {
    return this._order.map((assetId) => ({ assetId, priceSourceId: this.lookup(assetId) }));
  }

  get size(): number {
    return this._order.length;
  }
}
