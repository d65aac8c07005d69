/**
 * @tallyvault/custody — Valuation Engine.
 *
 * Converts (asset, amount) into the common denomination using the asset's
 * registered price source and decimal precision.
 *
 * Read-only: no caching, no side effects. Every call reads the live feed,
 * so the same amount may value differently between two calls.
 */

import type { AssetId } from "@tallyvault/types";
import { NATIVE_ASSET_ID, NATIVE_DECIMALS } from "@tallyvault/types";
import type { AssetRegistry } from "./asset-registry.js";
import type { AssetMetadata, PriceOracle, Valuation } from "./types.js";
import { CustodyError } from "./types.js";
import { assertNonNegative, convertValue } from "./amount-math.js";

export const DEFAULT_COMMON_DECIMALS = 6;

export class ValuationEngine {
  private readonly _registry: AssetRegistry;
  private readonly _oracle: PriceOracle;
  private readonly _metadata: AssetMetadata;
  readonly commonDecimals: number;

  constructor(
    registry: AssetRegistry,
    oracle: PriceOracle,
    metadata: AssetMetadata,
    commonDecimals: number = DEFAULT_COMMON_DECIMALS,
  ) {
    if (!Number.isInteger(commonDecimals) || commonDecimals < 0) {
      throw new CustodyError("INVALID_AMOUNT", `commonDecimals must be a non-negative integer, got ${String(commonDecimals)}`);
    }
    this._registry = registry;
    this._oracle = oracle;
    this._metadata = metadata;
    this.commonDecimals = commonDecimals;
  }

  /**
   * Value of `amount` in common-denomination base units.
   */
  async valueOf(assetId: AssetId, amount: bigint): Promise<bigint> {
    const valuation = await this.quote(assetId, amount);
    return valuation.value;
  }

  /**
   * Value of `amount` with the price and precision it was computed from.
   *
   * Throws:
   * - ASSET_NOT_REGISTERED if the asset has no price source
   * - INVALID_AMOUNT if amount is negative
   * - INVALID_PRICE if the feed answers ≤ 0
   */
  async quote(assetId: AssetId, amount: bigint): Promise<Valuation> {
    const priceSourceId = this._registry.lookup(assetId);
    assertNonNegative(amount, "Amount");

    // Zero is worth zero at any price; no feed read.
    if (amount === 0n) {
      return {
        assetId,
        amount,
        assetDecimals: 0,
        price: 0n,
        priceDecimals: 0,
        value: 0n,
      };
    }

    const { price, decimals: priceDecimals } = await this._oracle.latestPrice(priceSourceId);
    if (price <= 0n) {
      throw new CustodyError(
        "INVALID_PRICE",
        `Price feed "${priceSourceId}" for asset "${assetId}" returned ${price.toString()}`,
      );
    }

    const assetDecimals = await this.decimalsOf(assetId);
    const value = convertValue(amount, price, assetDecimals, priceDecimals, this.commonDecimals);

    return { assetId, amount, assetDecimals, price, priceDecimals, value };
  }

  /**
   * Native precision of an asset: fixed for the native sentinel,
   * read from metadata otherwise.
   */
  async decimalsOf(assetId: AssetId): Promise<number> {
    if (assetId === NATIVE_ASSET_ID) {
      return NATIVE_DECIMALS;
    }
    return this._metadata.decimals(assetId);
  }
}
