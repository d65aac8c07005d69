/**
 * Static Feeds — fixed prices and decimals loaded from a JSON file.
 *
 * For development, demos and tests. Prices can be changed at run time
 * with setPrice().
 *
 * File format:
 * {
 *   "prices": { "<priceSourceId>": { "price": "200000000000", "decimals": 8 } },
 *   "assets": { "<assetId>": { "decimals": 6 } }
 * }
 *
 * Prices are integer strings (bigint is not JSON) and may be zero or
 * negative; the custody core rejects those on use.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { AssetId, PriceQuote, PriceSourceId } from "@tallyvault/types";
import type { FeedSource, FeedStatus } from "./types.js";
import { FeedError } from "./types.js";

const DecimalsSchema = z.number().int().min(0).max(77);

export const StaticFeedsSchema = z.object({
  prices: z.record(
    z.object({
      price: z.string().regex(/^-?\d+$/, "price must be an integer string"),
      decimals: DecimalsSchema,
    }),
  ).default({}),
  assets: z.record(z.object({ decimals: DecimalsSchema })).default({}),
});

export type StaticFeedsFile = z.input<typeof StaticFeedsSchema>;

export class StaticFeeds implements FeedSource {
  private readonly _prices = new Map<PriceSourceId, PriceQuote>();
  private readonly _decimals = new Map<AssetId, number>();

  /**
   * Parse and validate a feeds document. Throws FeedError INVALID_FEED_FILE.
   */
  static fromJson(json: unknown): StaticFeeds {
    const parsed = StaticFeedsSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new FeedError("INVALID_FEED_FILE", `Invalid feeds document: ${issues}`);
    }

    const feeds = new StaticFeeds();
    for (const [source, quote] of Object.entries(parsed.data.prices)) {
      feeds.setPrice(source, BigInt(quote.price), quote.decimals);
    }
    for (const [assetId, meta] of Object.entries(parsed.data.assets)) {
      feeds.setDecimals(assetId, meta.decimals);
    }
    return feeds;
  }

  /**
   * Load a feeds file from disk.
   */
  static async load(path: string): Promise<StaticFeeds> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      throw new FeedError("INVALID_FEED_FILE", `Cannot read feeds file ${path}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new FeedError("INVALID_FEED_FILE", `Feeds file ${path} is not valid JSON`, { cause: error });
    }
    return StaticFeeds.fromJson(json);
  }

  setPrice(priceSourceId: PriceSourceId, price: bigint, decimals: number): void {
    this._prices.set(priceSourceId, { price, decimals });
  }

  setDecimals(assetId: AssetId, decimals: number): void {
    this._decimals.set(assetId, decimals);
  }

  async latestPrice(priceSourceId: PriceSourceId): Promise<PriceQuote> {
    const quote = this._prices.get(priceSourceId);
    if (quote === undefined) {
      throw new FeedError("UNKNOWN_PRICE_SOURCE", `No static price for '${priceSourceId}'`);
    }
    return quote;
  }

  async decimals(assetId: AssetId): Promise<number> {
    const decimals = this._decimals.get(assetId);
    if (decimals === undefined) {
      throw new FeedError("UNKNOWN_ASSET", `No static decimals for '${assetId}'`);
    }
    return decimals;
  }

  async getStatus(): Promise<FeedStatus> {
    return { source: "static", connected: true, checkedAt: new Date().toISOString() };
  }
}
