/**
 * Feed backend selection from configuration.
 */

import { EvmFeeds, FeedError, StaticFeeds } from "@tallyvault/chain-feeds";
import type { FeedSource } from "@tallyvault/chain-feeds";
import type { AppConfig } from "../config.js";

export type FeedSettings = Pick<
  AppConfig,
  "FEED_MODE" | "STATIC_FEEDS_FILE" | "EVM_CHAIN_ID" | "EVM_RPC_URL" | "RPC_TIMEOUT_MS"
>;

export async function createFeeds(settings: FeedSettings): Promise<FeedSource> {
  if (settings.FEED_MODE === "static") {
    return StaticFeeds.load(settings.STATIC_FEEDS_FILE);
  }

  if (settings.EVM_RPC_URL === undefined) {
    throw new FeedError("NOT_CONNECTED", "EVM_RPC_URL is required when FEED_MODE is evm");
  }
  const feeds = new EvmFeeds({
    chainId: settings.EVM_CHAIN_ID,
    rpcUrl: settings.EVM_RPC_URL,
    timeoutMs: settings.RPC_TIMEOUT_MS,
  });
  feeds.connect();
  return feeds;
}
