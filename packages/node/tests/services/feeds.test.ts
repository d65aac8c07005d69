/**
 * Tests for feed backend selection.
 */

import { afterEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EvmFeeds, FeedError, StaticFeeds } from "@tallyvault/chain-feeds";
import { createFeeds } from "../../src/services/feeds.js";
import type { FeedSettings } from "../../src/services/feeds.js";
import { USDC, USDC_FEED } from "../setup.js";

const BASE: FeedSettings = {
  FEED_MODE: "static",
  STATIC_FEEDS_FILE: "unused.json",
  EVM_CHAIN_ID: "eip155:1",
  EVM_RPC_URL: undefined,
  RPC_TIMEOUT_MS: 30_000,
};

describe("createFeeds", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("loads static feeds from the configured file", async () => {
    dir = await mkdtemp(join(tmpdir(), "feeds-"));
    const file = join(dir, "feeds.json");
    await writeFile(
      file,
      JSON.stringify({
        prices: { [USDC_FEED]: { price: "99990000", decimals: 8 } },
        assets: { [USDC]: { decimals: 6 } },
      }),
    );

    const feeds = await createFeeds({ ...BASE, STATIC_FEEDS_FILE: file });

    expect(feeds).toBeInstanceOf(StaticFeeds);
    await expect(feeds.latestPrice(USDC_FEED)).resolves.toEqual({ price: 99_990_000n, decimals: 8 });
    await expect(feeds.decimals(USDC)).resolves.toBe(6);
  });

  it("fails with INVALID_FEED_FILE for a missing file", async () => {
    await expect(createFeeds({ ...BASE, STATIC_FEEDS_FILE: "/nonexistent/feeds.json" })).rejects.toMatchObject({
      code: "INVALID_FEED_FILE",
    });
  });

  it("requires an RPC URL in evm mode", async () => {
    await expect(createFeeds({ ...BASE, FEED_MODE: "evm" })).rejects.toThrow(FeedError);
  });

  it("builds EVM feeds without touching the network", async () => {
    const feeds = await createFeeds({
      ...BASE,
      FEED_MODE: "evm",
      EVM_RPC_URL: "http://127.0.0.1:8545",
    });

    expect(feeds).toBeInstanceOf(EvmFeeds);
  });
});
