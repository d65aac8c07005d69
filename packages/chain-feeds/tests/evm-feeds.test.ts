/**
 * Tests for EvmFeeds.
 *
 * Mocks viem's createPublicClient. No RPC calls are made.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { EvmFeeds } from "../src/evm-feeds.js";
import { FeedError } from "../src/types.js";

// =============================================================================
// Mocks
// =============================================================================

const mockGetBlockNumber = vi.fn();
const mockReadContract = vi.fn();

vi.mock("viem", async () => {
  const actual = await vi.importActual("viem");
  return {
    ...actual,
    createPublicClient: vi.fn(() => ({
      getBlockNumber: mockGetBlockNumber,
      readContract: mockReadContract,
    })),
  };
});

const AGGREGATOR = "0x5f4ec3df9cbd43714fe2740f5e3616155c5b8419";
const TOKEN = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";

function connected(): EvmFeeds {
  const feeds = new EvmFeeds({ chainId: "eip155:1", rpcUrl: "https://rpc.invalid", timeoutMs: 5000 });
  feeds.connect();
  return feeds;
}

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
    return undefined;
  } catch (error) {
    return error instanceof FeedError ? error.code : "not-a-feed-error";
  }
}

// =============================================================================
// Tests
// =============================================================================

describe("EvmFeeds", () => {
  beforeEach(() => {
    mockGetBlockNumber.mockReset();
    mockReadContract.mockReset();
  });

  describe("constructor", () => {
    it("accepts supported EVM chains", () => {
      expect(new EvmFeeds({ chainId: "eip155:8453", rpcUrl: "https://rpc.invalid" }).chainId).toBe(
        "eip155:8453",
      );
    });

    it("rejects non-EVM chain ids", () => {
      expect(() => new EvmFeeds({ chainId: "xrpl:main", rpcUrl: "x" })).toThrow(
        "expected EVM chain ID",
      );
    });

    it("rejects unknown EVM chains", () => {
      expect(() => new EvmFeeds({ chainId: "eip155:999999", rpcUrl: "x" })).toThrow(
        "unsupported chain 'eip155:999999'",
      );
    });
  });

  describe("latestPrice", () => {
    it("returns the aggregator answer and decimals", async () => {
      mockReadContract.mockImplementation(async (args: { functionName: string }) =>
        args.functionName === "latestRoundData" ? [1n, 2000_00000000n, 0n, 0n, 1n] : 8,
      );

      expect(await connected().latestPrice(AGGREGATOR)).toEqual({ price: 2000_00000000n, decimals: 8 });
      expect(mockReadContract).toHaveBeenCalledTimes(2);
    });

    it("passes non-positive answers through", async () => {
      mockReadContract.mockImplementation(async (args: { functionName: string }) =>
        args.functionName === "latestRoundData" ? [1n, -1n, 0n, 0n, 1n] : 8,
      );
      expect((await connected().latestPrice(AGGREGATOR)).price).toBe(-1n);
    });

    it("wraps RPC failures as READ_FAILED", async () => {
      mockReadContract.mockRejectedValue(new Error("timeout"));
      expect(await codeOf(connected().latestPrice(AGGREGATOR))).toBe("READ_FAILED");
    });

    it("rejects malformed addresses without calling the chain", async () => {
      expect(await codeOf(connected().latestPrice("feed:eth-usd"))).toBe("INVALID_ADDRESS");
      expect(mockReadContract).not.toHaveBeenCalled();
    });

    it("requires connect()", async () => {
      const feeds = new EvmFeeds({ chainId: "eip155:1", rpcUrl: "https://rpc.invalid" });
      expect(await codeOf(feeds.latestPrice(AGGREGATOR))).toBe("NOT_CONNECTED");
    });
  });

  describe("decimals", () => {
    it("reads ERC-20 decimals", async () => {
      mockReadContract.mockResolvedValue(6);
      expect(await connected().decimals(TOKEN)).toBe(6);
      expect(mockReadContract).toHaveBeenCalledWith(
        expect.objectContaining({ address: TOKEN, functionName: "decimals" }),
      );
    });
  });

  describe("getStatus", () => {
    it("reports the latest block when connected", async () => {
      mockGetBlockNumber.mockResolvedValue(12345n);
      expect(await connected().getStatus()).toMatchObject({
        source: "evm",
        connected: true,
        latestBlock: 12345,
      });
    });

    it("reports disconnected when the RPC fails", async () => {
      mockGetBlockNumber.mockRejectedValue(new Error("down"));
      expect((await connected().getStatus()).connected).toBe(false);
    });

    it("reports disconnected after disconnect()", async () => {
      const feeds = connected();
      feeds.disconnect();
      expect((await feeds.getStatus()).connected).toBe(false);
    });
  });
});
