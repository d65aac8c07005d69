/**
 * EVM Feeds — price oracle and asset metadata read from an EVM chain.
 *
 * Uses viem for all chain interactions.
 *
 * Capabilities:
 * - Chainlink-style aggregator answers (latestRoundData + decimals)
 * - ERC-20 decimals
 *
 * Read-only: no signing, no transaction submission.
 */

import {
  createPublicClient,
  http,
  isAddress,
  parseAbiItem,
  type Address,
  type Chain,
  type HttpTransport,
  type PublicClient,
} from "viem";
import type { AssetId, PriceQuote, PriceSourceId } from "@tallyvault/types";
import { getViemChain, isEvmChain, supportedChainIds } from "./chains.js";
import type { EvmFeedConfig, FeedSource, FeedStatus } from "./types.js";
import { FeedError } from "./types.js";

// Aggregator and ERC-20 ABI fragments (read-only)
const AGGREGATOR_LATEST_ROUND = parseAbiItem(
  "function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
);
const DECIMALS = parseAbiItem("function decimals() view returns (uint8)");

export const DEFAULT_RPC_TIMEOUT_MS = 30_000;

// =============================================================================
// EVM Feeds
// =============================================================================

export class EvmFeeds implements FeedSource {
  readonly chainId: string;
  private readonly _chain: Chain;
  private readonly _config: EvmFeedConfig;
  private _client: PublicClient<HttpTransport, Chain> | null = null;

  constructor(config: EvmFeedConfig) {
    if (!isEvmChain(config.chainId)) {
      throw new FeedError(
        "UNSUPPORTED_CHAIN",
        `EvmFeeds: expected EVM chain ID (eip155:*), got '${config.chainId}'`,
      );
    }
    const chain = getViemChain(config.chainId);
    if (chain === undefined) {
      throw new FeedError(
        "UNSUPPORTED_CHAIN",
        `EvmFeeds: unsupported chain '${config.chainId}'. Supported: ${supportedChainIds().join(", ")}`,
      );
    }
    this.chainId = config.chainId;
    this._chain = chain;
    this._config = config;
  }

  connect(): void {
    this._client = createPublicClient({
      chain: this._chain,
      transport: http(this._config.rpcUrl, {
        timeout: this._config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS,
      }),
    });
  }

  disconnect(): void {
    this._client = null;
  }

  async getStatus(): Promise<FeedStatus> {
    const checkedAt = new Date().toISOString();
    if (this._client === null) {
      return { source: "evm", connected: false, chainId: this.chainId, checkedAt };
    }
    try {
      const blockNumber = await this._client.getBlockNumber();
      return {
        source: "evm",
        connected: true,
        chainId: this.chainId,
        latestBlock: Number(blockNumber),
        checkedAt,
      };
    } catch {
      // Unreachable RPC reports as disconnected
      return { source: "evm", connected: false, chainId: this.chainId, checkedAt };
    }
  }

  // ─── PriceOracle ──────────────────────────────────────────────────────

  /**
   * Latest aggregator answer. The answer is passed through as read,
   * including zero or negative values.
   */
  async latestPrice(priceSourceId: PriceSourceId): Promise<PriceQuote> {
    const client = this._requireClient();
    const aggregator = this._address(priceSourceId);

    try {
      const [round, decimals] = await Promise.all([
        client.readContract({
          address: aggregator,
          abi: [AGGREGATOR_LATEST_ROUND],
          functionName: "latestRoundData",
        }),
        client.readContract({
          address: aggregator,
          abi: [DECIMALS],
          functionName: "decimals",
        }),
      ]);
      const [, answer] = round;
      return { price: answer, decimals: Number(decimals) };
    } catch (error) {
      throw new FeedError(
        "READ_FAILED",
        `Failed to read price feed ${aggregator} on ${this.chainId}`,
        { cause: error },
      );
    }
  }

  // ─── AssetMetadata ────────────────────────────────────────────────────

  async decimals(assetId: AssetId): Promise<number> {
    const client = this._requireClient();
    const token = this._address(assetId);

    try {
      const decimals = await client.readContract({
        address: token,
        abi: [DECIMALS],
        functionName: "decimals",
      });
      return Number(decimals);
    } catch (error) {
      throw new FeedError(
        "READ_FAILED",
        `Failed to read decimals of ${token} on ${this.chainId}`,
        { cause: error },
      );
    }
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private _requireClient(): PublicClient<HttpTransport, Chain> {
    if (this._client === null) {
      throw new FeedError("NOT_CONNECTED", "EvmFeeds: not connected. Call connect() before querying.");
    }
    return this._client;
  }

  private _address(value: string): Address {
    if (!isAddress(value)) {
      throw new FeedError("INVALID_ADDRESS", `Not an EVM address: '${value}'`);
    }
    return value;
  }
}
