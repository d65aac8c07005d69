/**
 * @tallyvault/chain-feeds — Types.
 */

import type { ChainId } from "@tallyvault/types";
import type { AssetMetadata, PriceOracle } from "@tallyvault/custody";

export type FeedMode = "static" | "evm";

export interface EvmFeedConfig {
  /** CAIP-2 chain id, e.g. "eip155:1" */
  readonly chainId: ChainId;

  readonly rpcUrl: string;

  /** HTTP timeout per RPC call. Default: 30000 */
  readonly timeoutMs?: number | undefined;
}

export interface FeedStatus {
  readonly source: FeedMode;
  readonly connected: boolean;
  readonly chainId?: ChainId;
  readonly latestBlock?: number;
  readonly checkedAt: string;
}

/**
 * Everything the custody service needs from a feed backend.
 */
export interface FeedSource extends PriceOracle, AssetMetadata {
  getStatus(): Promise<FeedStatus>;
}

export type FeedErrorCode =
  | "UNSUPPORTED_CHAIN"
  | "NOT_CONNECTED"
  | "INVALID_ADDRESS"
  | "UNKNOWN_PRICE_SOURCE"
  | "UNKNOWN_ASSET"
  | "READ_FAILED"
  | "INVALID_FEED_FILE";

/**
 * Error raised by a price feed or metadata reader.
 */
export class FeedError extends Error {
  public readonly code: FeedErrorCode;

  constructor(code: FeedErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FeedError";
    this.code = code;
  }
}
