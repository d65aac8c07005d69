/**
 * @tallyvault/chain-feeds — Price oracles and asset metadata for custody.
 *
 * Design rules:
 * - READ-ONLY: no signing, no submission
 * - Answers are passed through as read; validation belongs to the core
 * - Errors are surfaced as FeedError, never swallowed
 */

export { EvmFeeds, DEFAULT_RPC_TIMEOUT_MS } from "./evm-feeds.js";
export { StaticFeeds, StaticFeedsSchema } from "./static-feeds.js";
export type { StaticFeedsFile } from "./static-feeds.js";

export {
  CHAINS,
  getChainRef,
  getViemChain,
  isEvmChain,
  supportedChainIds,
} from "./chains.js";

export type { EvmFeedConfig, FeedMode, FeedSource, FeedStatus, FeedErrorCode } from "./types.js";
export { FeedError } from "./types.js";
