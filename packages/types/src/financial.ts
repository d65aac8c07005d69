/**
 * Financial Types
 *
 * Core custody primitives: asset identity, price sources and amounts.
 *
 * Rules:
 * - Amounts are bigint in the asset's native base units inside the core
 * - Amounts crossing a serialization boundary are decimal strings
 * - The native currency is a reserved asset id, never a token address
 */

/**
 * Opaque identifier of a registered asset.
 * Token contract address for fungible tokens, NATIVE_ASSET_ID for the native currency.
 */
export type AssetId = string;

/**
 * Opaque identifier of an external price feed (e.g. an aggregator address).
 */
export type PriceSourceId = string;

/**
 * A principal acting on the ledger (depositor, operator, administrator).
 */
export type Principal = string;

/** Reserved asset id denoting the native currency. */
export const NATIVE_ASSET_ID: AssetId = "0x0000000000000000000000000000000000000000";

/** The native currency always has 18 decimals. */
export const NATIVE_DECIMALS = 18;

/**
 * Latest answer of a price feed.
 * `price` is a signed integer scaled by 10^decimals.
 */
export interface PriceQuote {
  readonly price: bigint;
  readonly decimals: number;
}
