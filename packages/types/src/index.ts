/**
 * @tallyvault/types — identifiers, price quotes, the event envelope and
 * chain references shared by every package. No runtime dependencies.
 */

export type { AssetId, PriceSourceId, Principal, PriceQuote } from "./financial.js";
export { NATIVE_ASSET_ID, NATIVE_DECIMALS } from "./financial.js";

export type { ChainFamily, ChainId, ChainRef } from "./chain.js";

export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export { isDomainEvent, isEventMetadata, isTimestamp } from "./guards.js";
