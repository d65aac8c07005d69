/**
 * Networks the price feeds live on, named by CAIP-2 id ("eip155:1").
 */

export type ChainId = string;

/** Only EVM networks carry the aggregator feeds read here. */
export type ChainFamily = "evm";

export interface ChainRef {
  readonly chainId: ChainId;
  readonly name: string;
  readonly family: ChainFamily;
}
