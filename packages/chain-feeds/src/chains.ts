/**
 * Chain Definitions
 *
 * EVM chains the feed readers can connect to, keyed by CAIP-2 chain id.
 */

import type { Chain } from "viem";
import { arbitrum, base, mainnet, optimism, polygon, sepolia } from "viem/chains";
import type { ChainId, ChainRef } from "@tallyvault/types";

// =============================================================================
// Well-Known Chains
// =============================================================================

export const CHAINS = {
  ETHEREUM_MAINNET: { chainId: "eip155:1", name: "Ethereum Mainnet", family: "evm" },
  ETHEREUM_SEPOLIA: { chainId: "eip155:11155111", name: "Ethereum Sepolia", family: "evm" },
  BASE_MAINNET: { chainId: "eip155:8453", name: "Base Mainnet", family: "evm" },
  ARBITRUM_ONE: { chainId: "eip155:42161", name: "Arbitrum One", family: "evm" },
  OPTIMISM: { chainId: "eip155:10", name: "OP Mainnet", family: "evm" },
  POLYGON: { chainId: "eip155:137", name: "Polygon PoS", family: "evm" },
} as const satisfies Record<string, ChainRef>;

const VIEM_CHAINS: ReadonlyMap<ChainId, Chain> = new Map<ChainId, Chain>([
  [CHAINS.ETHEREUM_MAINNET.chainId, mainnet],
  [CHAINS.ETHEREUM_SEPOLIA.chainId, sepolia],
  [CHAINS.BASE_MAINNET.chainId, base],
  [CHAINS.ARBITRUM_ONE.chainId, arbitrum],
  [CHAINS.OPTIMISM.chainId, optimism],
  [CHAINS.POLYGON.chainId, polygon],
]);

const chainMap = new Map<ChainId, ChainRef>(
  Object.values(CHAINS).map((c) => [c.chainId, c]),
);

// =============================================================================
// Helpers
// =============================================================================

/**
 * Look up a ChainRef by its chainId.
 */
export function getChainRef(chainId: ChainId): ChainRef | undefined {
  return chainMap.get(chainId);
}

export function isEvmChain(chainId: ChainId): boolean {
  return chainId.startsWith("eip155:");
}

/** viem chain definition for a supported chain id. */
export function getViemChain(chainId: ChainId): Chain | undefined {
  return VIEM_CHAINS.get(chainId);
}

export function supportedChainIds(): readonly ChainId[] {
  return [...VIEM_CHAINS.keys()];
}
