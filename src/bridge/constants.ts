/**
 * Wormhole settlement constants
 * Chain ids and default fee parameters of the reference deployment
 */

import type { Hex } from '../core/types.js';

/**
 * Route tag reported in transfer-started observations
 */
export const WORMHOLE_ROUTE = 'Wormhole';

/**
 * Wormhole chain ids (not EVM chain ids)
 */
export const WORMHOLE_CHAIN_IDS = {
  ethereum: 2,
  bsc: 4,
  polygon: 5,
  avalanche: 6,
  aptos: 22,
} as const;

export type WormholeChainName = keyof typeof WORMHOLE_CHAIN_IDS;

/**
 * Destination gas table entry
 */
export interface GasTable {
  /** Fixed gas of a destination completion */
  baseGas: bigint;
  /** Additional gas per payload byte */
  gasPerByte: bigint;
}

/**
 * Gas table used for every EVM destination in the reference deployment
 */
export const DEFAULT_GAS_TABLE: GasTable = {
  baseGas: 220_000n,
  gasPerByte: 68n,
};

/**
 * Reserve multipliers of the reference deployment, as decimal ratios
 * The estimate reserve is higher so quotes cover later price moves
 */
export const DEFAULT_ACTUAL_RESERVE = '1.1';
export const DEFAULT_ESTIMATE_RESERVE = '1.2';

/**
 * Native asset id on EVM chains
 */
export const EVM_NATIVE_ASSET: Hex = '0x0000000000000000000000000000000000000000';

/**
 * How long a cached price ratio is trusted before refreshRatio re-reads the feed
 */
export const DEFAULT_RATIO_UPDATE_INTERVAL_MS = 60_000;

/**
 * Look up a Wormhole chain name by id
 */
export function wormholeChainName(chainId: number): WormholeChainName | undefined {
  const entry = Object.entries(WORMHOLE_CHAIN_IDS).find(([, id]) => id === chainId);
  if (!entry) return undefined;
  const [name] = entry;
  return isWormholeChainName(name) ? name : undefined;
}

function isWormholeChainName(name: string): name is WormholeChainName {
  return name in WORMHOLE_CHAIN_IDS;
}
