/**
 * Swap types
 * Router variants and the venue capability each of them executes through
 */

import type { Hex } from '../core/types.js';
import type { Result } from '../core/result.js';
import type { SwapLeg } from '../bridge/types.js';

/**
 * Closed set of router families the settlement knows how to drive
 */
export type SwapRouterKind = 'uniswap-v2' | 'uniswap-v3' | 'aggregator';

/**
 * Why a leg failed
 * A structured failure carries a message, an opaque one its raw revert bytes
 */
export type SwapFailure =
  | { readonly kind: 'reason'; readonly message: string }
  | { readonly kind: 'raw'; readonly data: Hex };

/**
 * Account the swap spends from and receives into
 */
export interface SwapContext {
  readonly account: Hex;
}

/**
 * Capability that runs a single leg atomically
 * Resolves to the output amount the venue reports
 */
export interface SwapVenue {
  execute(leg: SwapLeg, context: SwapContext): Promise<Result<bigint, SwapFailure>>;
}

interface SwapRouterBase {
  /** Router id matched against SwapLeg.callTo */
  readonly address: Hex;
  /** Human-readable label for logs */
  readonly label?: string;
  readonly venue: SwapVenue;
}

export interface UniswapV2Router extends SwapRouterBase {
  readonly kind: 'uniswap-v2';
}

export interface UniswapV3Router extends SwapRouterBase {
  readonly kind: 'uniswap-v3';
}

export interface AggregatorRouter extends SwapRouterBase {
  readonly kind: 'aggregator';
}

export type SwapRouter = UniswapV2Router | UniswapV3Router | AggregatorRouter;

/**
 * Output of a fully executed swap chain
 */
export interface SwapChainOutcome {
  /** Output asset of the last leg */
  readonly asset: Hex;
  /** Output amount of the last leg, measured on the ledger */
  readonly amount: bigint;
  /** Amount each leg actually spent, in order */
  readonly inputs: readonly bigint[];
}

/**
 * Human-readable form of a swap failure
 */
export function describeSwapFailure(failure: SwapFailure): string {
  return failure.kind === 'reason' ? failure.message : `reverted with ${failure.data}`;
}
