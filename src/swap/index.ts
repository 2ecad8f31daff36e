/**
 * Swap module
 * Router variants, call-data correction and atomic chain execution
 */

export type {
  SwapRouterKind,
  SwapFailure,
  SwapContext,
  SwapVenue,
  SwapRouter,
  UniswapV2Router,
  UniswapV3Router,
  AggregatorRouter,
  SwapChainOutcome,
} from './types.js';
export { describeSwapFailure } from './types.js';

export {
  UnknownSwapRouterError,
  CallDataUncorrectableError,
  BrokenSwapChainError,
  SwapExecutionError,
} from './errors.js';

export { SwapRouterRegistry } from './router.js';

export type { CallDataCorrector } from './calldata.js';
export {
  abiCallDataCorrector,
  passthroughCallDataCorrector,
  correctExactInput,
  exactInputSelector,
} from './calldata.js';

export type { SwapExecutorConfig, ExecuteChainOptions } from './executor.js';
export { SwapExecutor } from './executor.js';
