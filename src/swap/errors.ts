/**
 * Swap errors
 */

import type { Hex } from '../core/types.js';
import { SettlementError } from '../errors.js';
import type { SwapFailure, SwapRouterKind } from './types.js';
import { describeSwapFailure } from './types.js';

/**
 * No router is registered for a leg's callTo
 */
export class UnknownSwapRouterError extends SettlementError {
  constructor(callTo: Hex, registered: Hex[]) {
    super({
      code: 'UNKNOWN_SWAP_ROUTER',
      message: `No swap router registered at ${callTo}`,
      details: { callTo, registered },
      suggestion: 'Register the router with the swap router registry before routing through it',
    });
    this.name = 'UnknownSwapRouterError';
  }
}

/**
 * Call data cannot be rewritten for a new input amount
 */
export class CallDataUncorrectableError extends SettlementError {
  constructor(config: { kind: SwapRouterKind; selector: string; reason?: string }) {
    super({
      code: 'CALLDATA_UNCORRECTABLE',
      message: config.reason
        ? `Cannot correct ${config.kind} call data ${config.selector}: ${config.reason}`
        : `Cannot correct ${config.kind} call data with selector ${config.selector}`,
      details: config,
      suggestion: 'Use an exact-input router function whose input amount can be rewritten',
    });
    this.name = 'CallDataUncorrectableError';
  }
}

/**
 * A leg's input asset is not the previous leg's output asset
 */
export class BrokenSwapChainError extends SettlementError {
  readonly index: number;

  constructor(config: { index: number; expected: Hex; actual: Hex }) {
    super({
      code: 'BROKEN_SWAP_CHAIN',
      message: `Swap leg ${String(config.index)} spends ${config.actual} but the previous leg outputs ${config.expected}`,
      details: config,
      suggestion: 'Chain legs so that each input asset is the previous output asset',
    });
    this.name = 'BrokenSwapChainError';
    this.index = config.index;
  }
}

/**
 * A swap chain did not run to completion; every leg was undone
 */
export class SwapExecutionError extends SettlementError {
  readonly legIndex: number;
  readonly reason: SwapFailure;

  constructor(config: { legIndex: number; reason: SwapFailure; cause?: SettlementError }) {
    super({
      code: 'SWAP_FAILED',
      message: `Swap leg ${String(config.legIndex)} failed: ${describeSwapFailure(config.reason)}`,
      details: {
        legIndex: config.legIndex,
        reason: config.reason,
        ...(config.cause ? { cause: config.cause.code } : {}),
      },
      suggestion: 'Re-quote the swap with current liquidity and slippage bounds',
      retryable: true,
    });
    this.name = 'SwapExecutionError';
    this.legIndex = config.legIndex;
    this.reason = config.reason;
  }

  /**
   * Wrap a setup error (unknown router, broken chain, bad call data) as a leg failure
   */
  static fromError(legIndex: number, error: SettlementError): SwapExecutionError {
    return new SwapExecutionError({
      legIndex,
      reason: { kind: 'reason', message: error.message },
      cause: error,
    });
  }
}
