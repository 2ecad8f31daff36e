/**
 * Call-data correction
 *
 * When a leg's input amount changes after it was quoted (post-fee amount on
 * the destination, measured output of the previous leg in a chain), the amount
 * baked into the router call data has to change with it. Exact-input router
 * functions are decoded, their amount-in argument replaced and re-encoded.
 */

import type { ABIParameter, Hex } from '../core/types.js';
import { concatHex, normalizeHex } from '../core/hex.js';
import { functionSelector } from '../core/hash.js';
import { decodeParameters, encodeParameters } from '../core/abi.js';
import { type Result, ok, err } from '../core/result.js';
import { CallDataUncorrectableError } from './errors.js';
import type { SwapRouter, SwapRouterKind } from './types.js';

/**
 * Capability that rewrites call data for a new input amount
 */
export interface CallDataCorrector {
  correct(router: SwapRouter, callData: Hex, amountIn: bigint): Result<Hex, CallDataUncorrectableError>;
}

/**
 * An exact-input router function
 * Static struct arguments are listed flat; they encode identically.
 */
interface ExactInputFunction {
  readonly kind: SwapRouterKind;
  /** Canonical signature, hashed as-is for the selector */
  readonly signature: string;
  readonly inputs: ReadonlyArray<ABIParameter>;
  /** Input holding the amount in; null when the amount travels as call value */
  readonly amountIn: string | null;
}

const V2_EXACT_TOKENS_IN: ReadonlyArray<ABIParameter> = [
  { name: 'amountIn', type: 'uint256' },
  { name: 'amountOutMin', type: 'uint256' },
  { name: 'path', type: 'address[]' },
  { name: 'to', type: 'address' },
  { name: 'deadline', type: 'uint256' },
];

const V2_EXACT_ETH_IN: ReadonlyArray<ABIParameter> = [
  { name: 'amountOutMin', type: 'uint256' },
  { name: 'path', type: 'address[]' },
  { name: 'to', type: 'address' },
  { name: 'deadline', type: 'uint256' },
];

const EXACT_INPUT_FUNCTIONS: ReadonlyArray<ExactInputFunction> = [
  {
    kind: 'uniswap-v2',
    signature: 'swapExactTokensForTokens(uint256,uint256,address[],address,uint256)',
    inputs: V2_EXACT_TOKENS_IN,
    amountIn: 'amountIn',
  },
  {
    kind: 'uniswap-v2',
    signature: 'swapExactTokensForETH(uint256,uint256,address[],address,uint256)',
    inputs: V2_EXACT_TOKENS_IN,
    amountIn: 'amountIn',
  },
  {
    kind: 'uniswap-v2',
    signature: 'swapExactTokensForTokensSupportingFeeOnTransferTokens(uint256,uint256,address[],address,uint256)',
    inputs: V2_EXACT_TOKENS_IN,
    amountIn: 'amountIn',
  },
  {
    kind: 'uniswap-v2',
    signature: 'swapExactTokensForETHSupportingFeeOnTransferTokens(uint256,uint256,address[],address,uint256)',
    inputs: V2_EXACT_TOKENS_IN,
    amountIn: 'amountIn',
  },
  {
    kind: 'uniswap-v2',
    signature: 'swapExactETHForTokens(uint256,address[],address,uint256)',
    inputs: V2_EXACT_ETH_IN,
    amountIn: null,
  },
  {
    kind: 'uniswap-v2',
    signature: 'swapExactETHForTokensSupportingFeeOnTransferTokens(uint256,address[],address,uint256)',
    inputs: V2_EXACT_ETH_IN,
    amountIn: null,
  },
  {
    kind: 'uniswap-v3',
    signature: 'exactInputSingle((address,address,uint24,address,uint256,uint256,uint256,uint160))',
    inputs: [
      { name: 'tokenIn', type: 'address' },
      { name: 'tokenOut', type: 'address' },
      { name: 'fee', type: 'uint24' },
      { name: 'recipient', type: 'address' },
      { name: 'deadline', type: 'uint256' },
      { name: 'amountIn', type: 'uint256' },
      { name: 'amountOutMinimum', type: 'uint256' },
      { name: 'sqrtPriceLimitX96', type: 'uint160' },
    ],
    amountIn: 'amountIn',
  },
  {
    // SwapRouter02 drops the deadline from the struct
    kind: 'uniswap-v3',
    signature: 'exactInputSingle((address,address,uint24,address,uint256,uint256,uint160))',
    inputs: [
      { name: 'tokenIn', type: 'address' },
      { name: 'tokenOut', type: 'address' },
      { name: 'fee', type: 'uint24' },
      { name: 'recipient', type: 'address' },
      { name: 'amountIn', type: 'uint256' },
      { name: 'amountOutMinimum', type: 'uint256' },
      { name: 'sqrtPriceLimitX96', type: 'uint160' },
    ],
    amountIn: 'amountIn',
  },
];

const SELECTORS = new Map<Hex, ExactInputFunction>(
  EXACT_INPUT_FUNCTIONS.map((fn) => [functionSelector(fn.signature), fn])
);

/**
 * Selector of a router function this module can correct
 */
export function exactInputSelector(signature: string): Hex | undefined {
  const fn = EXACT_INPUT_FUNCTIONS.find((candidate) => candidate.signature === signature);
  return fn ? functionSelector(fn.signature) : undefined;
}

/**
 * Rewrite the amount-in argument of an exact-input router call
 */
export function correctExactInput(
  kind: SwapRouterKind,
  callData: Hex,
  amountIn: bigint
): Result<Hex, CallDataUncorrectableError> {
  const selector = callData.length >= 10 ? normalizeHex(`0x${callData.slice(2, 10)}`) : callData;
  const fn = SELECTORS.get(selector);
  if (!fn || fn.kind !== kind) {
    return err(new CallDataUncorrectableError({ kind, selector }));
  }

  // Native-in swaps take the amount from the call value
  if (fn.amountIn === null) {
    return ok(callData);
  }

  const index = fn.inputs.findIndex((input) => input.name === fn.amountIn);
  const types = fn.inputs.map((input) => input.type);

  try {
    const args = decodeParameters(types, `0x${callData.slice(10)}`);
    args[index] = amountIn;
    return ok(concatHex(selector, encodeParameters(types, args)));
  } catch (error) {
    return err(
      new CallDataUncorrectableError({
        kind,
        selector,
        reason: error instanceof Error ? error.message : String(error),
      })
    );
  }
}

/**
 * Corrector for the Uniswap-style router families
 * Aggregator call data is opaque and never rewritten, so an aggregator leg
 * fails whenever its input differs from the quoted amount.
 */
export const abiCallDataCorrector: CallDataCorrector = {
  correct(router, callData, amountIn) {
    return correctExactInput(router.kind, callData, amountIn);
  },
};

/**
 * Corrector that leaves call data untouched
 * For venues that read the amount from the leg rather than the call data
 */
export const passthroughCallDataCorrector: CallDataCorrector = {
  correct(_router, callData) {
    return ok(callData);
  },
};
