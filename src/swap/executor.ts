/**
 * Swap chain executor
 * Runs an ordered plan leg by leg inside one atomic ledger unit
 */

import type { Hex } from '../core/types.js';
import { hexEquals } from '../core/hex.js';
import { type Result, ok, err, fromPromise } from '../core/result.js';
import { type Logger, noopLogger } from '../core/logger.js';
import type { AssetLedger } from '../ledger/ledger.js';
import type { SwapLeg, SwapPlan } from '../bridge/types.js';
import { BrokenSwapChainError, type CallDataUncorrectableError, SwapExecutionError } from './errors.js';
import type { SwapRouterRegistry } from './router.js';
import { type CallDataCorrector, abiCallDataCorrector } from './calldata.js';
import type { SwapChainOutcome, SwapFailure, SwapRouter } from './types.js';

export interface SwapExecutorConfig {
  ledger: AssetLedger;
  routers: SwapRouterRegistry;
  /**
   * Call-data corrector applied whenever a leg's input amount changes (default: ABI corrector)
   *
   * The default never rewrites aggregator call data. On the destination the post-fee
   * amount always differs from the quoted `fromAmount`, so a plan that starts at an
   * aggregator fails with CALLDATA_UNCORRECTABLE and the transfer is compensated.
   * Use `passthroughCallDataCorrector` when the venues read the amount from the leg.
   */
  corrector?: CallDataCorrector;
  logger?: Logger;
}

export interface ExecuteChainOptions {
  /** Account that holds the input and receives every output */
  account: Hex;
  /** Input of the first leg when it differs from the quoted fromAmount */
  amountIn?: bigint;
}

export class SwapExecutor {
  private readonly ledger: AssetLedger;
  private readonly routers: SwapRouterRegistry;
  private readonly corrector: CallDataCorrector;
  private readonly logger: Logger;

  constructor(config: SwapExecutorConfig) {
    this.ledger = config.ledger;
    this.routers = config.routers;
    this.corrector = config.corrector ?? abiCallDataCorrector;
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Check that each leg spends what the previous one produced
   */
  validateChain(legs: SwapPlan): Result<void, BrokenSwapChainError> {
    for (let i = 1; i < legs.length; i++) {
      const previous = legs[i - 1];
      const current = legs[i];
      if (!previous || !current) continue;
      if (!hexEquals(previous.receivingAssetId, current.sendingAssetId)) {
        return err(
          new BrokenSwapChainError({
            index: i,
            expected: previous.receivingAssetId,
            actual: current.sendingAssetId,
          })
        );
      }
    }
    return ok(undefined);
  }

  /**
   * Execute every leg, feeding each measured output into the next leg
   *
   * Either every leg runs and the ledger keeps all movements, or the result
   * is an error and the ledger is back where it started.
   */
  async executeChain(
    legs: SwapPlan,
    options: ExecuteChainOptions
  ): Promise<Result<SwapChainOutcome, SwapExecutionError>> {
    const [first] = legs;
    if (!first) {
      return err(
        new SwapExecutionError({
          legIndex: 0,
          reason: { kind: 'reason', message: 'swap plan is empty' },
        })
      );
    }

    const chain = this.validateChain(legs);
    if (!chain.ok) {
      return err(SwapExecutionError.fromError(chain.error.index, chain.error));
    }

    const routers: SwapRouter[] = [];
    for (const [index, leg] of legs.entries()) {
      const resolved = this.routers.resolve(leg.callTo);
      if (!resolved.ok) {
        return err(SwapExecutionError.fromError(index, resolved.error));
      }
      routers.push(resolved.value);
    }

    return this.ledger.atomic<SwapChainOutcome, SwapExecutionError>(async () => {
      const inputs: bigint[] = [];
      let amountIn = options.amountIn ?? first.fromAmount;
      let lastAsset = first.receivingAssetId;

      for (const [index, quoted] of legs.entries()) {
        const router = routers[index];
        if (!router) {
          return err(
            new SwapExecutionError({
              legIndex: index,
              reason: { kind: 'reason', message: 'router not resolved' },
            })
          );
        }

        const leg = this.rebase(quoted, router, amountIn);
        if (!leg.ok) {
          return err(SwapExecutionError.fromError(index, leg.error));
        }

        const before = await this.ledger.balanceOf(leg.value.receivingAssetId, options.account);
        const executed = await fromPromise(
          router.venue.execute(leg.value, { account: options.account }),
          (error): SwapFailure => ({
            kind: 'reason',
            message: error instanceof Error ? error.message : String(error),
          })
        );
        // A venue may resolve to a failure or reject; both fail the leg
        const outcome = executed.ok ? executed.value : executed;
        if (!outcome.ok) {
          this.logger.warn('Swap leg failed', { leg: index, router: router.address, reason: outcome.error });
          return err(new SwapExecutionError({ legIndex: index, reason: outcome.error }));
        }

        const after = await this.ledger.balanceOf(leg.value.receivingAssetId, options.account);
        const measured = after - before;
        if (measured <= 0n) {
          return err(
            new SwapExecutionError({
              legIndex: index,
              reason: { kind: 'reason', message: `leg produced no ${leg.value.receivingAssetId}` },
            })
          );
        }
        if (measured !== outcome.value) {
          this.logger.debug('Venue reported output differs from measured output', {
            leg: index,
            reported: outcome.value,
            measured,
          });
        }

        inputs.push(leg.value.fromAmount);
        amountIn = measured;
        lastAsset = leg.value.receivingAssetId;
      }

      this.logger.debug('Swap chain executed', { legs: legs.length, asset: lastAsset, amount: amountIn });
      return ok({ asset: lastAsset, amount: amountIn, inputs });
    });
  }

  /**
   * Leg with its input amount replaced, call data corrected to match
   */
  private rebase(
    leg: SwapLeg,
    router: SwapRouter,
    amountIn: bigint
  ): Result<SwapLeg, CallDataUncorrectableError> {
    if (amountIn === leg.fromAmount) {
      return ok(leg);
    }
    const callData = this.corrector.correct(router, leg.callData, amountIn);
    if (!callData.ok) {
      return callData;
    }
    return ok({ ...leg, fromAmount: amountIn, callData: callData.value });
  }
}
