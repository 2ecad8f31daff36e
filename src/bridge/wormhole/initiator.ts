/**
 * Transfer initiator
 * Source half of a settlement: take payment, settle the relayer fee,
 * optionally swap, then hand funds and payload to the token bridge
 */

import type { Hex } from '../../core/types.js';
import { hexEquals } from '../../core/hex.js';
import { type Result, ok, err, fromPromise } from '../../core/result.js';
import { type Logger, noopLogger } from '../../core/logger.js';
import { InvalidAmountError, type SettlementError, toSettlementError } from '../../errors.js';
import type { AssetLedger } from '../../ledger/ledger.js';
import type { SwapExecutor } from '../../swap/executor.js';
import { describeSwapFailure } from '../../swap/types.js';
import { EVM_NATIVE_ASSET, WORMHOLE_ROUTE } from '../constants.js';
import {
  DispatchError,
  FeeCheckFailedError,
  PaymentMismatchError,
  SourceSwapFailedError,
  SwapAmountMismatchError,
  TokenMismatchError,
} from '../errors.js';
import { type ObservationSink, noopSink } from '../events.js';
import type {
  BridgeParameters,
  CallContext,
  RelayerFeeCheck,
  SwapPlan,
  TransferHandle,
  TransferRecord,
  TransferState,
} from '../types.js';
import { encodeWirePayload } from './codec.js';
import type { WormholeConfig } from './config.js';
import type { RelayerFeeModel } from './fees.js';
import type { BridgeTransport } from './transport.js';

export interface TransferInitiatorConfig {
  config: WormholeConfig;
  feeModel: RelayerFeeModel;
  transport: BridgeTransport;
  ledger: AssetLedger;
  swaps: SwapExecutor;
  /** Account holding funds while a transfer is in progress */
  settlementAccount: Hex;
  /** Account that receives relayer fees */
  feeRecipient: Hex;
  /** Native asset id on this chain (default: EVM zero address) */
  nativeAsset?: Hex;
  sink?: ObservationSink;
  logger?: Logger;
}

export class TransferInitiator {
  private readonly config: WormholeConfig;
  private readonly feeModel: RelayerFeeModel;
  private readonly transport: BridgeTransport;
  private readonly ledger: AssetLedger;
  private readonly swaps: SwapExecutor;
  private readonly self: Hex;
  private readonly feeRecipient: Hex;
  private readonly nativeAsset: Hex;
  private readonly sink: ObservationSink;
  private readonly logger: Logger;

  constructor(config: TransferInitiatorConfig) {
    this.config = config.config;
    this.feeModel = config.feeModel;
    this.transport = config.transport;
    this.ledger = config.ledger;
    this.swaps = config.swaps;
    this.self = config.settlementAccount;
    this.feeRecipient = config.feeRecipient;
    this.nativeAsset = config.nativeAsset ?? EVM_NATIVE_ASSET;
    this.sink = config.sink ?? noopSink;
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Start a cross-chain transfer
   *
   * Nothing moves unless every step succeeds: a failed fee check, source
   * swap or dispatch leaves all balances as they were.
   */
  async initiateTransfer(
    context: CallContext,
    record: TransferRecord,
    swapPlanSrc: SwapPlan,
    params: BridgeParameters,
    swapPlanDst: SwapPlan
  ): Promise<Result<TransferHandle, SettlementError>> {
    const invalid = this.validate(context, record, swapPlanSrc, params);
    if (invalid) {
      this.logger.warn('Transfer rejected', { transactionId: record.transactionId, code: invalid.code });
      return err(invalid);
    }

    const fee = await this.feeModel.checkRelayerFee(record, params, swapPlanDst);
    if (!fee.ok) return fee;
    if (!fee.value.ok) {
      this.logger.warn('Relayer fee check failed', {
        transactionId: record.transactionId,
        attached: params.wormholeFee,
        required: fee.value.consumeValue,
      });
      return err(
        new FeeCheckFailedError({
          attached: params.wormholeFee,
          required: fee.value.consumeValue,
          srcFee: fee.value.srcFee,
        })
      );
    }

    let result: Result<TransferHandle, SettlementError>;
    try {
      result = await this.ledger.atomic<TransferHandle, SettlementError>(() =>
        this.settle(context, record, swapPlanSrc, params, swapPlanDst, fee.value)
      );
    } catch (error) {
      result = err(toSettlementError(error));
    }

    if (!result.ok) {
      this.logger.error('Transfer initiation failed', {
        transactionId: record.transactionId,
        code: result.error.code,
        message: result.error.message,
      });
      return result;
    }

    const handle = result.value;
    this.sink.emit({
      type: 'TransferStarted',
      transactionId: record.transactionId,
      route: WORMHOLE_ROUTE,
      hadSourceSwap: swapPlanSrc.length > 0,
      hadDestinationSwap: swapPlanDst.length > 0,
      record,
    });
    this.logger.info('Transfer dispatched', {
      transactionId: handle.transactionId,
      sequence: handle.sequence,
      nonce: handle.nonce,
      dstChainId: params.dstChainId,
      asset: handle.bridgedAsset,
      amount: handle.bridgedAmount,
      srcFee: handle.srcFee,
      refund: handle.refund,
    });
    return ok(handle);
  }

  private validate(
    context: CallContext,
    record: TransferRecord,
    swapPlanSrc: SwapPlan,
    params: BridgeParameters
  ): SettlementError | undefined {
    if (context.value !== params.wormholeFee) {
      return new PaymentMismatchError({ attached: context.value, declared: params.wormholeFee });
    }
    if (record.amount <= 0n) {
      return new InvalidAmountError('amount', record.amount, 'must be positive');
    }

    const [first] = swapPlanSrc;
    if (first) {
      if (first.fromAmount !== record.amount) {
        return new SwapAmountMismatchError({ expected: record.amount, actual: first.fromAmount });
      }
      if (!hexEquals(first.sendingAssetId, record.sendingAssetId)) {
        return new TokenMismatchError({
          expected: record.sendingAssetId,
          actual: first.sendingAssetId,
          stage: 'initiation',
        });
      }
    }
    return undefined;
  }

  private async settle(
    context: CallContext,
    record: TransferRecord,
    swapPlanSrc: SwapPlan,
    params: BridgeParameters,
    swapPlanDst: SwapPlan,
    fee: RelayerFeeCheck
  ): Promise<Result<TransferHandle, SettlementError>> {
    const states: TransferState[] = ['initiated'];

    if (context.value > 0n) {
      await this.ledger.transfer(this.nativeAsset, context.caller, this.self, context.value);
    }
    if (fee.refund > 0n) {
      await this.ledger.transfer(this.nativeAsset, this.self, context.caller, fee.refund);
    }
    if (fee.srcFee > 0n) {
      await this.ledger.transfer(this.nativeAsset, this.self, this.feeRecipient, fee.srcFee);
    }
    if (!hexEquals(record.sendingAssetId, this.nativeAsset)) {
      await this.ledger.transfer(record.sendingAssetId, context.caller, this.self, record.amount);
    }

    let bridgedAsset = record.sendingAssetId;
    let bridgedAmount = record.amount;
    if (swapPlanSrc.length > 0) {
      const swapped = await this.swaps.executeChain(swapPlanSrc, { account: this.self });
      if (!swapped.ok) {
        return err(new SourceSwapFailedError(describeSwapFailure(swapped.error.reason)));
      }
      bridgedAsset = swapped.value.asset;
      bridgedAmount = swapped.value.amount;
      states.push('source_swapped');
    }

    const payload = encodeWirePayload({
      dstMaxGasPrice: params.dstMaxGasPriceInWeiForRelayer,
      dstMaxGas: fee.dstGasEstimate,
      record,
      swapPlan: swapPlanDst,
    });
    const nonce = this.config.nextNonce();

    const sequence = await fromPromise(
      this.transport.send({
        sender: this.self,
        asset: bridgedAsset,
        amount: bridgedAmount,
        dstChainId: params.dstChainId,
        dstContract: params.dstContract,
        nonce,
        payload,
        messageFee: fee.messageFee,
      }),
      (error) => new DispatchError(error instanceof Error ? error.message : String(error))
    );
    if (!sequence.ok) return sequence;
    states.push('dispatched');

    return ok({
      transactionId: record.transactionId,
      sequence: sequence.value,
      nonce,
      bridgedAsset,
      bridgedAmount,
      srcFee: fee.srcFee,
      refund: fee.refund,
      dstMaxGas: fee.dstGasEstimate,
      payload,
      states,
    });
  }
}
