/**
 * Relayer fee model
 *
 * The user prepays, in source native currency, the gas a relayer will spend
 * completing the transfer on the destination chain:
 *
 *   dstGas  = baseGas + gasPerByte * payloadLength
 *   dstFee  = dstGas * dstMaxGasPrice
 *   srcFee  = ((dstFee * ratio) / RAY) * reserve / RAY
 *
 * Each division truncates and the two steps are never merged; merging
 * them changes the rounding and the fee stops matching other deployments.
 */

import type { Hex } from '../../core/types.js';
import { hexEquals } from '../../core/hex.js';
import { RAY, addU256, mulDiv, mulU256 } from '../../core/units.js';
import { type Result, ok, err } from '../../core/result.js';
import { type Logger, noopLogger } from '../../core/logger.js';
import { type SettlementError, toSettlementError } from '../../errors.js';
import { EVM_NATIVE_ASSET } from '../constants.js';
import { UnknownDestinationChainError } from '../errors.js';
import type {
  BridgeParameters,
  RelayerFeeCheck,
  RelayerFeeQuote,
  SwapPlan,
  TransferRecord,
} from '../types.js';
import { encodeWirePayloadBytes } from './codec.js';
import type { WormholeConfig } from './config.js';
import type { PriceRatioOracle } from './oracle.js';
import type { BridgeTransport } from './transport.js';

export interface RelayerFeeModelConfig {
  config: WormholeConfig;
  oracle: PriceRatioOracle;
  transport: Pick<BridgeTransport, 'messageFee'>;
  /** Native asset id on this chain (default: EVM zero address) */
  nativeAsset?: Hex;
  logger?: Logger;
}

export class RelayerFeeModel {
  private readonly config: WormholeConfig;
  private readonly oracle: PriceRatioOracle;
  private readonly transport: Pick<BridgeTransport, 'messageFee'>;
  private readonly nativeAsset: Hex;
  private readonly logger: Logger;

  constructor(config: RelayerFeeModelConfig) {
    this.config = config.config;
    this.oracle = config.oracle;
    this.transport = config.transport;
    this.nativeAsset = config.nativeAsset ?? EVM_NATIVE_ASSET;
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Destination gas a completion of this transfer needs
   */
  estimateCompletionGas(
    record: TransferRecord,
    params: BridgeParameters,
    swapPlan: SwapPlan
  ): Result<bigint, SettlementError> {
    const gas = this.config.gasFor(params.dstChainId);
    if (!gas) {
      return err(new UnknownDestinationChainError(params.dstChainId, this.config.destinations));
    }

    try {
      // dstMaxGas is a fixed-width field, so a placeholder sizes the payload exactly
      const payloadLength = encodeWirePayloadBytes({
        dstMaxGasPrice: params.dstMaxGasPriceInWeiForRelayer,
        dstMaxGas: 0n,
        record,
        swapPlan,
      }).length;
      return ok(addU256(gas.baseGas, mulU256(gas.gasPerByte, BigInt(payloadLength))));
    } catch (error) {
      return err(toSettlementError(error));
    }
  }

  /**
   * Check the value attached to an initiation against what it has to cover
   * Refreshes the oracle's ratio for the destination.
   */
  async checkRelayerFee(
    record: TransferRecord,
    params: BridgeParameters,
    swapPlan: SwapPlan
  ): Promise<Result<RelayerFeeCheck, SettlementError>> {
    try {
      const ratio = await this.oracle.refreshRatio(params.dstChainId);

      const dstGas = this.estimateCompletionGas(record, params, swapPlan);
      if (!dstGas.ok) return dstGas;

      const srcFee = this.relayerFee(dstGas.value, params, ratio, this.config.actualReserve);
      const userInput = this.isNative(record.sendingAssetId) ? record.amount : 0n;
      const messageFee = await this.transport.messageFee();
      const consumeValue = addU256(addU256(messageFee, userInput), srcFee);

      const feeOk = consumeValue <= params.wormholeFee;
      const check: RelayerFeeCheck = {
        ok: feeOk,
        srcFee,
        refund: feeOk ? params.wormholeFee - consumeValue : 0n,
        messageFee,
        dstGasEstimate: dstGas.value,
        consumeValue,
      };

      this.logger.debug('Relayer fee checked', {
        dstChainId: params.dstChainId,
        ratio,
        dstGas: dstGas.value,
        srcFee,
        consumeValue,
        attached: params.wormholeFee,
        ok: feeOk,
      });
      return ok(check);
    } catch (error) {
      return err(toSettlementError(error));
    }
  }

  /**
   * Quote the value a caller should attach
   * Uses the estimate reserve and the stored ratio, so the quote can exceed
   * what checkRelayerFee later charges.
   */
  async estimateRelayerFee(
    record: TransferRecord,
    params: BridgeParameters,
    swapPlan: SwapPlan
  ): Promise<Result<RelayerFeeQuote, SettlementError>> {
    try {
      const ratio = await this.oracle.currentRatio(params.dstChainId);

      const dstGas = this.estimateCompletionGas(record, params, swapPlan);
      if (!dstGas.ok) return dstGas;

      const srcFee = this.relayerFee(dstGas.value, params, ratio, this.config.estimateReserve);
      const userInput = this.isNative(record.sendingAssetId) ? record.amount : 0n;
      const messageFee = await this.transport.messageFee();

      return ok({
        srcFee,
        messageFee,
        dstMaxGas: dstGas.value,
        consumeValue: addU256(addU256(messageFee, userInput), srcFee),
      });
    } catch (error) {
      return err(toSettlementError(error));
    }
  }

  private relayerFee(
    dstGas: bigint,
    params: BridgeParameters,
    ratio: bigint,
    reserve: bigint
  ): bigint {
    const dstFee = mulU256(dstGas, params.dstMaxGasPriceInWeiForRelayer);
    return mulDiv(mulDiv(dstFee, ratio, RAY), reserve, RAY);
  }

  private isNative(asset: Hex): boolean {
    return hexEquals(asset, this.nativeAsset);
  }
}
