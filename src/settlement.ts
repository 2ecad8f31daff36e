/**
 * Wormhole settlement facade
 * Wires configuration, fee model, initiator and completer around one ledger
 * and runs each operation to completion before the next one starts
 */

import type { Hex } from './core/types.js';
import { AsyncMutex } from './core/mutex.js';
import type { Result } from './core/result.js';
import { type Logger, createPrefixedLogger, noopLogger } from './core/logger.js';
import type { SettlementError } from './errors.js';
import type { AssetLedger } from './ledger/ledger.js';
import { SwapRouterRegistry } from './swap/router.js';
import { SwapExecutor } from './swap/executor.js';
import type { CallDataCorrector } from './swap/calldata.js';
import type { SwapRouter } from './swap/types.js';
import { EVM_NATIVE_ASSET, type GasTable } from './bridge/constants.js';
import { type ObservationSink, noopSink } from './bridge/events.js';
import type {
  BridgeParameters,
  CallContext,
  CompletionReceipt,
  RelayerFeeCheck,
  RelayerFeeQuote,
  SwapPlan,
  TransferHandle,
  TransferRecord,
} from './bridge/types.js';
import { WormholeConfig } from './bridge/wormhole/config.js';
import { RelayerFeeModel } from './bridge/wormhole/fees.js';
import type { PriceRatioOracle, ProtocolFeeSchedule } from './bridge/wormhole/oracle.js';
import type { BridgeTransport, NativeWrapper } from './bridge/wormhole/transport.js';
import { TransferInitiator } from './bridge/wormhole/initiator.js';
import { TransferCompleter } from './bridge/wormhole/completer.js';

export interface WormholeSettlementOptions {
  /** Token bridge this deployment talks to */
  tokenBridge: Hex;
  /** Wormhole chain id of this chain */
  chainId: number;
  transport: BridgeTransport;
  ledger: AssetLedger;
  oracle: PriceRatioOracle;
  feeSchedule: ProtocolFeeSchedule;
  /** Account that holds funds during settlement */
  settlementAccount: Hex;
  /** Account that collects relayer and protocol fees */
  feeRecipient: Hex;
  /** Swap routers, as a registry or a list to register */
  routers?: SwapRouterRegistry | readonly SwapRouter[];
  /** Swap call-data corrector; see SwapExecutorConfig.corrector for aggregator legs */
  corrector?: CallDataCorrector;
  /** Gas table per destination chain */
  gas?: Readonly<Record<number, GasTable>>;
  actualReserve?: string | bigint;
  estimateReserve?: string | bigint;
  nativeAsset?: Hex;
  nativeWrapper?: NativeWrapper;
  sink?: ObservationSink;
  logger?: Logger;
  now?: () => number;
}

export interface WormholeSettlement {
  readonly config: WormholeConfig;
  readonly feeModel: RelayerFeeModel;
  readonly initiator: TransferInitiator;
  readonly completer: TransferCompleter;
  readonly routers: SwapRouterRegistry;
  initiateTransfer(
    context: CallContext,
    record: TransferRecord,
    swapPlanSrc: SwapPlan,
    params: BridgeParameters,
    swapPlanDst: SwapPlan
  ): Promise<Result<TransferHandle, SettlementError>>;
  completeTransfer(rawMessage: Hex): Promise<Result<CompletionReceipt, SettlementError>>;
  checkRelayerFee(
    record: TransferRecord,
    params: BridgeParameters,
    swapPlanDst: SwapPlan
  ): Promise<Result<RelayerFeeCheck, SettlementError>>;
  estimateRelayerFee(
    record: TransferRecord,
    params: BridgeParameters,
    swapPlanDst: SwapPlan
  ): Promise<Result<RelayerFeeQuote, SettlementError>>;
}

/**
 * Build a settlement for one chain
 */
export function createWormholeSettlement(options: WormholeSettlementOptions): WormholeSettlement {
  const logger = options.logger ?? noopLogger;
  const sink = options.sink ?? noopSink;
  const nativeAsset = options.nativeAsset ?? EVM_NATIVE_ASSET;

  const config = new WormholeConfig({
    sink,
    logger: createPrefixedLogger(logger, 'wormhole-config'),
    actualReserve: options.actualReserve,
    estimateReserve: options.estimateReserve,
  });
  config.initialize(options.tokenBridge, options.chainId);
  const gasTables: Readonly<Record<number, GasTable>> = options.gas ?? {};
  for (const [dstChainId, gas] of Object.entries(gasTables)) {
    config.setGas(Number(dstChainId), gas.baseGas, gas.gasPerByte);
  }

  const routers =
    options.routers instanceof SwapRouterRegistry
      ? options.routers
      : new SwapRouterRegistry(options.routers ?? []);

  const swaps = new SwapExecutor({
    ledger: options.ledger,
    routers,
    corrector: options.corrector,
    logger: createPrefixedLogger(logger, 'swap-executor'),
  });

  const feeModel = new RelayerFeeModel({
    config,
    oracle: options.oracle,
    transport: options.transport,
    nativeAsset,
    logger: createPrefixedLogger(logger, 'relayer-fee'),
  });

  const initiator = new TransferInitiator({
    config,
    feeModel,
    transport: options.transport,
    ledger: options.ledger,
    swaps,
    settlementAccount: options.settlementAccount,
    feeRecipient: options.feeRecipient,
    nativeAsset,
    sink,
    logger: createPrefixedLogger(logger, 'wormhole-initiator'),
  });

  const completer = new TransferCompleter({
    config,
    transport: options.transport,
    ledger: options.ledger,
    swaps,
    feeSchedule: options.feeSchedule,
    settlementAccount: options.settlementAccount,
    feeRecipient: options.feeRecipient,
    nativeWrapper: options.nativeWrapper,
    sink,
    logger: createPrefixedLogger(logger, 'wormhole-completer'),
    now: options.now,
  });

  // One operation at a time: each runs as a single unit against the ledger
  const mutex = new AsyncMutex();

  return {
    config,
    feeModel,
    initiator,
    completer,
    routers,
    initiateTransfer: (context, record, swapPlanSrc, params, swapPlanDst) =>
      mutex.withLock(() =>
        initiator.initiateTransfer(context, record, swapPlanSrc, params, swapPlanDst)
      ),
    completeTransfer: (rawMessage) =>
      mutex.withLock(() => completer.completeTransfer(rawMessage)),
    checkRelayerFee: (record, params, swapPlanDst) =>
      mutex.withLock(() => feeModel.checkRelayerFee(record, params, swapPlanDst)),
    estimateRelayerFee: (record, params, swapPlanDst) =>
      feeModel.estimateRelayerFee(record, params, swapPlanDst),
  };
}

