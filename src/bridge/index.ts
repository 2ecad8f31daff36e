/**
 * Bridge module - Wormhole token-and-swap settlement
 */

// Types
export type {
  TransferRecord,
  SwapLeg,
  SwapPlan,
  BridgeParameters,
  WirePayload,
  CallContext,
  TransferState,
  RelayerFeeCheck,
  RelayerFeeQuote,
  TransferHandle,
  CompletionReceipt,
} from './types.js';

// Constants
export type { GasTable, WormholeChainName } from './constants.js';
export {
  WORMHOLE_ROUTE,
  WORMHOLE_CHAIN_IDS,
  DEFAULT_GAS_TABLE,
  DEFAULT_ACTUAL_RESERVE,
  DEFAULT_ESTIMATE_RESERVE,
  DEFAULT_RATIO_UPDATE_INTERVAL_MS,
  EVM_NATIVE_ASSET,
  wormholeChainName,
} from './constants.js';

// Errors
export type { BridgeRecoveryInfo, CodecErrorCode } from './errors.js';
export {
  BridgeError,
  CodecError,
  CodecLengthMismatchError,
  CodecValueOutOfRangeError,
  PaymentMismatchError,
  FeeCheckFailedError,
  UnknownDestinationChainError,
  SwapAmountMismatchError,
  SourceSwapFailedError,
  DispatchError,
  MessageRejectedError,
  ZeroDeliveryError,
  TokenMismatchError,
} from './errors.js';

// Observations
export type {
  SwapFailureReason,
  TransferStartedEvent,
  TransferCompletedEvent,
  TransferFailedEvent,
  BridgeInitializedEvent,
  ReserveUpdatedEvent,
  GasUpdatedEvent,
  TransferEvent,
  ConfigEvent,
  SettlementEvent,
  ObservationSink,
  MemorySink,
} from './events.js';
export { noopSink, createMemorySink, combineSinks } from './events.js';

// Wormhole
export * from './wormhole/index.js';
