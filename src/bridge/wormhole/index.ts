/**
 * Wormhole settlement
 */

export {
  encodeTransferRecord,
  decodeTransferRecord,
  encodeSwapLegs,
  decodeSwapLegs,
  encodeBridgeParameters,
  decodeBridgeParameters,
  encodeWirePayload,
  encodeWirePayloadBytes,
  decodeWirePayload,
} from './codec.js';
export { ByteReader, ByteWriter, decodeExact } from './serde.js';

export type { WormholeConfigOptions } from './config.js';
export { WormholeConfig } from './config.js';

export type {
  PriceRatioFeed,
  PriceRatioOracle,
  ProtocolFeeSchedule,
  CachedPriceRatioOracleConfig,
} from './oracle.js';
export { CachedPriceRatioOracle, RatioFeeSchedule } from './oracle.js';

export type {
  BridgeTransport,
  NativeWrapper,
  TokenTransferRequest,
  ReceivedTransfer,
} from './transport.js';

export type { RelayerFeeModelConfig } from './fees.js';
export { RelayerFeeModel } from './fees.js';

export type { TransferInitiatorConfig } from './initiator.js';
export { TransferInitiator } from './initiator.js';

export type { TransferCompleterConfig } from './completer.js';
export { TransferCompleter } from './completer.js';
