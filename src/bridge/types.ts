/**
 * Bridge types and interfaces
 * Transfer intent carried end-to-end plus the results of each settlement half
 */

import type { Hex } from '../core/types.js';

/**
 * Cross-chain transfer intent, created once per user request
 * and carried unchanged inside the wire payload
 */
export interface TransferRecord {
  /** Globally unique transfer id (opaque bytes) */
  readonly transactionId: Hex;
  /** Final recipient on the destination chain (raw bytes) */
  readonly receiver: Hex;
  /** Wormhole chain id of the source chain */
  readonly sourceChainId: number;
  /** Asset the user sends on the source chain */
  readonly sendingAssetId: Hex;
  /** Wormhole chain id of the destination chain */
  readonly destinationChainId: number;
  /** Asset the receiver expects on the destination chain */
  readonly receivingAssetId: Hex;
  /** Source amount in the sending asset's smallest unit */
  readonly amount: bigint;
}

/**
 * One step of a local swap plan
 */
export interface SwapLeg {
  /** Router the call is sent to */
  readonly callTo: Hex;
  /** Spender that must be approved for the input asset */
  readonly approveTo: Hex;
  /** Input asset */
  readonly sendingAssetId: Hex;
  /** Output asset */
  readonly receivingAssetId: Hex;
  /** Input amount */
  readonly fromAmount: bigint;
  /** Opaque router call data */
  readonly callData: Hex;
}

/**
 * Ordered swap legs, chained output -> input
 */
export type SwapPlan = readonly SwapLeg[];

/**
 * Parameters for the Wormhole leg of a transfer
 */
export interface BridgeParameters {
  /** Wormhole chain id of the destination */
  readonly dstChainId: number;
  /** Highest gas price the user funds the relayer for */
  readonly dstMaxGasPriceInWeiForRelayer: bigint;
  /** Native value the caller attaches to the initiation */
  readonly wormholeFee: bigint;
  /** Settlement contract on the destination (20 or 32 raw bytes) */
  readonly dstContract: Hex;
}

/**
 * Decoded wire payload
 */
export interface WirePayload {
  readonly dstMaxGasPrice: bigint;
  readonly dstMaxGas: bigint;
  readonly record: TransferRecord;
  /** Empty when no destination swap is planned */
  readonly swapPlan: SwapPlan;
}

/**
 * Caller of an initiation and the native value attached to it
 */
export interface CallContext {
  readonly caller: Hex;
  readonly value: bigint;
}

/**
 * Logical per-transfer states
 */
export type TransferState =
  | 'initiated'
  | 'source_swapped'
  | 'dispatched'
  | 'received'
  | 'fee_deducted'
  | 'destination_swapped'
  | 'destination_swap_failed'
  | 'refunded'
  | 'completed';

/**
 * Outcome of a relayer fee check
 */
export interface RelayerFeeCheck {
  /** Whether the attached value covers every cost */
  ok: boolean;
  /** Fee owed to the relayer, in source native currency */
  srcFee: bigint;
  /** Value returned to the caller (0 when not ok) */
  refund: bigint;
  /** Bridge message fee */
  messageFee: bigint;
  /** Destination gas the relayer is paid for */
  dstGasEstimate: bigint;
  /** Message fee + native user input + srcFee */
  consumeValue: bigint;
}

/**
 * Off-chain quote for the value a caller should attach
 */
export interface RelayerFeeQuote {
  /** Relayer fee computed with the estimate reserve */
  srcFee: bigint;
  /** Bridge message fee */
  messageFee: bigint;
  /** Destination gas estimate the payload will carry */
  dstMaxGas: bigint;
  /** Total native value to attach */
  consumeValue: bigint;
}

/**
 * Result of a successful initiation
 */
export interface TransferHandle {
  readonly transactionId: Hex;
  /** Sequence number assigned by the bridge transport */
  readonly sequence: bigint;
  /** Message nonce used for dispatch */
  readonly nonce: number;
  readonly bridgedAsset: Hex;
  readonly bridgedAmount: bigint;
  readonly srcFee: bigint;
  readonly refund: bigint;
  readonly dstMaxGas: bigint;
  /** Encoded wire payload handed to the transport */
  readonly payload: Hex;
  /** States visited by this initiation */
  readonly states: readonly TransferState[];
}

/**
 * Result of a completion that did not abort
 */
export interface CompletionReceipt {
  readonly transactionId: Hex;
  /** 'completed' when the planned route ran, 'refunded' when compensated */
  readonly outcome: 'completed' | 'refunded';
  /** Asset delivered to the receiver */
  readonly asset: Hex;
  /** Amount delivered to the receiver */
  readonly amount: bigint;
  readonly receiver: Hex;
  /** Protocol fee deducted before delivery */
  readonly protocolFee: bigint;
  readonly record: TransferRecord;
  /** States visited by this completion */
  readonly states: readonly TransferState[];
}
