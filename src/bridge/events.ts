/**
 * Settlement observations
 * Events emitted by the initiator, the completer and the admin surface
 */

import type { Hex } from '../core/types.js';
import type { TransferRecord } from './types.js';
import type { GasTable } from './constants.js';
import type { SwapFailure } from '../swap/types.js';

/**
 * Why a destination swap failed
 */
export type SwapFailureReason = SwapFailure;

export interface TransferStartedEvent {
  readonly type: 'TransferStarted';
  readonly transactionId: Hex;
  readonly route: string;
  readonly hadSourceSwap: boolean;
  readonly hadDestinationSwap: boolean;
  readonly record: TransferRecord;
}

export interface TransferCompletedEvent {
  readonly type: 'TransferCompleted';
  readonly transactionId: Hex;
  readonly asset: Hex;
  readonly receiver: Hex;
  readonly amount: bigint;
  /** Milliseconds since epoch */
  readonly timestamp: number;
  readonly record: TransferRecord;
}

export interface TransferFailedEvent {
  readonly type: 'TransferFailed';
  readonly transactionId: Hex;
  readonly reason: SwapFailureReason;
  readonly record: TransferRecord;
}

export interface BridgeInitializedEvent {
  readonly type: 'BridgeInitialized';
  readonly tokenBridge: Hex;
  readonly chainId: number;
}

export interface ReserveUpdatedEvent {
  readonly type: 'ReserveUpdated';
  readonly actualReserve: bigint;
  readonly estimateReserve: bigint;
}

export interface GasUpdatedEvent {
  readonly type: 'GasUpdated';
  readonly dstChainId: number;
  readonly gas: GasTable;
}

export type TransferEvent = TransferStartedEvent | TransferCompletedEvent | TransferFailedEvent;
export type ConfigEvent = BridgeInitializedEvent | ReserveUpdatedEvent | GasUpdatedEvent;
export type SettlementEvent = TransferEvent | ConfigEvent;

/**
 * Receiver of settlement observations
 */
export interface ObservationSink {
  emit(event: SettlementEvent): void;
}

/**
 * Sink that discards every observation
 */
/* eslint-disable @typescript-eslint/no-empty-function */
export const noopSink: ObservationSink = {
  emit: () => {},
};
/* eslint-enable @typescript-eslint/no-empty-function */

/**
 * Sink that records observations in order
 */
export interface MemorySink extends ObservationSink {
  readonly events: readonly SettlementEvent[];
  ofType<T extends SettlementEvent['type']>(type: T): Array<Extract<SettlementEvent, { type: T }>>;
  clear(): void;
}

export function createMemorySink(): MemorySink {
  const events: SettlementEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
    ofType<T extends SettlementEvent['type']>(type: T) {
      return events.filter((e): e is Extract<SettlementEvent, { type: T }> => e.type === type);
    },
    clear() {
      events.length = 0;
    },
  };
}

/**
 * Fan one observation out to several sinks
 */
export function combineSinks(...sinks: ObservationSink[]): ObservationSink {
  return {
    emit(event) {
      for (const sink of sinks) sink.emit(event);
    },
  };
}
