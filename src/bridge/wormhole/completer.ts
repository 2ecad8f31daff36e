/**
 * Transfer completer
 * Destination half of a settlement: redeem the bridged funds, take the
 * protocol fee, optionally swap, and deliver to the receiver. A failed
 * destination swap is compensated by delivering the received asset instead.
 */

import type { Hex } from '../../core/types.js';
import { hexEquals } from '../../core/hex.js';
import { extractAddress, isPaddedAddress } from '../../core/address.js';
import { type Result, ok, err, fromPromise } from '../../core/result.js';
import { type Logger, noopLogger } from '../../core/logger.js';
import { type SettlementError, toSettlementError } from '../../errors.js';
import type { AssetLedger } from '../../ledger/ledger.js';
import type { SwapExecutor } from '../../swap/executor.js';
import { MessageRejectedError, TokenMismatchError, ZeroDeliveryError } from '../errors.js';
import { type ObservationSink, type TransferEvent, noopSink } from '../events.js';
import type { CompletionReceipt, TransferRecord, TransferState, WirePayload } from '../types.js';
import { decodeWirePayload } from './codec.js';
import type { WormholeConfig } from './config.js';
import type { ProtocolFeeSchedule } from './oracle.js';
import type { BridgeTransport, NativeWrapper } from './transport.js';

export interface TransferCompleterConfig {
  config: WormholeConfig;
  transport: BridgeTransport;
  ledger: AssetLedger;
  swaps: SwapExecutor;
  feeSchedule: ProtocolFeeSchedule;
  /** Account the bridge redeems into */
  settlementAccount: Hex;
  /** Account that receives protocol fees */
  feeRecipient: Hex;
  /** Unwraps wrapped native tokens when the receiver expects native currency */
  nativeWrapper?: NativeWrapper;
  sink?: ObservationSink;
  logger?: Logger;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

interface Delivery {
  asset: Hex;
  amount: bigint;
}

export class TransferCompleter {
  private readonly config: WormholeConfig;
  private readonly transport: BridgeTransport;
  private readonly ledger: AssetLedger;
  private readonly swaps: SwapExecutor;
  private readonly feeSchedule: ProtocolFeeSchedule;
  private readonly self: Hex;
  private readonly feeRecipient: Hex;
  private readonly nativeWrapper?: NativeWrapper;
  private readonly sink: ObservationSink;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: TransferCompleterConfig) {
    this.config = config.config;
    this.transport = config.transport;
    this.ledger = config.ledger;
    this.swaps = config.swaps;
    this.feeSchedule = config.feeSchedule;
    this.self = config.settlementAccount;
    this.feeRecipient = config.feeRecipient;
    this.nativeWrapper = config.nativeWrapper;
    this.sink = config.sink ?? noopSink;
    this.logger = config.logger ?? noopLogger;
    this.now = config.now ?? Date.now;
  }

  /**
   * Complete a transfer from a raw bridge message
   *
   * Anyone may call this. Aborts (rejected message, bad payload, zero
   * delivery, asset mismatch) leave every balance untouched; a failed
   * destination swap does not abort.
   */
  async completeTransfer(rawMessage: Hex): Promise<Result<CompletionReceipt, SettlementError>> {
    const events: TransferEvent[] = [];

    let result: Result<CompletionReceipt, SettlementError>;
    try {
      result = await this.ledger.atomic<CompletionReceipt, SettlementError>(() =>
        this.settle(rawMessage, events)
      );
    } catch (error) {
      result = err(toSettlementError(error));
    }

    if (!result.ok) {
      this.logger.error('Transfer completion aborted', {
        code: result.error.code,
        message: result.error.message,
      });
      return result;
    }

    for (const event of events) {
      this.sink.emit(event);
    }
    const receipt = result.value;
    this.logger.info(receipt.outcome === 'completed' ? 'Transfer completed' : 'Transfer refunded', {
      transactionId: receipt.transactionId,
      receiver: receipt.receiver,
      asset: receipt.asset,
      amount: receipt.amount,
      protocolFee: receipt.protocolFee,
    });
    return ok(receipt);
  }

  private async settle(
    rawMessage: Hex,
    events: TransferEvent[]
  ): Promise<Result<CompletionReceipt, SettlementError>> {
    const received = await fromPromise(
      this.transport.receiveAndUnwrap(rawMessage, this.self),
      (error) => new MessageRejectedError(error instanceof Error ? error.message : String(error))
    );
    if (!received.ok) return received;
    const states: TransferState[] = ['received'];

    const decoded = decodeWirePayload(received.value.payload);
    if (!decoded.ok) return decoded;
    const { record, swapPlan } = decoded.value;

    const delivery = await this.resolveDelivery(
      received.value.tokenChain,
      received.value.tokenAddress,
      decoded.value
    );
    if (!delivery.ok) return delivery;
    let { asset } = delivery.value;
    const { amount } = delivery.value;

    const expected = swapPlan[0]?.sendingAssetId ?? record.receivingAssetId;
    if (this.nativeWrapper && this.shouldUnwrap(asset, expected, this.nativeWrapper)) {
      await this.nativeWrapper.unwrap(this.self, amount);
      asset = this.nativeWrapper.nativeAsset;
    }

    // Checked before the fee moves so a mismatch aborts with nothing paid
    if (!hexEquals(asset, expected)) {
      return err(new TokenMismatchError({ expected, actual: asset }));
    }

    const soFee = await this.feeSchedule.protocolFeeFor(amount);
    const protocolFee = soFee > 0n && soFee < amount ? soFee : 0n;
    if (protocolFee > 0n) {
      await this.ledger.transfer(asset, this.self, this.feeRecipient, protocolFee);
    }
    const postFee = amount - protocolFee;
    states.push('fee_deducted');

    if (swapPlan.length === 0) {
      await this.deliver(record, { asset, amount: postFee }, events);
      states.push('completed');
      return ok(this.receipt(record, 'completed', { asset, amount: postFee }, protocolFee, states));
    }

    const swapped = await this.swaps.executeChain(swapPlan, { account: this.self, amountIn: postFee });
    if (swapped.ok) {
      states.push('destination_swapped');
      const output = { asset: swapped.value.asset, amount: swapped.value.amount };
      await this.deliver(record, output, events);
      states.push('completed');
      return ok(this.receipt(record, 'completed', output, protocolFee, states));
    }

    // Compensation: the swap chain has been rolled back, hand over what was received
    states.push('destination_swap_failed');
    this.logger.warn('Destination swap failed, delivering received asset', {
      transactionId: record.transactionId,
      leg: swapped.error.legIndex,
      reason: swapped.error.reason,
    });
    await this.ledger.transfer(asset, this.self, record.receiver, postFee);
    events.push({
      type: 'TransferFailed',
      transactionId: record.transactionId,
      reason: swapped.error.reason,
      record,
    });
    states.push('refunded');
    return ok(this.receipt(record, 'refunded', { asset, amount: postFee }, protocolFee, states));
  }

  /**
   * Local asset the bridge redeemed and how much of it the account holds
   */
  private async resolveDelivery(
    tokenChain: number,
    tokenAddress: Hex,
    payload: WirePayload
  ): Promise<Result<Delivery, SettlementError>> {
    // Tokens native to this chain arrive as universal addresses
    const asset =
      tokenChain === this.config.chainId
        ? isPaddedAddress(tokenAddress)
          ? extractAddress(tokenAddress)
          : tokenAddress
        : await this.transport.wrappedAsset(tokenChain, tokenAddress);

    const amount = await this.ledger.balanceOf(asset, this.self);
    if (amount === 0n) {
      this.logger.warn('Nothing received for transfer', {
        transactionId: payload.record.transactionId,
        asset,
      });
      return err(new ZeroDeliveryError(asset));
    }
    return ok({ asset, amount });
  }

  private shouldUnwrap(asset: Hex, expected: Hex, wrapper: NativeWrapper): boolean {
    return hexEquals(asset, wrapper.wrappedAsset) && hexEquals(expected, wrapper.nativeAsset);
  }

  private async deliver(
    record: TransferRecord,
    delivery: Delivery,
    events: TransferEvent[]
  ): Promise<void> {
    await this.ledger.transfer(delivery.asset, this.self, record.receiver, delivery.amount);
    events.push({
      type: 'TransferCompleted',
      transactionId: record.transactionId,
      asset: delivery.asset,
      receiver: record.receiver,
      amount: delivery.amount,
      timestamp: this.now(),
      record,
    });
  }

  private receipt(
    record: TransferRecord,
    outcome: CompletionReceipt['outcome'],
    delivery: Delivery,
    protocolFee: bigint,
    states: TransferState[]
  ): CompletionReceipt {
    return {
      transactionId: record.transactionId,
      outcome,
      asset: delivery.asset,
      amount: delivery.amount,
      receiver: record.receiver,
      protocolFee,
      record,
      states,
    };
  }
}
