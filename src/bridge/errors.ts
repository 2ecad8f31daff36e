/**
 * Bridge-specific errors
 * Structured errors for both halves of a Wormhole settlement
 */

import { SettlementError } from '../errors.js';

/**
 * Where the user's funds are when an operation fails
 */
export interface BridgeRecoveryInfo {
  /** Current status of the funds */
  fundsStatus: 'safe' | 'in_flight' | 'requires_support';
  /** Whether the operation can be retried */
  canRetry: boolean;
  /** Ordered steps to recover from the error */
  nextSteps: string[];
}

/**
 * Base error class for all bridge-related errors
 */
export class BridgeError extends SettlementError {
  /** Recovery guidance */
  readonly recovery: BridgeRecoveryInfo;

  constructor(config: {
    code?: string;
    message: string;
    details?: Record<string, unknown>;
    suggestion?: string;
    retryable?: boolean;
    recovery?: Partial<BridgeRecoveryInfo>;
  }) {
    super({
      code: config.code ?? 'BRIDGE_ERROR',
      message: config.message,
      details: config.details,
      suggestion: config.suggestion ?? 'Check bridge parameters and try again',
      retryable: config.retryable ?? false,
    });
    this.name = 'BridgeError';

    this.recovery = {
      fundsStatus: config.recovery?.fundsStatus ?? 'safe',
      canRetry: config.recovery?.canRetry ?? config.retryable ?? false,
      nextSteps: config.recovery?.nextSteps ?? ['Check error details and try again'],
    };
  }
}

// ============ Codec Errors ============

export type CodecErrorCode = 'CODEC_LENGTH_MISMATCH' | 'CODEC_VALUE_OUT_OF_RANGE';

/**
 * Wire format violation
 */
export class CodecError extends BridgeError {
  declare readonly code: CodecErrorCode;

  constructor(config: {
    code: CodecErrorCode;
    message: string;
    details?: Record<string, unknown>;
  }) {
    super({
      code: config.code,
      message: config.message,
      details: config.details,
      suggestion: 'The payload was not produced by a compatible encoder',
      retryable: false,
    });
    this.name = 'CodecError';
  }
}

/**
 * Decoding consumed fewer or more bytes than the input holds
 */
export class CodecLengthMismatchError extends CodecError {
  constructor(config: { structure: string; expected: number; actual: number }) {
    super({
      code: 'CODEC_LENGTH_MISMATCH',
      message: `Length mismatch decoding ${config.structure}: needed ${String(config.expected)} bytes, input has ${String(config.actual)}`,
      details: config,
    });
    this.name = 'CodecLengthMismatchError';
  }
}

/**
 * A value does not fit its wire field
 */
export class CodecValueOutOfRangeError extends CodecError {
  constructor(config: { field: string; value: string } & ({ bytes: number } | { reason: string })) {
    const problem =
      'reason' in config ? config.reason : `does not fit in ${String(config.bytes)} unsigned bytes`;
    super({
      code: 'CODEC_VALUE_OUT_OF_RANGE',
      message: `${config.field} = ${config.value} ${problem}`,
      details: config,
    });
    this.name = 'CodecValueOutOfRangeError';
  }
}

// ============ Initiation Errors ============

/**
 * Attached native value differs from the declared wormhole fee
 */
export class PaymentMismatchError extends BridgeError {
  constructor(config: { attached: bigint; declared: bigint }) {
    super({
      code: 'INSUFFICIENT_OR_EXCESS_PAYMENT',
      message: `Attached value ${config.attached.toString()} does not equal declared wormhole fee ${config.declared.toString()}`,
      details: { attached: config.attached.toString(), declared: config.declared.toString() },
      suggestion: 'Attach exactly the wormholeFee from the bridge parameters',
      recovery: {
        fundsStatus: 'safe',
        canRetry: true,
        nextSteps: ['Set wormholeFee to the value you attach and resubmit'],
      },
    });
    this.name = 'PaymentMismatchError';
  }
}

/**
 * Attached value does not cover message fee, native input and relayer fee
 */
export class FeeCheckFailedError extends BridgeError {
  constructor(config: { attached: bigint; required: bigint; srcFee: bigint }) {
    super({
      code: 'FEE_CHECK_FAILED',
      message: `Attached value ${config.attached.toString()} is below required ${config.required.toString()}`,
      details: {
        attached: config.attached.toString(),
        required: config.required.toString(),
        srcFee: config.srcFee.toString(),
      },
      suggestion: 'Request a fresh relayer fee quote and attach at least the quoted value',
      retryable: true,
      recovery: {
        fundsStatus: 'safe',
        canRetry: true,
        nextSteps: [
          'Call estimateRelayerFee for an up-to-date quote',
          `Attach at least ${config.required.toString()}`,
        ],
      },
    });
    this.name = 'FeeCheckFailedError';
  }
}

/**
 * No gas table is configured for the destination
 */
export class UnknownDestinationChainError extends BridgeError {
  constructor(chainId: number, configured: number[]) {
    super({
      code: 'UNKNOWN_DESTINATION_CHAIN',
      message: `No gas table configured for destination chain ${String(chainId)}`,
      details: { chainId, configured },
      suggestion: configured.length > 0
        ? `Use one of the configured destinations: ${configured.join(', ')}`
        : 'Configure a gas table with setGas before bridging',
    });
    this.name = 'UnknownDestinationChainError';
  }
}

/**
 * First swap leg does not consume the amount it is supposed to
 */
export class SwapAmountMismatchError extends BridgeError {
  constructor(config: { expected: bigint; actual: bigint }) {
    super({
      code: 'SWAP_AMOUNT_MISMATCH',
      message: `First swap leg spends ${config.actual.toString()} but the transfer amount is ${config.expected.toString()}`,
      details: { expected: config.expected.toString(), actual: config.actual.toString() },
      suggestion: 'Set the first leg fromAmount to the transfer amount',
    });
    this.name = 'SwapAmountMismatchError';
  }
}

/**
 * Source-side swap failed; the initiation was rolled back
 */
export class SourceSwapFailedError extends BridgeError {
  constructor(reason: string) {
    super({
      code: 'SWAP_FAILED',
      message: `Source swap failed: ${reason}`,
      details: { reason },
      suggestion: 'Re-quote the swap and resubmit',
      retryable: true,
      recovery: {
        fundsStatus: 'safe',
        canRetry: true,
        nextSteps: ['Refresh the swap call data', 'Check router liquidity and slippage bounds'],
      },
    });
    this.name = 'SourceSwapFailedError';
  }
}

/**
 * Transport refused to dispatch the message
 */
export class DispatchError extends BridgeError {
  constructor(reason: string) {
    super({
      code: 'BRIDGE_DISPATCH_FAILED',
      message: `Bridge transport rejected the transfer: ${reason}`,
      details: { reason },
      retryable: true,
    });
    this.name = 'DispatchError';
  }
}

// ============ Completion Errors ============

/**
 * Transport could not verify or unwrap a message
 */
export class MessageRejectedError extends BridgeError {
  constructor(reason: string) {
    super({
      code: 'BRIDGE_MESSAGE_REJECTED',
      message: `Bridge message rejected: ${reason}`,
      details: { reason },
      suggestion: 'The message may be invalid or already redeemed',
      recovery: {
        fundsStatus: 'in_flight',
        canRetry: false,
        nextSteps: ['Check whether the transfer was already completed'],
      },
    });
    this.name = 'MessageRejectedError';
  }
}

/**
 * Nothing of the resolved asset is held after receipt
 */
export class ZeroDeliveryError extends BridgeError {
  constructor(asset: string) {
    super({
      code: 'ZERO_DELIVERY',
      message: `Received zero balance of ${asset}`,
      details: { asset },
      suggestion: 'Verify the message carried a non-zero transfer',
      recovery: {
        fundsStatus: 'requires_support',
        canRetry: false,
        nextSteps: ['Inspect the source transfer on the bridge explorer'],
      },
    });
    this.name = 'ZeroDeliveryError';
  }
}

/**
 * Delivered asset is not the one the record or swap plan expects
 */
export class TokenMismatchError extends BridgeError {
  constructor(config: { expected: string; actual: string; stage?: 'initiation' | 'completion' }) {
    const initiation = config.stage === 'initiation';
    super({
      code: 'TOKEN_MISMATCH',
      message: `Asset ${config.actual} does not match expected ${config.expected}`,
      details: { expected: config.expected, actual: config.actual },
      suggestion: initiation
        ? 'The first source swap leg must spend the sending asset'
        : 'The record receiving asset or first swap leg input must be the bridged asset',
      recovery: initiation
        ? { fundsStatus: 'safe', canRetry: true, nextSteps: ['Fix the swap plan and resubmit'] }
        : {
            fundsStatus: 'in_flight',
            canRetry: false,
            nextSteps: ['Contact support with the transaction id to recover the bridged funds'],
          },
    });
    this.name = 'TokenMismatchError';
  }
}
