import { describe, it, expect } from 'vitest';
import {
  BridgeError,
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
} from '../../src/bridge/errors.js';
import { SettlementError } from '../../src/errors.js';

describe('Bridge Errors', () => {
  describe('BridgeError', () => {
    it('should create a base bridge error', () => {
      const error = new BridgeError({ message: 'Test error' });

      expect(error).toBeInstanceOf(SettlementError);
      expect(error.code).toBe('BRIDGE_ERROR');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('BridgeError');
      expect(error.recovery).toEqual({
        fundsStatus: 'safe',
        canRetry: false,
        nextSteps: ['Check error details and try again'],
      });
    });

    it('should default canRetry to retryable', () => {
      const error = new BridgeError({ message: 'Busy', retryable: true });
      expect(error.recovery.canRetry).toBe(true);
    });
  });

  describe('codec errors', () => {
    it('should describe length mismatches', () => {
      const error = new CodecLengthMismatchError({ structure: 'TransferRecord', expected: 40, actual: 32 });

      expect(error.code).toBe('CODEC_LENGTH_MISMATCH');
      expect(error.message).toBe(
        'Length mismatch decoding TransferRecord: needed 40 bytes, input has 32'
      );
    });

    it('should describe out-of-range values', () => {
      const error = new CodecValueOutOfRangeError({ field: 'sourceChainId', value: '65536', bytes: 2 });

      expect(error.code).toBe('CODEC_VALUE_OUT_OF_RANGE');
      expect(error.message).toBe('sourceChainId = 65536 does not fit in 2 unsigned bytes');
    });

    it('should carry a reason in place of a width', () => {
      const error = new CodecValueOutOfRangeError({ field: 'callData', value: '0x1', reason: 'has an odd number of hex digits' });

      expect(error.code).toBe('CODEC_VALUE_OUT_OF_RANGE');
      expect(error.message).toBe('callData = 0x1 has an odd number of hex digits');
    });
  });

  describe('initiation errors', () => {
    it('should report a payment mismatch', () => {
      const error = new PaymentMismatchError({ attached: 5n, declared: 6n });

      expect(error.code).toBe('INSUFFICIENT_OR_EXCESS_PAYMENT');
      expect(error.message).toBe('Attached value 5 does not equal declared wormhole fee 6');
      expect(error.recovery.fundsStatus).toBe('safe');
    });

    it('should report the required value on a failed fee check', () => {
      const error = new FeeCheckFailedError({ attached: 10n, required: 25n, srcFee: 15n });

      expect(error.code).toBe('FEE_CHECK_FAILED');
      expect(error.retryable).toBe(true);
      expect(error.recovery.nextSteps).toContain('Attach at least 25');
    });

    it('should list configured destinations', () => {
      const error = new UnknownDestinationChainError(22, [4, 5]);
      expect(error.code).toBe('UNKNOWN_DESTINATION_CHAIN');
      expect(error.suggestion).toBe('Use one of the configured destinations: 4, 5');
    });

    it('should report swap amount mismatches', () => {
      const error = new SwapAmountMismatchError({ expected: 100n, actual: 99n });
      expect(error.message).toBe('First swap leg spends 99 but the transfer amount is 100');
    });

    it('should mark source swap and dispatch failures retryable', () => {
      expect(new SourceSwapFailedError('slippage').message).toBe('Source swap failed: slippage');
      expect(new SourceSwapFailedError('slippage').code).toBe('SWAP_FAILED');
      expect(new DispatchError('paused').retryable).toBe(true);
      expect(new DispatchError('paused').code).toBe('BRIDGE_DISPATCH_FAILED');
    });
  });

  describe('completion errors', () => {
    it('should leave rejected messages in flight', () => {
      const error = new MessageRejectedError('invalid VAA');
      expect(error.code).toBe('BRIDGE_MESSAGE_REJECTED');
      expect(error.recovery.fundsStatus).toBe('in_flight');
    });

    it('should escalate zero deliveries to support', () => {
      const error = new ZeroDeliveryError('0xaa');
      expect(error.code).toBe('ZERO_DELIVERY');
      expect(error.recovery.fundsStatus).toBe('requires_support');
    });

    it('should give stage-specific recovery for token mismatches', () => {
      const source = new TokenMismatchError({ expected: '0xaa', actual: '0xbb', stage: 'initiation' });
      const destination = new TokenMismatchError({ expected: '0xaa', actual: '0xbb' });

      expect(source.message).toBe('Asset 0xbb does not match expected 0xaa');
      expect(source.recovery.fundsStatus).toBe('safe');
      expect(source.recovery.canRetry).toBe(true);
      expect(destination.recovery.fundsStatus).toBe('in_flight');
      expect(destination.recovery.canRetry).toBe(false);
    });
  });
});
