import { describe, it, expect, beforeEach } from 'vitest';
import { RelayerFeeModel } from '../../../src/bridge/wormhole/fees.js';
import { WormholeConfig } from '../../../src/bridge/wormhole/config.js';
import { CachedPriceRatioOracle } from '../../../src/bridge/wormhole/oracle.js';
import { U256_MAX } from '../../../src/core/types.js';
import { BSC, ETHEREUM, TOKEN_BRIDGE, USDC, makeLeg, makeParams, makeRecord } from '../../fixtures.js';

// 32-byte id, 20-byte addresses: 160-byte record, 232-byte payload
const GAS = 220_000n + 68n * 232n;
const SRC_FEE = 1_296_768_000_000_000n;
const ESTIMATE_FEE = 1_414_656_000_000_000n;
const MESSAGE_FEE = 1_000n;
const AMOUNT = 1_000_000n;

describe('RelayerFeeModel', () => {
  let config: WormholeConfig;
  let oracle: CachedPriceRatioOracle;
  let model: RelayerFeeModel;

  beforeEach(() => {
    config = WormholeConfig.withDefaults({ tokenBridge: TOKEN_BRIDGE, chainId: ETHEREUM, destinations: [BSC] });
    oracle = new CachedPriceRatioOracle();
    oracle.setRatio(BSC, '0.5');
    model = new RelayerFeeModel({
      config,
      oracle,
      transport: { messageFee: () => Promise.resolve(MESSAGE_FEE) },
    });
  });

  describe('estimateCompletionGas', () => {
    it('charges base gas plus gas per payload byte', () => {
      expect(GAS).toBe(235_776n);
      expect(model.estimateCompletionGas(makeRecord(), makeParams(), [])).toEqual({ ok: true, value: GAS });
    });

    it('counts the destination swap plan', () => {
      const plan = [makeLeg({ callData: '0xdeadbeef' })];
      // 232 + 8 (section length) + 156 (leg)
      expect(model.estimateCompletionGas(makeRecord(), makeParams(), plan)).toEqual({
        ok: true,
        value: 220_000n + 68n * 396n,
      });
    });

    it('fails for a destination without a gas table', () => {
      const result = model.estimateCompletionGas(
        makeRecord({ destinationChainId: 22 }),
        makeParams({ dstChainId: 22 }),
        []
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('UNKNOWN_DESTINATION_CHAIN');
      }
    });
  });

  describe('checkRelayerFee', () => {
    it('accepts an exact payment with nothing to refund', async () => {
      const consumeValue = MESSAGE_FEE + AMOUNT + SRC_FEE;
      const result = await model.checkRelayerFee(makeRecord(), makeParams({ wormholeFee: consumeValue }), []);

      expect(consumeValue).toBe(1_296_768_001_001_000n);
      expect(result).toEqual({
        ok: true,
        value: {
          ok: true,
          srcFee: SRC_FEE,
          refund: 0n,
          messageFee: MESSAGE_FEE,
          dstGasEstimate: GAS,
          consumeValue,
        },
      });
    });

    it('refunds the surplus', async () => {
      const result = await model.checkRelayerFee(
        makeRecord(),
        makeParams({ wormholeFee: 1_300_000_000_000_000n }),
        []
      );
      expect(result.ok && result.value.refund).toBe(3_231_998_999_000n);
    });

    it('fails one wei short', async () => {
      const result = await model.checkRelayerFee(
        makeRecord(),
        makeParams({ wormholeFee: 1_296_768_001_000_999n }),
        []
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.ok).toBe(false);
        expect(result.value.refund).toBe(0n);
        expect(result.value.consumeValue).toBe(1_296_768_001_001_000n);
      }
    });

    it('does not count the amount of a token transfer', async () => {
      const result = await model.checkRelayerFee(
        makeRecord({ sendingAssetId: USDC }),
        makeParams({ wormholeFee: 0n }),
        []
      );
      expect(result.ok && result.value.consumeValue).toBe(MESSAGE_FEE + SRC_FEE);
    });

    it('uses the actual reserve', async () => {
      config.setReserve('1', '1.2');
      const result = await model.checkRelayerFee(makeRecord(), makeParams(), []);
      expect(result.ok && result.value.srcFee).toBe(1_178_880_000_000_000n);
    });

    it('reports a missing price ratio', async () => {
      const result = await model.checkRelayerFee(
        makeRecord({ destinationChainId: 5 }),
        makeParams({ dstChainId: 5 }),
        []
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('PRICE_RATIO_UNAVAILABLE');
      }
    });

    it('reports overflow instead of wrapping', async () => {
      const result = await model.checkRelayerFee(
        makeRecord(),
        makeParams({ dstMaxGasPriceInWeiForRelayer: U256_MAX }),
        []
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('ARITHMETIC_OVERFLOW');
      }
    });
  });

  describe('estimateRelayerFee', () => {
    it('quotes with the estimate reserve', async () => {
      const result = await model.estimateRelayerFee(makeRecord(), makeParams(), []);

      expect(result).toEqual({
        ok: true,
        value: {
          srcFee: ESTIMATE_FEE,
          messageFee: MESSAGE_FEE,
          dstMaxGas: GAS,
          consumeValue: ESTIMATE_FEE + MESSAGE_FEE + AMOUNT,
        },
      });
    });

    it('quotes enough to pass the check', async () => {
      const quote = await model.estimateRelayerFee(makeRecord(), makeParams(), []);
      if (!quote.ok) throw quote.error;

      const check = await model.checkRelayerFee(
        makeRecord(),
        makeParams({ wormholeFee: quote.value.consumeValue }),
        []
      );
      expect(check.ok && check.value.ok).toBe(true);
      expect(check.ok && check.value.refund).toBe(ESTIMATE_FEE - SRC_FEE);
    });
  });
});
