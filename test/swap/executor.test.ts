import { describe, it, expect, beforeEach } from 'vitest';
import { SwapExecutor } from '../../src/swap/executor.js';
import { SwapRouterRegistry } from '../../src/swap/router.js';
import { SwapExecutionError } from '../../src/swap/errors.js';
import { InMemoryLedger } from '../../src/ledger/ledger.js';
import { createMemoryLogger } from '../../src/core/logger.js';
import { encodeFunctionCall, encodeParameters } from '../../src/core/abi.js';
import { concatHex } from '../../src/core/hex.js';
import type { Hex } from '../../src/core/types.js';
import type { SwapRouter } from '../../src/swap/types.js';
import {
  AGGREGATOR,
  DAI,
  FakeVenue,
  RECEIVER,
  ROUTER_V2,
  ROUTER_V3,
  SETTLEMENT,
  USDC,
  USDT,
  aggregatorRouter,
  makeLeg,
  v2Router,
  v3Router,
} from '../fixtures.js';

const DEADLINE = 1_700_000_000n;

function v2Call(amountIn: bigint): Hex {
  return encodeFunctionCall('swapExactTokensForTokens(uint256,uint256,address[],address,uint256)', [
    amountIn,
    0n,
    [USDC, USDT],
    RECEIVER,
    DEADLINE,
  ]);
}

function v3Call(amountIn: bigint): Hex {
  return concatHex(
    '0x04e45aaf',
    encodeParameters(
      ['address', 'address', 'uint24', 'address', 'uint256', 'uint256', 'uint160'],
      [USDT, DAI, 500n, RECEIVER, amountIn, 0n, 0n]
    )
  );
}

describe('SwapExecutor', () => {
  let ledger: InMemoryLedger;

  beforeEach(() => {
    ledger = new InMemoryLedger();
    ledger.mint(USDC, SETTLEMENT, 1000n);
  });

  function executor(...routers: SwapRouter[]): SwapExecutor {
    return new SwapExecutor({ ledger, routers: new SwapRouterRegistry(routers) });
  }

  describe('executeChain', () => {
    it('runs a single leg at its quoted amount', async () => {
      const venue = new FakeVenue(ledger);
      const leg = makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) });

      const result = await executor(v2Router(venue)).executeChain([leg], { account: SETTLEMENT });

      expect(result).toEqual({ ok: true, value: { asset: USDT, amount: 1000n, inputs: [1000n] } });
      expect(venue.calls[0]?.leg).toBe(leg);
      expect(venue.calls[0]?.context).toEqual({ account: SETTLEMENT });
      expect(ledger.balance(USDC, SETTLEMENT)).toBe(0n);
      expect(ledger.balance(USDT, SETTLEMENT)).toBe(1000n);
    });

    it('rebases the first leg onto a new input amount', async () => {
      const venue = new FakeVenue(ledger, { rate: { numerator: 2n, denominator: 1n } });
      const leg = makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) });

      const result = await executor(v2Router(venue)).executeChain([leg], {
        account: SETTLEMENT,
        amountIn: 800n,
      });

      expect(result).toEqual({ ok: true, value: { asset: USDT, amount: 1600n, inputs: [800n] } });
      expect(venue.calls[0]?.leg.fromAmount).toBe(800n);
      expect(venue.calls[0]?.leg.callData).toBe(v2Call(800n));
      expect(ledger.balance(USDC, SETTLEMENT)).toBe(200n);
    });

    it('feeds each measured output into the next leg', async () => {
      const first = new FakeVenue(ledger, { rate: { numerator: 1n, denominator: 2n } });
      const second = new FakeVenue(ledger, { rate: { numerator: 3n, denominator: 1n } });
      const legs = [
        makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) }),
        makeLeg({
          callTo: ROUTER_V3,
          approveTo: ROUTER_V3,
          sendingAssetId: USDT,
          receivingAssetId: DAI,
          fromAmount: 400n,
          callData: v3Call(400n),
        }),
      ];

      const result = await executor(v2Router(first), v3Router(second)).executeChain(legs, {
        account: SETTLEMENT,
      });

      expect(result).toEqual({ ok: true, value: { asset: DAI, amount: 1500n, inputs: [1000n, 500n] } });
      expect(second.calls[0]?.leg.callData).toBe(v3Call(500n));
      expect(ledger.balance(USDT, SETTLEMENT)).toBe(0n);
      expect(ledger.balance(DAI, SETTLEMENT)).toBe(1500n);
    });

    it('undoes earlier legs when a later leg fails', async () => {
      const first = new FakeVenue(ledger);
      const second = new FakeVenue(ledger, { failure: { kind: 'raw', data: '0x08c379a0' } });
      const legs = [
        makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) }),
        makeLeg({
          callTo: ROUTER_V3,
          sendingAssetId: USDT,
          receivingAssetId: DAI,
          fromAmount: 1000n,
          callData: v3Call(1000n),
        }),
      ];

      const result = await executor(v2Router(first), v3Router(second)).executeChain(legs, {
        account: SETTLEMENT,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SwapExecutionError);
        expect(result.error.legIndex).toBe(1);
        expect(result.error.reason).toEqual({ kind: 'raw', data: '0x08c379a0' });
        expect(result.error.message).toBe('Swap leg 1 failed: reverted with 0x08c379a0');
      }
      expect(ledger.balance(USDC, SETTLEMENT)).toBe(1000n);
      expect(ledger.balance(USDT, SETTLEMENT)).toBe(0n);
    });

    it('turns a rejecting venue into a leg failure', async () => {
      const venue = new FakeVenue(ledger, { rejectWith: 'pool paused' });
      const result = await executor(v2Router(venue)).executeChain(
        [makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) })],
        { account: SETTLEMENT }
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toEqual({ kind: 'reason', message: 'pool paused' });
      }
    });

    it('fails a leg that produces nothing', async () => {
      const venue = new FakeVenue(ledger, { rate: { numerator: 0n, denominator: 1n } });
      const result = await executor(v2Router(venue)).executeChain(
        [makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) })],
        { account: SETTLEMENT }
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(`Swap leg 0 failed: leg produced no ${USDT}`);
      }
      expect(ledger.balance(USDC, SETTLEMENT)).toBe(1000n);
    });

    it('trusts the ledger over the venue report', async () => {
      const logger = createMemoryLogger();
      const venue = new FakeVenue(ledger, { reportedOutput: 1n });
      const swaps = new SwapExecutor({
        ledger,
        routers: new SwapRouterRegistry([v2Router(venue)]),
        logger,
      });

      const result = await swaps.executeChain(
        [makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) })],
        { account: SETTLEMENT }
      );

      expect(result.ok && result.value.amount).toBe(1000n);
      expect(logger.entries.map((e) => e.message)).toContain(
        'Venue reported output differs from measured output'
      );
    });

    it('rejects an empty plan', async () => {
      const result = await executor().executeChain([], { account: SETTLEMENT });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Swap leg 0 failed: swap plan is empty');
      }
    });

    it('rejects an unknown router before touching balances', async () => {
      const result = await executor().executeChain([makeLeg({ fromAmount: 1000n })], {
        account: SETTLEMENT,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.legIndex).toBe(0);
        expect(result.error.details['cause']).toBe('UNKNOWN_SWAP_ROUTER');
      }
      expect(ledger.movements).toHaveLength(1);
    });

    it('rejects a broken chain without running any leg', async () => {
      const venue = new FakeVenue(ledger);
      const legs = [
        makeLeg({ fromAmount: 1000n, callData: v2Call(1000n) }),
        makeLeg({ sendingAssetId: DAI, receivingAssetId: USDC }),
      ];

      const result = await executor(v2Router(venue)).executeChain(legs, { account: SETTLEMENT });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.legIndex).toBe(1);
        expect(result.error.details['cause']).toBe('BROKEN_SWAP_CHAIN');
      }
      expect(venue.calls).toHaveLength(0);
    });

    it('runs aggregator legs only at their quoted amount', async () => {
      const venue = new FakeVenue(ledger);
      const leg = makeLeg({ callTo: AGGREGATOR, approveTo: AGGREGATOR, fromAmount: 1000n, callData: '0xdeadbeef' });
      const swaps = executor(aggregatorRouter(venue));

      const rebased = await swaps.executeChain([leg], { account: SETTLEMENT, amountIn: 900n });
      expect(rebased.ok).toBe(false);
      if (!rebased.ok) {
        expect(rebased.error.details['cause']).toBe('CALLDATA_UNCORRECTABLE');
      }
      expect(venue.calls).toHaveLength(0);

      const quoted = await swaps.executeChain([leg], { account: SETTLEMENT, amountIn: 1000n });
      expect(quoted.ok).toBe(true);
    });
  });

  describe('validateChain', () => {
    it('accepts chained legs', () => {
      const swaps = executor();
      const legs = [makeLeg(), makeLeg({ callTo: ROUTER_V2, sendingAssetId: USDT, receivingAssetId: DAI })];
      expect(swaps.validateChain(legs).ok).toBe(true);
    });

    it('points at the first leg that breaks the chain', () => {
      const swaps = executor();
      const result = swaps.validateChain([
        makeLeg(),
        makeLeg({ sendingAssetId: USDT, receivingAssetId: DAI }),
        makeLeg({ sendingAssetId: USDC, receivingAssetId: USDT }),
      ]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.index).toBe(2);
        expect(result.error.code).toBe('BROKEN_SWAP_CHAIN');
      }
    });
  });
});
