import { describe, it, expect } from 'vitest';
import { SwapRouterRegistry } from '../../src/swap/router.js';
import { UnknownSwapRouterError } from '../../src/swap/errors.js';
import { ValidationError } from '../../src/errors.js';
import { InMemoryLedger } from '../../src/ledger/ledger.js';
import {
  AGGREGATOR,
  FakeVenue,
  ROUTER_V2,
  ROUTER_V3,
  aggregatorRouter,
  v2Router,
  v3Router,
} from '../fixtures.js';

describe('SwapRouterRegistry', () => {
  const venue = new FakeVenue(new InMemoryLedger());

  it('resolves registered routers by id, ignoring case', () => {
    const registry = new SwapRouterRegistry([v2Router(venue)]);
    const resolved = registry.resolve(`0x${'A1'.repeat(20)}`);

    expect(resolved.ok).toBe(true);
    if (resolved.ok) {
      expect(resolved.value.kind).toBe('uniswap-v2');
      expect(resolved.value.address).toBe(ROUTER_V2);
    }
  });

  it('returns an error for unknown routers', () => {
    const registry = new SwapRouterRegistry([v2Router(venue)]);
    const resolved = registry.resolve(ROUTER_V3);

    expect(resolved.ok).toBe(false);
    if (!resolved.ok) {
      expect(resolved.error).toBeInstanceOf(UnknownSwapRouterError);
      expect(resolved.error.code).toBe('UNKNOWN_SWAP_ROUTER');
      expect(resolved.error.details['registered']).toEqual([ROUTER_V2]);
    }
  });

  it('refuses to register an id twice', () => {
    const registry = new SwapRouterRegistry([v2Router(venue)]);

    expect(() => registry.register(v3Router(venue, ROUTER_V2))).toThrow(ValidationError);
    expect(registry.list()).toHaveLength(1);
  });

  it('lists routers by family', () => {
    const registry = new SwapRouterRegistry()
      .register(v2Router(venue))
      .register(v3Router(venue))
      .register(aggregatorRouter(venue));

    expect(registry.has(AGGREGATOR)).toBe(true);
    expect(registry.list().map((r) => r.kind)).toEqual(['uniswap-v2', 'uniswap-v3', 'aggregator']);
    expect(registry.list('uniswap-v3').map((r) => r.address)).toEqual([ROUTER_V3]);
  });
});
