/**
 * Swap router registry
 * Resolves a leg's callTo to exactly one known router variant
 */

import type { Hex } from '../core/types.js';
import { normalizeHex } from '../core/hex.js';
import { type Result, ok, err } from '../core/result.js';
import { ValidationError } from '../errors.js';
import { UnknownSwapRouterError } from './errors.js';
import type { SwapRouter, SwapRouterKind } from './types.js';

export class SwapRouterRegistry {
  private readonly routers = new Map<Hex, SwapRouter>();

  constructor(routers: readonly SwapRouter[] = []) {
    for (const router of routers) {
      this.register(router);
    }
  }

  /**
   * Register a router; an id can only be registered once
   */
  register(router: SwapRouter): this {
    const key = normalizeHex(router.address);
    const existing = this.routers.get(key);
    if (existing) {
      throw new ValidationError({
        code: 'DUPLICATE_SWAP_ROUTER',
        message: `Router ${router.address} is already registered as ${existing.kind}`,
        details: { address: router.address, kind: existing.kind },
      });
    }
    this.routers.set(key, router);
    return this;
  }

  /**
   * Resolve the router a leg calls into
   */
  resolve(callTo: Hex): Result<SwapRouter, UnknownSwapRouterError> {
    const router = this.routers.get(normalizeHex(callTo));
    if (!router) {
      return err(new UnknownSwapRouterError(callTo, [...this.routers.keys()]));
    }
    return ok(router);
  }

  has(callTo: Hex): boolean {
    return this.routers.has(normalizeHex(callTo));
  }

  /**
   * Registered routers, optionally filtered by family
   */
  list(kind?: SwapRouterKind): SwapRouter[] {
    const all = [...this.routers.values()];
    return kind ? all.filter((router) => router.kind === kind) : all;
  }
}
