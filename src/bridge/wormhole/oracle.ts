/**
 * Price ratio oracle and protocol fee schedule
 *
 * A price ratio converts destination native currency into source native
 * currency as a RAY value: srcAmount = dstAmount * ratio / RAY.
 */

import { LRUCache } from '../../core/cache.js';
import { RAY, assertUint256, mulDiv, toRay } from '../../core/units.js';
import { type Logger, noopLogger } from '../../core/logger.js';
import { ConfigurationError, ValidationError } from '../../errors.js';
import { DEFAULT_RATIO_UPDATE_INTERVAL_MS } from '../constants.js';

/**
 * Source of fresh price ratios
 */
export interface PriceRatioFeed {
  fetchRatio(dstChainId: number): Promise<bigint>;
}

/**
 * Price ratio capability consumed by the fee model
 */
export interface PriceRatioOracle {
  /** Ratio for charging; may refresh stored state */
  refreshRatio(dstChainId: number): Promise<bigint>;
  /** Ratio for quoting; never mutates */
  currentRatio(dstChainId: number): Promise<bigint>;
}

/**
 * Protocol fee taken on the destination chain before delivery
 */
export interface ProtocolFeeSchedule {
  protocolFeeFor(amount: bigint): Promise<bigint>;
}

export interface CachedPriceRatioOracleConfig {
  /** Feed that refreshRatio pulls from; without one only stored ratios are served */
  feed?: PriceRatioFeed;
  /** Age after which refreshRatio re-reads the feed (default: 60s) */
  updateIntervalMs?: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
  logger?: Logger;
}

/**
 * Ratio oracle keeping one ratio per destination chain
 */
export class CachedPriceRatioOracle implements PriceRatioOracle {
  private readonly feed?: PriceRatioFeed;
  private readonly cache: LRUCache<number, bigint>;
  private readonly logger: Logger;

  constructor(config: CachedPriceRatioOracleConfig = {}) {
    this.feed = config.feed;
    this.logger = config.logger ?? noopLogger;
    this.cache = new LRUCache<number, bigint>({
      maxSize: 1024,
      defaultTTL: config.updateIntervalMs ?? DEFAULT_RATIO_UPDATE_INTERVAL_MS,
      now: config.now,
    });
  }

  /**
   * Store a ratio directly (admin update or a push from an off-chain keeper)
   */
  setRatio(dstChainId: number, ratio: bigint | string): void {
    const value = toRay(ratio);
    if (value === 0n) {
      throw new ValidationError({
        code: 'INVALID_PRICE_RATIO',
        message: `Price ratio for chain ${String(dstChainId)} must be positive`,
        details: { dstChainId },
      });
    }
    this.cache.set(dstChainId, value);
  }

  async refreshRatio(dstChainId: number): Promise<bigint> {
    const entry = this.cache.peek(dstChainId);
    if (entry && !entry.expired) {
      return entry.value;
    }
    if (!this.feed) {
      if (entry) return entry.value;
      throw this.unavailable(dstChainId);
    }

    const ratio = await this.feed.fetchRatio(dstChainId);
    assertUint256(ratio, 'fetchRatio');
    this.cache.set(dstChainId, ratio);
    this.logger.debug('Price ratio refreshed', { dstChainId, ratio });
    return ratio;
  }

  async currentRatio(dstChainId: number): Promise<bigint> {
    const entry = this.cache.peek(dstChainId);
    if (!entry) {
      throw this.unavailable(dstChainId);
    }
    return Promise.resolve(entry.value);
  }

  private unavailable(dstChainId: number): ConfigurationError {
    return new ConfigurationError({
      code: 'PRICE_RATIO_UNAVAILABLE',
      message: `No price ratio known for chain ${String(dstChainId)}`,
      details: { dstChainId },
      suggestion: 'Configure a price feed or set the ratio before quoting',
    });
  }
}

/**
 * Protocol fee as a fixed RAY share of the delivered amount
 */
export class RatioFeeSchedule implements ProtocolFeeSchedule {
  readonly soFee: bigint;

  constructor(soFee: bigint | string) {
    this.soFee = toRay(soFee);
    if (this.soFee > RAY) {
      throw new ValidationError({
        code: 'INVALID_PROTOCOL_FEE',
        message: `Protocol fee ratio ${this.soFee.toString()} exceeds 100%`,
        details: { soFee: this.soFee.toString() },
      });
    }
  }

  async protocolFeeFor(amount: bigint): Promise<bigint> {
    return Promise.resolve(mulDiv(amount, this.soFee, RAY));
  }
}
