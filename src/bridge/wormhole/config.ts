/**
 * Wormhole fee configuration
 * Per-deployment settings read by every fee computation and mutated only
 * through the admin setters, each of which emits a configuration observation
 */

import type { Hex } from '../../core/types.js';
import { U16_MAX } from '../../core/types.js';
import { isHex } from '../../core/hex.js';
import { formatRay, toRay } from '../../core/units.js';
import { type Logger, noopLogger } from '../../core/logger.js';
import { ConfigurationError, NotInitializedError, ValidationError } from '../../errors.js';
import {
  DEFAULT_ACTUAL_RESERVE,
  DEFAULT_ESTIMATE_RESERVE,
  DEFAULT_GAS_TABLE,
  type GasTable,
} from '../constants.js';
import { type ObservationSink, noopSink } from '../events.js';

/**
 * Wormhole message nonces are 32-bit
 */
const NONCE_MODULUS = 2 ** 32;

export interface WormholeConfigOptions {
  /** Observation sink for configuration changes */
  sink?: ObservationSink;
  logger?: Logger;
  /** Actual reserve as a decimal ratio or RAY value (default: 1.1) */
  actualReserve?: string | bigint;
  /** Estimate reserve as a decimal ratio or RAY value (default: 1.2) */
  estimateReserve?: string | bigint;
  /** First nonce handed out (default: 0) */
  initialNonce?: number;
}

interface BridgeBinding {
  tokenBridge: Hex;
  chainId: number;
}

export class WormholeConfig {
  private binding?: BridgeBinding;
  private reserves: { actual: bigint; estimate: bigint };
  private readonly gas = new Map<number, GasTable>();
  private nonce: number;
  private readonly sink: ObservationSink;
  private readonly logger: Logger;

  constructor(options: WormholeConfigOptions = {}) {
    this.sink = options.sink ?? noopSink;
    this.logger = options.logger ?? noopLogger;
    this.reserves = {
      actual: toRay(options.actualReserve ?? DEFAULT_ACTUAL_RESERVE),
      estimate: toRay(options.estimateReserve ?? DEFAULT_ESTIMATE_RESERVE),
    };
    this.nonce = options.initialNonce ?? 0;
  }

  /**
   * Configuration of the reference deployment: default reserves and the
   * default gas table for every listed destination
   */
  static withDefaults(config: {
    tokenBridge: Hex;
    chainId: number;
    destinations: readonly number[];
    options?: WormholeConfigOptions;
  }): WormholeConfig {
    const wormhole = new WormholeConfig(config.options);
    wormhole.initialize(config.tokenBridge, config.chainId);
    for (const dstChainId of config.destinations) {
      wormhole.setGas(dstChainId, DEFAULT_GAS_TABLE.baseGas, DEFAULT_GAS_TABLE.gasPerByte);
    }
    return wormhole;
  }

  // ============ Admin surface ============

  /**
   * Bind the token bridge and this chain's Wormhole id; allowed once
   */
  initialize(tokenBridge: Hex, chainId: number): void {
    if (this.binding) {
      throw new ConfigurationError({
        code: 'ALREADY_INITIALIZED',
        message: `Wormhole config is already bound to chain ${String(this.binding.chainId)}`,
        details: { ...this.binding },
      });
    }
    if (!isHex(tokenBridge) || tokenBridge.length <= 2) {
      throw new ValidationError({
        message: `Token bridge must be a non-empty hex id, got ${String(tokenBridge)}`,
        details: { tokenBridge },
      });
    }
    assertChainId(chainId, 'chainId');

    this.binding = { tokenBridge, chainId };
    this.logger.info('Wormhole config initialized', { tokenBridge, chainId });
    this.sink.emit({ type: 'BridgeInitialized', tokenBridge, chainId });
  }

  /**
   * Replace both reserve multipliers
   */
  setReserve(actualReserve: string | bigint, estimateReserve: string | bigint): void {
    const actual = toRay(actualReserve);
    const estimate = toRay(estimateReserve);
    if (actual === 0n || estimate === 0n) {
      throw new ValidationError({
        code: 'INVALID_RESERVE',
        message: 'Reserve multipliers must be positive',
        details: { actualReserve: formatRay(actual), estimateReserve: formatRay(estimate) },
      });
    }
    this.reserves = { actual, estimate };
    this.logger.info('Reserves updated', {
      actualReserve: formatRay(actual),
      estimateReserve: formatRay(estimate),
    });
    this.sink.emit({ type: 'ReserveUpdated', actualReserve: actual, estimateReserve: estimate });
  }

  /**
   * Set the gas table for one destination chain
   */
  setGas(dstChainId: number, baseGas: bigint, gasPerByte: bigint): void {
    assertChainId(dstChainId, 'dstChainId');
    if (baseGas < 0n || gasPerByte < 0n) {
      throw new ValidationError({
        code: 'INVALID_GAS_TABLE',
        message: `Gas table values must be non-negative for chain ${String(dstChainId)}`,
        details: { dstChainId, baseGas: baseGas.toString(), gasPerByte: gasPerByte.toString() },
      });
    }
    const gas: GasTable = { baseGas, gasPerByte };
    this.gas.set(dstChainId, gas);
    this.logger.info('Gas table updated', { dstChainId, baseGas, gasPerByte });
    this.sink.emit({ type: 'GasUpdated', dstChainId, gas });
  }

  // ============ Reads ============

  get isInitialized(): boolean {
    return this.binding !== undefined;
  }

  get tokenBridge(): Hex {
    return this.bound().tokenBridge;
  }

  /** Wormhole chain id of this chain */
  get chainId(): number {
    return this.bound().chainId;
  }

  get actualReserve(): bigint {
    return this.reserves.actual;
  }

  get estimateReserve(): bigint {
    return this.reserves.estimate;
  }

  gasFor(dstChainId: number): GasTable | undefined {
    return this.gas.get(dstChainId);
  }

  /** Destination chains with a gas table, ascending */
  get destinations(): number[] {
    return [...this.gas.keys()].sort((a, b) => a - b);
  }

  /**
   * Hand out the next message nonce
   */
  nextNonce(): number {
    const nonce = this.nonce;
    this.nonce = (this.nonce + 1) % NONCE_MODULUS;
    return nonce;
  }

  private bound(): BridgeBinding {
    if (!this.binding) {
      throw new NotInitializedError('WormholeConfig');
    }
    return this.binding;
  }
}

function assertChainId(chainId: number, field: string): void {
  if (!Number.isInteger(chainId) || chainId < 0 || chainId > U16_MAX) {
    throw new ValidationError({
      code: 'INVALID_CHAIN_ID',
      message: `${field} must be a 16-bit unsigned integer, got ${String(chainId)}`,
      details: { [field]: chainId },
    });
  }
}
