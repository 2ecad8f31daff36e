/**
 * wormhole-swap-settlement
 * Settlement logic for cross-chain token transfers with swaps on either side
 */

// Core primitives
export * from './core/index.js';

// Errors
export type { ErrorDetails } from './errors.js';
export {
  SettlementError,
  ValidationError,
  InvalidAmountError,
  ConfigurationError,
  NotInitializedError,
  ArithmeticOverflowError,
  UnexpectedError,
  toSettlementError,
} from './errors.js';

// Custody
export * from './ledger/index.js';

// Swaps
export * from './swap/index.js';

// Bridge
export * from './bridge/index.js';

// Facade
export type { WormholeSettlementOptions, WormholeSettlement } from './settlement.js';
export { createWormholeSettlement } from './settlement.js';
