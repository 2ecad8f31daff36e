/**
 * Core primitives layer
 * Byte, number and hashing building blocks shared by every module
 */

// Types
export type { Hex, Address, Hash, ABIParameter } from './types.js';
export { U256_MAX, U64_MAX, U16_MAX } from './types.js';

// Hex utilities
export {
  isHex,
  assertHex,
  bytesToHex,
  hexToBytes,
  toBytes,
  bigIntToBytes,
  bytesToBigInt,
  padHex,
  concatHex,
  hexLength,
  normalizeHex,
  hexEquals,
  stringToHex,
  hexToString,
} from './hex.js';

// Hash functions
export { keccak256, functionSelector } from './hash.js';

// Address utilities
export {
  isAddress,
  assertAddress,
  addressEquals,
  isZeroAddress,
  ZERO_ADDRESS,
  toUniversalAddress,
  isPaddedAddress,
  extractAddress,
} from './address.js';

// ABI encoding
export {
  encodeFunctionCall,
  decodeFunctionCall,
  encodeParameters,
  decodeParameters,
} from './abi.js';

// Units and RAY arithmetic
export {
  RAY,
  RAY_DECIMALS,
  parseUnits,
  formatUnits,
  toRay,
  formatRay,
  assertUint256,
  mulDiv,
  mulU256,
  addU256,
} from './units.js';

// Result type
export type { Ok, Err, Result } from './result.js';
export { ok, err, fromPromise } from './result.js';

// Logging
export type { LogLevel, LogContext, Logger, LogEntry, MemoryLogger } from './logger.js';
export {
  noopLogger,
  consoleLogger,
  createPrefixedLogger,
  withMinLevel,
  serializeContext,
  createMemoryLogger,
} from './logger.js';

// Caching and concurrency
export { LRUCache } from './cache.js';
export type { LRUCacheOptions } from './cache.js';
export { AsyncMutex } from './mutex.js';
