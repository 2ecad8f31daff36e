/**
 * Address utilities
 * EVM address checks and the 32-byte universal form Wormhole uses
 * for addresses of every chain
 */

import type { Address, Hex } from './types.js';
import { hexLength, isHex } from './hex.js';

/**
 * Check if a string is a valid EVM address (with or without checksum)
 */
export function isAddress(value: unknown): value is Address {
  if (typeof value !== 'string') return false;
  if (!value.startsWith('0x')) return false;
  if (value.length !== 42) return false;
  return isHex(value);
}

/**
 * Assert that a value is a valid EVM address
 */
export function assertAddress(value: unknown, name = 'address'): asserts value is Address {
  if (!isAddress(value)) {
    throw new Error(
      `${name} must be a valid EVM address (0x followed by 40 hex characters), got: ${String(value)}`
    );
  }
}

/**
 * Compare two addresses (case-insensitive)
 */
export function addressEquals(a: string, b: string): boolean {
  if (!isAddress(a) || !isAddress(b)) return false;
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * The zero address constant
 */
export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000' as Address;

/**
 * Check if an address is the zero address
 */
export function isZeroAddress(address: string): boolean {
  return addressEquals(address, ZERO_ADDRESS);
}

/**
 * Left-pad a 20-byte address (or any shorter identifier) to the
 * 32-byte universal address form
 */
export function toUniversalAddress(hex: Hex): Hex {
  if (!isHex(hex)) {
    throw new Error(`Invalid hex value: ${String(hex)}`);
  }
  if (hexLength(hex) > 32) {
    throw new Error(`Value too large for a universal address: ${hex}`);
  }
  return `0x${hex.slice(2).toLowerCase().padStart(64, '0')}`;
}

/**
 * Whether a 32-byte universal address wraps a 20-byte EVM address
 */
export function isPaddedAddress(hex: Hex): boolean {
  return isHex(hex) && hex.length === 66 && /^0{24}$/.test(hex.slice(2, 26));
}

/**
 * Extract address from a 32-byte word (universal addresses, ABI words)
 */
export function extractAddress(word: string): Address {
  if (!isHex(word)) {
    throw new Error(`Invalid hex value: ${word}`);
  }

  // Take last 40 characters (20 bytes)
  const hexPart = word.slice(2);
  const addressPart = hexPart.slice(-40);

  // Leading bytes must be zero
  const leadingPart = hexPart.slice(0, -40);
  if (leadingPart && !/^0*$/.test(leadingPart)) {
    throw new Error(`Invalid address word (non-zero leading bytes): ${word}`);
  }

  return `0x${addressPart.toLowerCase()}` as Address;
}
