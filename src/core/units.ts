/**
 * Fixed-point units
 * Decimal parsing plus RAY (10^27) ratio arithmetic used by the fee model
 */

import { U256_MAX } from './types.js';
import { ArithmeticOverflowError } from '../errors.js';

/**
 * Number of decimals in a RAY ratio
 */
export const RAY_DECIMALS = 27;

/**
 * 1.0 expressed as a RAY ratio
 */
export const RAY = 10n ** 27n;

/**
 * Parse a decimal string with given decimals
 * e.g., parseUnits("1.5", 18) = 1500000000000000000n
 */
export function parseUnits(value: string, decimals: number): bigint {
  if (decimals < 0 || !Number.isInteger(decimals)) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }

  const normalized = value.trim();

  // Handle negative values
  const negative = normalized.startsWith('-');
  const abs = negative ? normalized.slice(1) : normalized;

  // Split by decimal point
  const parts = abs.split('.');

  if (parts.length > 2) {
    throw new Error(`Invalid number: ${value}`);
  }

  const intPart = parts[0] ?? '0';
  let fracPart = parts[1] ?? '';

  // Validate parts are numeric
  if (!/^\d*$/.test(intPart) || !/^\d*$/.test(fracPart) || intPart + fracPart === '') {
    throw new Error(`Invalid number: ${value}`);
  }

  // Truncate (not round) excess decimals
  if (fracPart.length > decimals) {
    fracPart = fracPart.slice(0, decimals);
  } else {
    fracPart = fracPart.padEnd(decimals, '0');
  }

  const result = BigInt(intPart + fracPart);

  return negative ? -result : result;
}

/**
 * Format a fixed-point value to a decimal string with given decimals
 * e.g., formatUnits(1500000000000000000n, 18) = "1.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
  if (decimals < 0 || !Number.isInteger(decimals)) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }
  if (decimals === 0) return value.toString();

  const negative = value < 0n;
  const abs = negative ? -value : value;

  const str = abs.toString().padStart(decimals + 1, '0');
  const intPart = str.slice(0, -decimals) || '0';
  const fracPart = str.slice(-decimals);

  // Remove trailing zeros from fractional part
  const trimmedFrac = fracPart.replace(/0+$/, '');

  const result = trimmedFrac ? `${intPart}.${trimmedFrac}` : intPart;
  return negative ? `-${result}` : result;
}

/**
 * Convert a ratio to RAY
 * Accepts a decimal string ("1.1"), a number, or an already scaled bigint
 */
export function toRay(ratio: string | number | bigint): bigint {
  if (typeof ratio === 'bigint') {
    assertUint256(ratio, 'toRay');
    return ratio;
  }
  const value = parseUnits(String(ratio), RAY_DECIMALS);
  assertUint256(value, 'toRay');
  return value;
}

/**
 * Format a RAY ratio as a decimal string
 */
export function formatRay(ray: bigint): string {
  return formatUnits(ray, RAY_DECIMALS);
}

/**
 * Throw unless value lies in [0, 2^256 - 1]
 */
export function assertUint256(value: bigint, operation: string): void {
  if (value < 0n || value > U256_MAX) {
    throw new ArithmeticOverflowError(operation, value);
  }
}

/**
 * Multiply then divide, truncating toward zero
 *
 * The product is computed at full width so it may exceed 256 bits,
 * but both operands and the quotient must fit uint256.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  assertUint256(a, 'mulDiv');
  assertUint256(b, 'mulDiv');
  if (denominator <= 0n) {
    throw new Error(`mulDiv denominator must be positive, got ${denominator.toString()}`);
  }
  const quotient = (a * b) / denominator;
  assertUint256(quotient, 'mulDiv');
  return quotient;
}

/**
 * Checked uint256 multiplication
 */
export function mulU256(a: bigint, b: bigint): bigint {
  assertUint256(a, 'mul');
  assertUint256(b, 'mul');
  const product = a * b;
  assertUint256(product, 'mul');
  return product;
}

/**
 * Checked uint256 addition
 */
export function addU256(a: bigint, b: bigint): bigint {
  assertUint256(a, 'add');
  assertUint256(b, 'add');
  const sum = a + b;
  assertUint256(sum, 'add');
  return sum;
}
