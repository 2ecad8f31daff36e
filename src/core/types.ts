/**
 * Core type definitions for the settlement library
 */

// Hex string type (0x prefixed)
export type Hex = `0x${string}`;

// Address is a 20-byte hex string
export type Address = Hex & { readonly __brand: 'Address' };

// Hash is a 32-byte hex string
export type Hash = Hex & { readonly __brand: 'Hash' };

// ABI parameter as it appears in a function fragment
export interface ABIParameter {
  readonly name: string;
  readonly type: string;
}

// Largest value representable by a uint256 word
export const U256_MAX = (1n << 256n) - 1n;

// Largest value representable by a uint64 length prefix
export const U64_MAX = (1n << 64n) - 1n;

// Largest value representable by a uint16 chain id
export const U16_MAX = 0xffff;
