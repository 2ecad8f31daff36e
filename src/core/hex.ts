/**
 * Hex string utilities
 * Conversions between 0x-prefixed strings, bytes and unsigned integers
 */

import type { Hex } from './types.js';

// Lookup tables for fast hex encoding/decoding
const hexChars = '0123456789abcdef';
const hexToByteMap = new Map<string, number>();
for (let i = 0; i < 256; i++) {
  const hex = i.toString(16).padStart(2, '0');
  hexToByteMap.set(hex, i);
}

/**
 * Check if a value is a valid hex string
 */
export function isHex(value: unknown): value is Hex {
  if (typeof value !== 'string') return false;
  if (!value.startsWith('0x')) return false;
  return /^[0-9a-fA-F]*$/.test(value.slice(2));
}

/**
 * Assert that a value is a valid hex string
 */
export function assertHex(value: unknown, name = 'value'): asserts value is Hex {
  if (!isHex(value)) {
    throw new Error(`${name} must be a valid hex string starting with 0x, got: ${String(value)}`);
  }
}

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): Hex {
  let hex = '0x';
  for (const byte of bytes) {
    hex += hexChars[byte >> 4];
    hex += hexChars[byte & 0x0f];
  }
  return hex as Hex;
}

/**
 * Convert hex string to bytes
 * Accepts both uppercase and lowercase hex characters
 */
export function hexToBytes(hex: Hex): Uint8Array {
  assertHex(hex);
  const hexStr = hex.slice(2).toLowerCase();
  // Pad with leading zero if odd length
  const paddedHex = hexStr.length % 2 === 0 ? hexStr : '0' + hexStr;
  const bytes = new Uint8Array(paddedHex.length / 2);

  for (let i = 0; i < paddedHex.length; i += 2) {
    const byteHex = paddedHex.slice(i, i + 2);
    const byte = hexToByteMap.get(byteHex);
    if (byte === undefined) {
      throw new Error(`Invalid hex character at position ${i}: ${byteHex}`);
    }
    bytes[i / 2] = byte;
  }

  return bytes;
}

/**
 * Accept either representation and return bytes
 */
export function toBytes(value: Hex | Uint8Array): Uint8Array {
  return value instanceof Uint8Array ? value : hexToBytes(value);
}

/**
 * Encode an unsigned integer as a fixed-width big-endian byte array
 */
export function bigIntToBytes(value: bigint, byteLength: number): Uint8Array {
  if (value < 0n) {
    throw new Error(`Cannot encode negative value ${value.toString()}`);
  }
  if (value >> BigInt(byteLength * 8) !== 0n) {
    throw new Error(`Value ${value.toString()} exceeds ${byteLength} bytes`);
  }
  const bytes = new Uint8Array(byteLength);
  let v = value;
  for (let i = byteLength - 1; i >= 0; i--) {
    bytes[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return bytes;
}

/**
 * Decode big-endian bytes as an unsigned integer
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Pad hex string to a specific byte length (left-padded with zeros)
 */
export function padHex(hex: Hex, byteLength: number): Hex {
  assertHex(hex);
  const hexStr = hex.slice(2);
  const targetLength = byteLength * 2;
  if (hexStr.length > targetLength) {
    throw new Error(`Hex string ${hex} exceeds ${byteLength} bytes`);
  }
  return `0x${hexStr.padStart(targetLength, '0')}` as Hex;
}

/**
 * Concatenate multiple hex strings
 */
export function concatHex(...hexStrings: Hex[]): Hex {
  let result = '0x';
  for (const hex of hexStrings) {
    assertHex(hex);
    result += hex.slice(2);
  }
  return result as Hex;
}

/**
 * Get byte length of hex string
 */
export function hexLength(hex: Hex): number {
  assertHex(hex);
  return Math.ceil((hex.length - 2) / 2);
}

/**
 * Lowercase a hex string so identifiers compare by value
 */
export function normalizeHex(hex: Hex): Hex {
  assertHex(hex);
  return hex.toLowerCase() as Hex;
}

/**
 * Check if two hex strings are equal (case-insensitive)
 */
export function hexEquals(a: Hex, b: Hex): boolean {
  return normalizeHex(a) === normalizeHex(b);
}

/**
 * Convert string to hex (UTF-8 encoding)
 */
export function stringToHex(str: string): Hex {
  return bytesToHex(new TextEncoder().encode(str));
}

/**
 * Convert hex to string (UTF-8 decoding)
 */
export function hexToString(hex: Hex): string {
  return new TextDecoder().decode(hexToBytes(hex));
}
