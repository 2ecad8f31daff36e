/**
 * ABI (Application Binary Interface) encoding/decoding
 * EVM contract ABI for the flat parameter lists that swap router calls use:
 * uintN, address, bool, bytes and dynamic arrays of those.
 * A tuple made only of static members encodes exactly like its members
 * listed flat, which is how static struct arguments are handled here.
 */

import type { Address, Hex } from './types.js';
import {
  bytesToHex,
  hexToBytes,
  concatHex,
  isHex,
  hexLength,
  bigIntToBytes,
  bytesToBigInt,
} from './hex.js';
import { keccak256 } from './hash.js';
import { isAddress } from './address.js';

const WORD = 32;

/**
 * Encode function call data from a signature and arguments
 */
export function encodeFunctionCall(signature: string, args: unknown[] = []): Hex {
  const selector = normalizedSelector(signature);
  const encoded = encodeParameters(parseSignatureTypes(signature), args);
  return concatHex(selector, encoded);
}

/**
 * Decode function call data (selector is skipped, not checked)
 */
export function decodeFunctionCall(signature: string, data: Hex): unknown[] {
  const paramTypes = parseSignatureTypes(signature);
  return decodeParameters(paramTypes, `0x${data.slice(10)}`);
}

/**
 * Selector of a signature written with parameter names or extra whitespace
 */
function normalizedSelector(signature: string): Hex {
  // Normalize signature (remove whitespace, parameter names)
  const normalized = normalizeSignature(signature);
  const hash = keccak256(normalized);
  return `0x${hash.slice(2, 10)}`;
}

/**
 * Encode multiple parameters
 */
export function encodeParameters(types: readonly string[], values: readonly unknown[]): Hex {
  if (types.length !== values.length) {
    throw new Error(`Parameter count mismatch: ${types.length} types, ${values.length} values`);
  }

  if (types.length === 0) return '0x';

  const heads: Hex[] = [];
  const tails: Hex[] = [];
  let tailOffset = types.length * WORD;

  types.forEach((type, i) => {
    const encoded = encodeParameter(type, values[i]);
    if (isDynamicType(type)) {
      // Dynamic type: head contains offset, tail contains data
      heads.push(bytesToHex(bigIntToBytes(BigInt(tailOffset), WORD)));
      tails.push(encoded);
      tailOffset += hexLength(encoded);
    } else {
      heads.push(encoded);
    }
  });

  return concatHex(...heads, ...tails);
}

/**
 * Decode multiple parameters
 */
export function decodeParameters(types: readonly string[], data: Hex): unknown[] {
  if (types.length === 0) return [];

  const bytes = hexToBytes(data);
  if (bytes.length < types.length * WORD) {
    throw new Error(
      `ABI data too short: ${bytes.length} bytes for ${types.length} parameters`
    );
  }

  return types.map((type, i) => {
    const headOffset = i * WORD;
    if (isDynamicType(type)) {
      const offset = Number(readWord(bytes, headOffset));
      return decodeParameter(type, bytes, offset);
    }
    return decodeParameter(type, bytes, headOffset);
  });
}

function encodeParameter(type: string, value: unknown): Hex {
  if (type.endsWith('[]')) {
    const baseType = type.slice(0, -2);
    if (!Array.isArray(value)) {
      throw new Error(`Expected array for type ${type}`);
    }
    const length = bytesToHex(bigIntToBytes(BigInt(value.length), WORD));
    return concatHex(length, encodeParameters(value.map(() => baseType), value));
  }

  if (type === 'address') {
    if (!isAddress(value)) {
      throw new Error(`Invalid address: ${String(value)}`);
    }
    return bytesToHex(bigIntToBytes(BigInt(value), WORD));
  }

  if (type === 'bool') {
    if (typeof value !== 'boolean') {
      throw new Error(`Expected boolean, got ${String(value)}`);
    }
    return bytesToHex(bigIntToBytes(value ? 1n : 0n, WORD));
  }

  if (type === 'bytes') {
    let bytes: Uint8Array;
    if (value instanceof Uint8Array) {
      bytes = value;
    } else if (isHex(value)) {
      bytes = hexToBytes(value);
    } else {
      throw new Error(`Expected bytes, got ${String(value)}`);
    }
    const length = bytesToHex(bigIntToBytes(BigInt(bytes.length), WORD));
    const padded = new Uint8Array(Math.ceil(bytes.length / WORD) * WORD);
    padded.set(bytes);
    return concatHex(length, bytesToHex(padded));
  }

  const bits = uintBits(type);
  if (bits !== undefined) {
    if (typeof value !== 'bigint' && typeof value !== 'number') {
      throw new Error(`Expected integer for ${type}, got ${String(value)}`);
    }
    const bigValue = BigInt(value);
    if (bigValue < 0n) {
      throw new Error(`Negative value for ${type}: ${bigValue.toString()}`);
    }
    if (bigValue >> BigInt(bits) !== 0n) {
      throw new Error(`Value ${bigValue.toString()} exceeds ${type} max`);
    }
    return bytesToHex(bigIntToBytes(bigValue, WORD));
  }

  throw new Error(`Unsupported type: ${type}`);
}

function decodeParameter(type: string, data: Uint8Array, offset: number): unknown {
  if (type.endsWith('[]')) {
    const baseType = type.slice(0, -2);
    const length = Number(readWord(data, offset));
    const start = offset + WORD;
    const elements: unknown[] = [];
    for (let i = 0; i < length; i++) {
      if (isDynamicType(baseType)) {
        const elemOffset = Number(readWord(data, start + i * WORD));
        elements.push(decodeParameter(baseType, data, start + elemOffset));
      } else {
        elements.push(decodeParameter(baseType, data, start + i * WORD));
      }
    }
    return elements;
  }

  if (type === 'address') {
    return bytesToHex(data.slice(offset + 12, offset + WORD)) as Address;
  }

  if (type === 'bool') {
    return readWord(data, offset) === 1n;
  }

  if (type === 'bytes') {
    const length = Number(readWord(data, offset));
    return bytesToHex(data.slice(offset + WORD, offset + WORD + length));
  }

  if (uintBits(type) !== undefined) {
    return readWord(data, offset);
  }

  throw new Error(`Unsupported type: ${type}`);
}

function readWord(data: Uint8Array, offset: number): bigint {
  if (offset + WORD > data.length) {
    throw new Error(`ABI read out of bounds at offset ${offset}`);
  }
  return bytesToBigInt(data.slice(offset, offset + WORD));
}

function uintBits(type: string): number | undefined {
  const match = /^uint(\d+)?$/.exec(type);
  if (!match) return undefined;
  const bits = parseInt(match[1] ?? '256');
  if (bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw new Error(`Invalid uint size: ${bits}`);
  }
  return bits;
}

/**
 * Check if a type is dynamic (variable length)
 */
function isDynamicType(type: string): boolean {
  return type === 'bytes' || type.endsWith('[]');
}

/**
 * Parse parameter types from function signature
 */
function parseSignatureTypes(signature: string): string[] {
  const match = /\(([^)]*)\)/.exec(signature);
  if (!match) {
    throw new Error(`Invalid function signature: ${signature}`);
  }
  const params = match[1];
  if (!params) return [];
  return splitTypes(params);
}

/**
 * Split comma-separated types, dropping parameter names
 */
function splitTypes(types: string): string[] {
  return types
    .split(',')
    .map((part) => part.trim().split(/\s+/)[0] ?? '')
    .filter((type) => type.length > 0);
}

/**
 * Normalize function signature (remove names, whitespace)
 */
function normalizeSignature(signature: string): string {
  const match = /^([a-zA-Z_][a-zA-Z0-9_]*)\s*\(([^)]*)\)/.exec(signature.trim());
  if (!match) {
    throw new Error(`Invalid function signature: ${signature}`);
  }

  const name = match[1] ?? '';
  const types = splitTypes(match[2] ?? '');

  return `${name}(${types.join(',')})`;
}
