/**
 * Cryptographic hash functions
 * Wrapper around @noble/hashes for selector and identifier hashing
 */

import { keccak_256 } from '@noble/hashes/sha3';
import type { Hash, Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex, stringToHex } from './hex.js';

/**
 * Compute keccak256 hash
 * Hex input is hashed as bytes, any other string as UTF-8
 */
export function keccak256(data: Hex | Uint8Array | string): Hash {
  let bytes: Uint8Array;

  if (data instanceof Uint8Array) {
    bytes = data;
  } else if (isHex(data)) {
    bytes = hexToBytes(data);
  } else {
    bytes = hexToBytes(stringToHex(data));
  }

  return bytesToHex(keccak_256(bytes)) as Hash;
}

/**
 * Compute a 4-byte selector from a canonical signature, hashed verbatim
 * e.g., "transfer(address,uint256)" -> "0xa9059cbb"
 *
 * The signature is not normalized, so tuple
 * signatures such as "exactInputSingle((address,address,uint24,...))" work.
 */
export function functionSelector(signature: string): Hex {
  const hash = keccak256(signature);
  return `0x${hash.slice(2, 10)}`;
}
