/**
 * Big-endian byte serialization used by the wire payload
 *
 * Layout primitives:
 * - u16: 2 bytes
 * - u64: 8 bytes (also the length prefix of every variable field)
 * - u256: 32 bytes
 * - vector: u64 length followed by the raw bytes
 */

import type { Hex } from '../../core/types.js';
import { U16_MAX, U64_MAX, U256_MAX } from '../../core/types.js';
import { bigIntToBytes, bytesToBigInt, bytesToHex, toBytes } from '../../core/hex.js';
import type { Result } from '../../core/result.js';
import { ok, err } from '../../core/result.js';
import { CodecError, CodecLengthMismatchError, CodecValueOutOfRangeError } from '../errors.js';

const U16_BYTES = 2;
const U64_BYTES = 8;
const U256_BYTES = 32;

/**
 * Accumulates encoded fields
 */
export class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  u16(value: number, field: string): this {
    if (!Number.isInteger(value) || value < 0 || value > U16_MAX) {
      throw new CodecValueOutOfRangeError({ field, value: String(value), bytes: U16_BYTES });
    }
    return this.raw(bigIntToBytes(BigInt(value), U16_BYTES));
  }

  u64(value: bigint, field: string): this {
    if (value < 0n || value > U64_MAX) {
      throw new CodecValueOutOfRangeError({ field, value: value.toString(), bytes: U64_BYTES });
    }
    return this.raw(bigIntToBytes(value, U64_BYTES));
  }

  u256(value: bigint, field: string): this {
    if (value < 0n || value > U256_MAX) {
      throw new CodecValueOutOfRangeError({ field, value: value.toString(), bytes: U256_BYTES });
    }
    return this.raw(bigIntToBytes(value, U256_BYTES));
  }

  /**
   * Length-prefixed byte string
   */
  vector(value: Hex | Uint8Array, field: string): this {
    // Odd-length hex has no exact byte form
    if (typeof value === 'string' && value.length % 2 !== 0) {
      throw new CodecValueOutOfRangeError({ field, value, reason: 'has an odd number of hex digits' });
    }
    const bytes = toBytes(value);
    this.u64(BigInt(bytes.length), `len(${field})`);
    return this.raw(bytes);
  }

  raw(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.length += bytes.length;
    return this;
  }

  get byteLength(): number {
    return this.length;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  toHex(): Hex {
    return bytesToHex(this.toBytes());
  }
}

/**
 * Sequential reader over an encoded structure
 * Every read that runs past the end throws CodecLengthMismatchError
 */
export class ByteReader {
  private offset = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly structure: string
  ) {}

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  get consumed(): number {
    return this.offset;
  }

  u16(): number {
    return Number(bytesToBigInt(this.take(U16_BYTES)));
  }

  u64(): bigint {
    return bytesToBigInt(this.take(U64_BYTES));
  }

  u256(): bigint {
    return bytesToBigInt(this.take(U256_BYTES));
  }

  /**
   * Length-prefixed byte string
   */
  vector(): Uint8Array {
    const declared = this.u64();
    if (declared > BigInt(this.remaining)) {
      throw new CodecLengthMismatchError({
        structure: this.structure,
        expected: this.offset + Number(declared),
        actual: this.bytes.length,
      });
    }
    return this.take(Number(declared));
  }

  vectorHex(): Hex {
    return bytesToHex(this.vector());
  }

  /**
   * Require that every byte has been consumed
   */
  finish(): void {
    if (this.remaining !== 0) {
      throw new CodecLengthMismatchError({
        structure: this.structure,
        expected: this.offset,
        actual: this.bytes.length,
      });
    }
  }

  private take(count: number): Uint8Array {
    if (count > this.remaining) {
      throw new CodecLengthMismatchError({
        structure: this.structure,
        expected: this.offset + count,
        actual: this.bytes.length,
      });
    }
    const slice = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return slice;
  }
}

/**
 * Run a decoder over the whole input, turning codec violations into Err
 * The decoder must consume the input exactly.
 */
export function decodeExact<T>(
  input: Hex | Uint8Array,
  structure: string,
  decode: (reader: ByteReader) => T
): Result<T, CodecError> {
  let bytes: Uint8Array;
  try {
    bytes = toBytes(input);
  } catch (error) {
    return err(
      new CodecError({
        code: 'CODEC_LENGTH_MISMATCH',
        message: `Input for ${structure} is not valid hex: ${error instanceof Error ? error.message : String(error)}`,
        details: { structure },
      })
    );
  }

  const reader = new ByteReader(bytes, structure);
  try {
    const value = decode(reader);
    reader.finish();
    return ok(value);
  } catch (error) {
    if (error instanceof CodecError) {
      return err(error);
    }
    throw error;
  }
}
