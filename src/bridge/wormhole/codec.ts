/**
 * Wire codec for the Wormhole settlement payload
 *
 * TransferRecord:
 *   len:8 transactionId | len:8 receiver | sourceChainId:2 |
 *   len:8 sendingAssetId | destinationChainId:2 | len:8 receivingAssetId | amount:32
 *
 * SwapLeg (repeated, no count prefix):
 *   len:8 callTo | len:8 approveTo | len:8 sendingAssetId |
 *   len:8 receivingAssetId | fromAmount:32 | len:8 callData
 *
 * BridgeParameters:
 *   dstChainId:2 | dstMaxGasPriceInWeiForRelayer:32 | wormholeFee:32 | len:8 dstContract
 *
 * Payload:
 *   dstMaxGasPrice:32 | dstMaxGas:32 | len:8 record | [len:8 swapLegs]
 *
 * The trailing swap section is present only when the plan is non-empty.
 * This layout is shared by both chains; changing it breaks in-flight transfers.
 */

import type { Hex } from '../../core/types.js';
import { bytesToHex } from '../../core/hex.js';
import type { Result } from '../../core/result.js';
import type { CodecError } from '../errors.js';
import type {
  BridgeParameters,
  SwapLeg,
  SwapPlan,
  TransferRecord,
  WirePayload,
} from '../types.js';
import { ByteReader, ByteWriter, decodeExact } from './serde.js';

// ============ TransferRecord ============

function writeTransferRecord(writer: ByteWriter, record: TransferRecord): void {
  writer
    .vector(record.transactionId, 'transactionId')
    .vector(record.receiver, 'receiver')
    .u16(record.sourceChainId, 'sourceChainId')
    .vector(record.sendingAssetId, 'sendingAssetId')
    .u16(record.destinationChainId, 'destinationChainId')
    .vector(record.receivingAssetId, 'receivingAssetId')
    .u256(record.amount, 'amount');
}

function readTransferRecord(reader: ByteReader): TransferRecord {
  const transactionId = reader.vectorHex();
  const receiver = reader.vectorHex();
  const sourceChainId = reader.u16();
  const sendingAssetId = reader.vectorHex();
  const destinationChainId = reader.u16();
  const receivingAssetId = reader.vectorHex();
  const amount = reader.u256();
  return {
    transactionId,
    receiver,
    sourceChainId,
    sendingAssetId,
    destinationChainId,
    receivingAssetId,
    amount,
  };
}

export function encodeTransferRecord(record: TransferRecord): Hex {
  const writer = new ByteWriter();
  writeTransferRecord(writer, record);
  return writer.toHex();
}

export function decodeTransferRecord(input: Hex | Uint8Array): Result<TransferRecord, CodecError> {
  return decodeExact(input, 'TransferRecord', readTransferRecord);
}

// ============ SwapLeg sequence ============

function writeSwapLegs(writer: ByteWriter, legs: SwapPlan): void {
  legs.forEach((leg, i) => {
    writer
      .vector(leg.callTo, `swap[${String(i)}].callTo`)
      .vector(leg.approveTo, `swap[${String(i)}].approveTo`)
      .vector(leg.sendingAssetId, `swap[${String(i)}].sendingAssetId`)
      .vector(leg.receivingAssetId, `swap[${String(i)}].receivingAssetId`)
      .u256(leg.fromAmount, `swap[${String(i)}].fromAmount`)
      .vector(leg.callData, `swap[${String(i)}].callData`);
  });
}

function readSwapLegs(reader: ByteReader): SwapLeg[] {
  const legs: SwapLeg[] = [];
  while (reader.remaining > 0) {
    const callTo = reader.vectorHex();
    const approveTo = reader.vectorHex();
    const sendingAssetId = reader.vectorHex();
    const receivingAssetId = reader.vectorHex();
    const fromAmount = reader.u256();
    const callData = reader.vectorHex();
    legs.push({ callTo, approveTo, sendingAssetId, receivingAssetId, fromAmount, callData });
  }
  return legs;
}

export function encodeSwapLegs(legs: SwapPlan): Hex {
  const writer = new ByteWriter();
  writeSwapLegs(writer, legs);
  return writer.toHex();
}

export function decodeSwapLegs(input: Hex | Uint8Array): Result<SwapLeg[], CodecError> {
  return decodeExact(input, 'SwapLeg[]', readSwapLegs);
}

// ============ BridgeParameters ============

export function encodeBridgeParameters(params: BridgeParameters): Hex {
  return new ByteWriter()
    .u16(params.dstChainId, 'dstChainId')
    .u256(params.dstMaxGasPriceInWeiForRelayer, 'dstMaxGasPriceInWeiForRelayer')
    .u256(params.wormholeFee, 'wormholeFee')
    .vector(params.dstContract, 'dstContract')
    .toHex();
}

export function decodeBridgeParameters(
  input: Hex | Uint8Array
): Result<BridgeParameters, CodecError> {
  return decodeExact(input, 'BridgeParameters', (reader) => {
    const dstChainId = reader.u16();
    const dstMaxGasPriceInWeiForRelayer = reader.u256();
    const wormholeFee = reader.u256();
    const dstContract = reader.vectorHex();
    return { dstChainId, dstMaxGasPriceInWeiForRelayer, wormholeFee, dstContract };
  });
}

// ============ Payload ============

/**
 * Build the payload bytes
 */
export function encodeWirePayloadBytes(payload: WirePayload): Uint8Array {
  const record = new ByteWriter();
  writeTransferRecord(record, payload.record);

  const writer = new ByteWriter()
    .u256(payload.dstMaxGasPrice, 'dstMaxGasPrice')
    .u256(payload.dstMaxGas, 'dstMaxGas')
    .vector(record.toBytes(), 'record');

  if (payload.swapPlan.length > 0) {
    const legs = new ByteWriter();
    writeSwapLegs(legs, payload.swapPlan);
    writer.vector(legs.toBytes(), 'swapPlan');
  }

  return writer.toBytes();
}

export function encodeWirePayload(payload: WirePayload): Hex {
  return bytesToHex(encodeWirePayloadBytes(payload));
}

export function decodeWirePayload(input: Hex | Uint8Array): Result<WirePayload, CodecError> {
  return decodeExact(input, 'WirePayload', (reader) => {
    const dstMaxGasPrice = reader.u256();
    const dstMaxGas = reader.u256();
    const record = readNested(reader.vector(), 'TransferRecord', readTransferRecord);
    const swapPlan = reader.remaining > 0
      ? readNested(reader.vector(), 'SwapLeg[]', readSwapLegs)
      : [];
    return { dstMaxGasPrice, dstMaxGas, record, swapPlan };
  });
}

function readNested<T>(bytes: Uint8Array, structure: string, read: (reader: ByteReader) => T): T {
  const reader = new ByteReader(bytes, structure);
  const value = read(reader);
  reader.finish();
  return value;
}
