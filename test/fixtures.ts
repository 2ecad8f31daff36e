/**
 * Shared fixtures: accounts, assets and in-process stand-ins for the
 * token bridge, swap venues and the native wrapper
 */

import type { Hex } from '../src/core/types.js';
import { normalizeHex } from '../src/core/hex.js';
import { type Result, ok, err } from '../src/core/result.js';
import { InMemoryLedger } from '../src/ledger/ledger.js';
import type { SwapFailure, SwapRouter, SwapVenue, SwapContext } from '../src/swap/types.js';
import type { SwapLeg, TransferRecord, BridgeParameters } from '../src/bridge/types.js';
import type {
  BridgeTransport,
  NativeWrapper,
  ReceivedTransfer,
  TokenTransferRequest,
} from '../src/bridge/wormhole/transport.js';
import { WORMHOLE_CHAIN_IDS } from '../src/bridge/constants.js';

// ============ Accounts and assets ============

export const SETTLEMENT: Hex = `0x${'11'.repeat(20)}`;
export const USER: Hex = `0x${'22'.repeat(20)}`;
export const FEE_RECIPIENT: Hex = `0x${'33'.repeat(20)}`;
export const RECEIVER: Hex = `0x${'44'.repeat(20)}`;
export const POOL: Hex = `0x${'55'.repeat(20)}`;
export const TOKEN_BRIDGE: Hex = `0x${'77'.repeat(20)}`;
export const DST_CONTRACT: Hex = `0x${'88'.repeat(20)}`;
export const CUSTODY: Hex = `0x${'99'.repeat(20)}`;

export const NATIVE: Hex = '0x0000000000000000000000000000000000000000';
export const USDC: Hex = `0x${'aa'.repeat(20)}`;
export const USDT: Hex = `0x${'bb'.repeat(20)}`;
export const WETH: Hex = `0x${'cc'.repeat(20)}`;
export const DAI: Hex = `0x${'dd'.repeat(20)}`;

export const ROUTER_V2: Hex = `0x${'a1'.repeat(20)}`;
export const ROUTER_V3: Hex = `0x${'a2'.repeat(20)}`;
export const AGGREGATOR: Hex = `0x${'a3'.repeat(20)}`;

export const TX_ID: Hex = `0x${'ab'.repeat(32)}`;

export const ETHEREUM = WORMHOLE_CHAIN_IDS.ethereum;
export const BSC = WORMHOLE_CHAIN_IDS.bsc;

// ============ Builders ============

export function makeRecord(overrides: Partial<TransferRecord> = {}): TransferRecord {
  return {
    transactionId: TX_ID,
    receiver: RECEIVER,
    sourceChainId: ETHEREUM,
    sendingAssetId: NATIVE,
    destinationChainId: BSC,
    receivingAssetId: USDC,
    amount: 1_000_000n,
    ...overrides,
  };
}

export function makeParams(overrides: Partial<BridgeParameters> = {}): BridgeParameters {
  return {
    dstChainId: BSC,
    dstMaxGasPriceInWeiForRelayer: 10_000_000_000n,
    wormholeFee: 0n,
    dstContract: DST_CONTRACT,
    ...overrides,
  };
}

export function makeLeg(overrides: Partial<SwapLeg> = {}): SwapLeg {
  return {
    callTo: ROUTER_V2,
    approveTo: ROUTER_V2,
    sendingAssetId: USDC,
    receivingAssetId: USDT,
    fromAmount: 1_000_000n,
    callData: '0x',
    ...overrides,
  };
}

// ============ Swap venue ============

export interface FakeVenueOptions {
  /** Output per unit of input, as numerator / denominator (default 1/1) */
  rate?: { numerator: bigint; denominator: bigint };
  /** Resolve every execution to this failure */
  failure?: SwapFailure;
  /** Reject every execution with this message */
  rejectWith?: string;
  /** Output amount the venue reports instead of the real one */
  reportedOutput?: bigint;
}

/**
 * Constant-rate venue: takes the input into the pool, mints the output
 */
export class FakeVenue implements SwapVenue {
  readonly calls: Array<{ leg: SwapLeg; context: SwapContext }> = [];

  constructor(
    private readonly ledger: InMemoryLedger,
    private readonly options: FakeVenueOptions = {}
  ) {}

  async execute(leg: SwapLeg, context: SwapContext): Promise<Result<bigint, SwapFailure>> {
    this.calls.push({ leg, context });
    if (this.options.rejectWith !== undefined) {
      throw new Error(this.options.rejectWith);
    }
    if (this.options.failure) {
      return err(this.options.failure);
    }
    const rate = this.options.rate ?? { numerator: 1n, denominator: 1n };
    const output = (leg.fromAmount * rate.numerator) / rate.denominator;
    await this.ledger.transfer(leg.sendingAssetId, context.account, POOL, leg.fromAmount);
    this.ledger.mint(leg.receivingAssetId, context.account, output);
    return ok(this.options.reportedOutput ?? output);
  }
}

export function v2Router(venue: SwapVenue, address: Hex = ROUTER_V2): SwapRouter {
  return { kind: 'uniswap-v2', address, label: 'v2', venue };
}

export function v3Router(venue: SwapVenue, address: Hex = ROUTER_V3): SwapRouter {
  return { kind: 'uniswap-v3', address, label: 'v3', venue };
}

export function aggregatorRouter(venue: SwapVenue, address: Hex = AGGREGATOR): SwapRouter {
  return { kind: 'aggregator', address, label: 'aggregator', venue };
}

// ============ Token bridge ============

export interface QueuedDelivery {
  /** Chain the token is native to */
  tokenChain: number;
  /** Token id on its native chain */
  tokenAddress: Hex;
  /** Local asset minted on redemption */
  localAsset: Hex;
  amount: bigint;
  payload: Hex;
}

/**
 * Token bridge backed by the shared ledger
 * send() moves funds into custody; receiveAndUnwrap() mints queued deliveries
 */
export class FakeTokenBridge implements BridgeTransport {
  readonly sent: TokenTransferRequest[] = [];
  private readonly deliveries = new Map<Hex, QueuedDelivery>();
  private readonly wrapped = new Map<string, Hex>();
  private sequence = 0n;
  private fee: bigint;
  private readonly nativeAsset: Hex;
  /** When set, send() rejects with this message */
  failSendWith?: string;

  constructor(
    private readonly ledger: InMemoryLedger,
    options: { messageFee?: bigint; nativeAsset?: Hex } = {}
  ) {
    this.fee = options.messageFee ?? 0n;
    this.nativeAsset = options.nativeAsset ?? NATIVE;
  }

  setMessageFee(fee: bigint): void {
    this.fee = fee;
  }

  async messageFee(): Promise<bigint> {
    return Promise.resolve(this.fee);
  }

  async send(request: TokenTransferRequest): Promise<bigint> {
    if (this.failSendWith !== undefined) {
      throw new Error(this.failSendWith);
    }
    if (request.messageFee > 0n) {
      await this.ledger.transfer(this.nativeAsset, request.sender, CUSTODY, request.messageFee);
    }
    await this.ledger.transfer(request.asset, request.sender, CUSTODY, request.amount);
    this.sent.push(request);
    const sequence = this.sequence;
    this.sequence += 1n;
    return sequence;
  }

  registerWrapped(tokenChain: number, tokenAddress: Hex, localAsset: Hex): void {
    this.wrapped.set(`${String(tokenChain)}|${normalizeHex(tokenAddress)}`, localAsset);
  }

  async wrappedAsset(tokenChain: number, tokenAddress: Hex): Promise<Hex> {
    const local = this.wrapped.get(`${String(tokenChain)}|${normalizeHex(tokenAddress)}`);
    if (!local) {
      throw new Error(`No wrapped asset for ${tokenAddress} from chain ${String(tokenChain)}`);
    }
    return Promise.resolve(local);
  }

  /**
   * Make a delivery redeemable; returns the raw message id
   */
  queue(delivery: QueuedDelivery): Hex {
    const raw: Hex = `0x${(this.deliveries.size + 1).toString(16).padStart(64, '0')}`;
    this.deliveries.set(raw, delivery);
    return raw;
  }

  async receiveAndUnwrap(rawMessage: Hex, recipient: Hex): Promise<ReceivedTransfer> {
    const delivery = this.deliveries.get(rawMessage);
    if (!delivery) {
      throw new Error('invalid VAA');
    }
    if (delivery.amount > 0n) {
      this.ledger.mint(delivery.localAsset, recipient, delivery.amount);
    }
    return Promise.resolve({
      tokenChain: delivery.tokenChain,
      tokenAddress: delivery.tokenAddress,
      payload: delivery.payload,
    });
  }
}

// ============ Native wrapper ============

export class FakeNativeWrapper implements NativeWrapper {
  readonly wrappedAsset = WETH;
  readonly nativeAsset = NATIVE;

  constructor(private readonly ledger: InMemoryLedger) {}

  async unwrap(holder: Hex, amount: bigint): Promise<void> {
    this.ledger.burn(this.wrappedAsset, holder, amount);
    this.ledger.mint(this.nativeAsset, holder, amount);
    return Promise.resolve();
  }
}
