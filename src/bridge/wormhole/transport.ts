/**
 * Bridge transport capabilities
 * The token bridge that carries funds plus payload between chains,
 * and the wrapper that turns wrapped native tokens back into native currency
 */

import type { Hex } from '../../core/types.js';

/**
 * Token transfer handed to the bridge on the source chain
 */
export interface TokenTransferRequest {
  /** Account the bridge takes the asset and message fee from */
  readonly sender: Hex;
  readonly asset: Hex;
  readonly amount: bigint;
  readonly dstChainId: number;
  readonly dstContract: Hex;
  readonly nonce: number;
  /** Encoded wire payload */
  readonly payload: Hex;
  /** Native value paid for the message itself */
  readonly messageFee: bigint;
}

/**
 * Token transfer as unwrapped on the destination chain
 */
export interface ReceivedTransfer {
  /** Chain the bridged token is native to */
  readonly tokenChain: number;
  /** Token address on its native chain */
  readonly tokenAddress: Hex;
  /** Wire payload attached by the sender */
  readonly payload: Hex;
}

/**
 * Message bridge transport
 * Message authenticity is the transport's concern; it rejects what it cannot verify
 */
export interface BridgeTransport {
  /** Native fee the bridge charges per message */
  messageFee(): Promise<bigint>;
  /** Lock or burn the asset and publish the payload; resolves to the sequence number */
  send(request: TokenTransferRequest): Promise<bigint>;
  /** Verify and redeem a message, crediting the redeemed tokens to recipient */
  receiveAndUnwrap(rawMessage: Hex, recipient: Hex): Promise<ReceivedTransfer>;
  /** Local representation of a token native to another chain */
  wrappedAsset(tokenChain: number, tokenAddress: Hex): Promise<Hex>;
}

/**
 * Wrapped native token contract (WETH and friends)
 */
export interface NativeWrapper {
  /** Wrapped token id */
  readonly wrappedAsset: Hex;
  /** Native asset id delivered after unwrapping */
  readonly nativeAsset: Hex;
  /** Burn amount of wrapped tokens held by holder and credit the same native amount */
  unwrap(holder: Hex, amount: bigint): Promise<void>;
}
