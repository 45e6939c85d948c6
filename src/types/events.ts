/**
 * Notification emitted after a committed zap in.
 */
export interface ZapInEvent {
  /** Literal type tag */
  type: 'zap_in';
  /** Address that supplied the input asset */
  caller: string;
  inputAsset: string;
  pairAssetA: string;
  pairAssetB: string;
  /** Amount of input asset pulled from the caller */
  inputAmount: bigint;
  /** LP units minted to the caller */
  liquidityMinted: bigint;
}

/**
 * Notification emitted after a committed zap out.
 */
export interface ZapOutEvent {
  /** Literal type tag */
  type: 'zap_out';
  /** Address that supplied the LP units */
  caller: string;
  outputAsset: string;
  pairAssetA: string;
  pairAssetB: string;
  /** LP units burned */
  liquidityIn: bigint;
  /** Amount of output asset sent to the caller */
  amountOut: bigint;
}

/**
 * Union of all zap notifications.
 */
export type ZapEvent = ZapInEvent | ZapOutEvent;

/**
 * Receiver of zap notifications. Not consulted by the zap itself.
 */
export interface ZapEventSink {
  emit(event: ZapEvent): void;
}
