/**
 * Single-token zap into a pool: swap part of `inputAsset`, deposit both legs.
 */
export interface ZapInRequest {
  /** Asset supplied by the caller; must be one of the pair assets */
  inputAsset: string;
  /** First asset of the target pair */
  pairAssetA: string;
  /** Second asset of the target pair */
  pairAssetB: string;
  /** Amount of input asset pulled from the caller */
  inputAmount: bigint;
  /** Per-leg and per-swap slippage tolerance in basis points (0-10000) */
  maxSlippageBps: number;
  /** Fewest LP units the caller accepts */
  minimumLiquidityOut: bigint;
  /** Unix timestamp (seconds) forwarded to every router call */
  deadline: number;
  /** Account amounts by measured balance deltas instead of reported values */
  feeOnTransfer: boolean;
}

/**
 * Single-token zap out of a pool: withdraw both legs, swap one into the other.
 */
export interface ZapOutRequest {
  /** Asset returned to the caller; must be one of the pair assets */
  outputAsset: string;
  /** First asset of the target pair */
  pairAssetA: string;
  /** Second asset of the target pair */
  pairAssetB: string;
  /** LP units pulled from the caller */
  liquidityIn: bigint;
  /** Slippage tolerance for the conversion swap in basis points (0-10000) */
  maxSlippageBps: number;
  /** Smallest amount of output asset the caller accepts */
  minimumOutputAmount: bigint;
  /** Unix timestamp (seconds) forwarded to every router call */
  deadline: number;
  /** Account amounts by measured balance deltas instead of reported values */
  feeOnTransfer: boolean;
}

/**
 * A single-hop swap: path [from, to], amount offered, least accepted.
 */
export interface SwapPlan {
  path: [string, string];
  amountIn: bigint;
  amountOutMin: bigint;
}

/**
 * Deposit amounts and their per-leg minimums.
 */
export interface LiquidityPlan {
  tokenA: string;
  tokenB: string;
  amountA: bigint;
  amountB: bigint;
  minimumA: bigint;
  minimumB: bigint;
}

/**
 * Off-chain preview of a zap in.
 */
export interface ZapInQuote {
  pairAddress: string;
  swap: SwapPlan;
  /** Expected output of the pre-swap */
  expectedSwapOut: bigint;
  liquidity: LiquidityPlan;
  /** LP units the deposit should mint */
  expectedLiquidity: bigint;
  /** Deposit amounts the pool will not take, refunded to the caller */
  expectedDustA: bigint;
  expectedDustB: bigint;
}

/**
 * Off-chain preview of a zap out.
 */
export interface ZapOutQuote {
  pairAddress: string;
  /** Expected withdrawal of the output asset */
  expectedKept: bigint;
  /** Expected withdrawal of the other asset */
  expectedOther: bigint;
  /** Conversion swap, or null when the other leg is zero */
  swap: SwapPlan | null;
  expectedAmountOut: bigint;
}

/**
 * Zap-in arguments of the network client; omitted bounds take the
 * client's defaults.
 */
export type ZapInParams = Pick<ZapInRequest, 'inputAsset' | 'pairAssetA' | 'pairAssetB' | 'inputAmount'> &
  Partial<Pick<ZapInRequest, 'maxSlippageBps' | 'minimumLiquidityOut' | 'deadline' | 'feeOnTransfer'>>;

/**
 * Zap-out arguments of the network client; omitted bounds take the
 * client's defaults.
 */
export type ZapOutParams = Pick<ZapOutRequest, 'outputAsset' | 'pairAssetA' | 'pairAssetB' | 'liquidityIn'> &
  Partial<Pick<ZapOutRequest, 'maxSlippageBps' | 'minimumOutputAmount' | 'deadline' | 'feeOnTransfer'>>;
