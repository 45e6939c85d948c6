import { Reserves } from '../types/collaborators';
import { ZapInRequest, ZapOutRequest, ZapInQuote, ZapOutQuote, SwapPlan, LiquidityPlan } from '../types/zap';
import { SwapBoundsViolatedError, InsufficientLiquidityError } from '../errors';
import { sortTokens } from '../utils/addresses';
import { getAmountOut, liquidityForDeposit, minOut, optimalDeposit, optimalSwap } from '../utils/math';
import { validateZapInRequest, validateZapOutRequest } from '../utils/validation';

/**
 * Reserves oriented as (asset, other asset).
 */
function orient(asset: string, other: string, reserves: Reserves): [bigint, bigint] {
  const [token0] = sortTokens(asset, other);
  return asset === token0
    ? [reserves.reserve0, reserves.reserve1]
    : [reserves.reserve1, reserves.reserve0];
}

/**
 * Preview a zap in against known pool state, without touching the pool.
 *
 * Follows the same steps as the on-chain zap: optimal pre-swap at the
 * current reserves, then a deposit at the post-swap reserves. Fee-on-transfer
 * losses are not modelled.
 */
export function planZapIn(
  request: ZapInRequest,
  pairAddress: string,
  reserves: Reserves,
  totalSupply: bigint,
): ZapInQuote {
  const otherAsset = validateZapInRequest(request);
  const [reserveIn, reserveOut] = orient(request.inputAsset, otherAsset, reserves);
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new SwapBoundsViolatedError(0n, request.inputAmount, { pairAddress, reason: 'empty reserves' });
  }

  const toSwap = optimalSwap(request.inputAmount, reserveIn);
  if (toSwap <= 0n || toSwap >= request.inputAmount) {
    throw new SwapBoundsViolatedError(toSwap, request.inputAmount, { pairAddress });
  }

  const expectedSwapOut = getAmountOut(toSwap, reserveIn, reserveOut);
  const swap: SwapPlan = {
    path: [request.inputAsset, otherAsset],
    amountIn: toSwap,
    amountOutMin: minOut(expectedSwapOut, request.maxSlippageBps),
  };

  const remainder = request.inputAmount - toSwap;
  const liquidity: LiquidityPlan = {
    tokenA: request.inputAsset,
    tokenB: otherAsset,
    amountA: remainder,
    amountB: expectedSwapOut,
    minimumA: minOut(remainder, request.maxSlippageBps),
    minimumB: minOut(expectedSwapOut, request.maxSlippageBps),
  };

  const postIn = reserveIn + toSwap;
  const postOut = reserveOut - expectedSwapOut;
  const used = optimalDeposit(remainder, expectedSwapOut, postIn, postOut);
  const expectedLiquidity = liquidityForDeposit(used.amountA, used.amountB, postIn, postOut, totalSupply);

  return {
    pairAddress,
    swap,
    expectedSwapOut,
    liquidity,
    expectedLiquidity,
    expectedDustA: remainder - used.amountA,
    expectedDustB: expectedSwapOut - used.amountB,
  };
}

/**
 * Preview a zap out against known pool state, without touching the pool.
 */
export function planZapOut(
  request: ZapOutRequest,
  pairAddress: string,
  reserves: Reserves,
  totalSupply: bigint,
): ZapOutQuote {
  const otherAsset = validateZapOutRequest(request);
  if (request.liquidityIn > totalSupply) {
    throw new InsufficientLiquidityError(
      `Cannot burn ${request.liquidityIn} of ${totalSupply} LP units`,
      { pairAddress },
    );
  }

  const [reserveKeep, reserveOther] = orient(request.outputAsset, otherAsset, reserves);
  const expectedKept = (request.liquidityIn * reserveKeep) / totalSupply;
  const expectedOther = (request.liquidityIn * reserveOther) / totalSupply;

  if (expectedOther === 0n) {
    return { pairAddress, expectedKept, expectedOther, swap: null, expectedAmountOut: expectedKept };
  }

  const swapOut = getAmountOut(expectedOther, reserveOther - expectedOther, reserveKeep - expectedKept);
  return {
    pairAddress,
    expectedKept,
    expectedOther,
    swap: {
      path: [otherAsset, request.outputAsset],
      amountIn: expectedOther,
      amountOutMin: minOut(swapOut, request.maxSlippageBps),
    },
    expectedAmountOut: expectedKept + swapOut,
  };
}
