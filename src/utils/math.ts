import { PRECISION } from '../config';
import { InvalidSlippageError, InsufficientLiquidityError, ValidationError } from '../errors';

/**
 * Integer square root by Newton iteration.
 *
 * Returns floor(sqrt(value)) for any non-negative bigint.
 */
export function isqrt(value: bigint): bigint {
  if (value < 0n) throw new ValidationError('Square root of negative number', { value: value.toString() });
  if (value < 2n) return value;

  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

/**
 * Portion of `amountIn` to swap before depositing both legs into a 0.3% fee
 * constant-product pool, so the deposit matches the pool ratio.
 *
 * Closed form of maximizing minted liquidity:
 * (sqrt(r * (a * 3988000 + r * 3988009)) - r * 1997) / 1994
 *
 * Floor division under-swaps by at most one unit.
 */
export function optimalSwap(amountIn: bigint, reserveIn: bigint): bigint {
  if (amountIn <= 0n) throw new ValidationError('amountIn must be positive', { amountIn: amountIn.toString() });
  if (reserveIn <= 0n) throw new ValidationError('reserveIn must be positive', { reserveIn: reserveIn.toString() });

  const root = isqrt(reserveIn * (amountIn * 3988000n + reserveIn * 3988009n));
  return (root - reserveIn * 1997n) / 1994n;
}

/**
 * Validate a basis-point tolerance, throwing {@link InvalidSlippageError}.
 */
export function assertSlippageBps(toleranceBps: number): void {
  if (!Number.isInteger(toleranceBps) || toleranceBps < 0 || toleranceBps > 10000) {
    throw new InvalidSlippageError(toleranceBps);
  }
}

/**
 * Minimum acceptable amount under a basis-point tolerance (floor).
 */
export function minOut(amount: bigint, toleranceBps: number): bigint {
  assertSlippageBps(toleranceBps);
  return (amount * (PRECISION.BPS_DENOMINATOR - BigInt(toleranceBps))) / PRECISION.BPS_DENOMINATOR;
}

/**
 * Output of an exact-in swap against a 0.3% fee constant-product pool.
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  if (amountIn <= 0n) throw new ValidationError('Insufficient input amount');
  if (reserveIn <= 0n || reserveOut <= 0n) throw new InsufficientLiquidityError('Insufficient liquidity');

  const amountInWithFee = amountIn * PRECISION.FEE_NUMERATOR;
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * PRECISION.FEE_DENOMINATOR + amountInWithFee;
  return numerator / denominator;
}

/**
 * Amount of B proportional to `amountA` at the current reserve ratio.
 */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
  if (amountA <= 0n) throw new ValidationError('Insufficient amount');
  if (reserveA <= 0n || reserveB <= 0n) throw new InsufficientLiquidityError('Insufficient liquidity');
  return (amountA * reserveB) / reserveA;
}

/**
 * LP units minted for a deposit, following the pair's mint rule.
 *
 * The first deposit mints sqrt(a * b) less the permanently locked
 * minimum; later deposits mint the smaller pro-rata share.
 */
export function liquidityForDeposit(
  amount0: bigint,
  amount1: bigint,
  reserve0: bigint,
  reserve1: bigint,
  totalSupply: bigint,
): bigint {
  if (totalSupply === 0n) {
    return isqrt(amount0 * amount1) - PRECISION.MINIMUM_LIQUIDITY;
  }
  const liquidity0 = (amount0 * totalSupply) / reserve0;
  const liquidity1 = (amount1 * totalSupply) / reserve1;
  return minBigInt(liquidity0, liquidity1);
}

/**
 * Split of a deposit the pool will accept, given both desired amounts.
 *
 * One leg is used in full and the other is reduced to the pool ratio.
 */
export function optimalDeposit(
  amountADesired: bigint,
  amountBDesired: bigint,
  reserveA: bigint,
  reserveB: bigint,
): { amountA: bigint; amountB: bigint } {
  if (reserveA === 0n && reserveB === 0n) {
    return { amountA: amountADesired, amountB: amountBDesired };
  }
  const amountBOptimal = quote(amountADesired, reserveA, reserveB);
  if (amountBOptimal <= amountBDesired) {
    return { amountA: amountADesired, amountB: amountBOptimal };
  }
  const amountAOptimal = quote(amountBDesired, reserveB, reserveA);
  return { amountA: amountAOptimal, amountB: amountBDesired };
}

/**
 * Smaller of two bigints.
 */
export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
