import { ZeroAmountError, ValidationError, UnsupportedInputTokenError, UnsupportedOutputTokenError } from '../errors';
import { ZapInRequest, ZapOutRequest } from '../types/zap';
import { isValidAddress } from './addresses';
import { assertSlippageBps } from './math';

/**
 * Require a strictly positive amount.
 *
 * @throws {ZeroAmountError} for zero
 * @throws {ValidationError} for negative amounts
 */
export function validatePositiveAmount(amount: bigint, field: string): void {
  if (amount === 0n) throw new ZeroAmountError(field);
  if (amount < 0n) {
    throw new ValidationError(`${field} must not be negative`, { field, amount: amount.toString() });
  }
}

/**
 * Require a non-negative amount (minimum bounds may be zero).
 */
export function validateNonNegativeAmount(amount: bigint, field: string): void {
  if (amount < 0n) {
    throw new ValidationError(`${field} must not be negative`, { field, amount: amount.toString() });
  }
}

/**
 * Require a Stellar public key or contract address.
 */
export function validateAddress(address: string, field: string): void {
  if (!isValidAddress(address)) {
    throw new ValidationError(`${field} is not a valid Stellar address`, { field, address });
  }
}

function validatePair(tokenA: string, tokenB: string): void {
  if (tokenA === tokenB) {
    throw new ValidationError('Pair assets must differ', { tokenA, tokenB });
  }
}

function validateDeadline(deadline: number): void {
  if (!Number.isSafeInteger(deadline) || deadline < 0) {
    throw new ValidationError('deadline must be a non-negative integer timestamp', { deadline });
  }
}

/**
 * Check a zap-in request and return the pair asset that is not the input.
 */
export function validateZapInRequest(request: ZapInRequest): string {
  validatePositiveAmount(request.inputAmount, 'inputAmount');
  validateNonNegativeAmount(request.minimumLiquidityOut, 'minimumLiquidityOut');
  assertSlippageBps(request.maxSlippageBps);
  validateDeadline(request.deadline);
  validatePair(request.pairAssetA, request.pairAssetB);

  if (request.inputAsset === request.pairAssetA) return request.pairAssetB;
  if (request.inputAsset === request.pairAssetB) return request.pairAssetA;
  throw new UnsupportedInputTokenError(request.inputAsset, request.pairAssetA, request.pairAssetB);
}

/**
 * Check a zap-out request and return the pair asset that is not the output.
 */
export function validateZapOutRequest(request: ZapOutRequest): string {
  validatePositiveAmount(request.liquidityIn, 'liquidityIn');
  validateNonNegativeAmount(request.minimumOutputAmount, 'minimumOutputAmount');
  assertSlippageBps(request.maxSlippageBps);
  validateDeadline(request.deadline);
  validatePair(request.pairAssetA, request.pairAssetB);

  if (request.outputAsset === request.pairAssetA) return request.pairAssetB;
  if (request.outputAsset === request.pairAssetB) return request.pairAssetA;
  throw new UnsupportedOutputTokenError(request.outputAsset, request.pairAssetA, request.pairAssetB);
}
