/**
 * Typed error hierarchy for the zap SDK.
 *
 * All errors extend ZapSDKError and carry a machine-readable
 * error code for programmatic handling plus human-readable messages.
 */

import { ErrorParser, messageOf } from './errors/parser';

/**
 * Base error class for all SDK errors.
 */
export class ZapSDKError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ZapSDKError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A zero input amount or zero liquidity amount was supplied.
 */
export class ZeroAmountError extends ZapSDKError {
  constructor(field: string) {
    super('ZERO_AMOUNT', `${field} must be greater than zero`, { field });
    this.name = 'ZeroAmountError';
  }
}

/**
 * Pool not found for a token pair.
 */
export class PairNotFoundError extends ZapSDKError {
  constructor(tokenA: string, tokenB: string) {
    super('PAIR_NOT_FOUND', `Pair not found for tokens ${tokenA} / ${tokenB}`, {
      tokenA,
      tokenB,
    });
    this.name = 'PairNotFoundError';
  }
}

/**
 * The computed pre-swap amount is not strictly between zero and the input,
 * or the pool holds a zero reserve.
 */
export class SwapBoundsViolatedError extends ZapSDKError {
  constructor(toSwap: bigint, amountIn: bigint, details?: Record<string, unknown>) {
    super(
      'SWAP_BOUNDS_VIOLATED',
      `Pre-swap amount ${toSwap} is outside (0, ${amountIn})`,
      { toSwap: toSwap.toString(), amountIn: amountIn.toString(), ...details },
    );
    this.name = 'SwapBoundsViolatedError';
  }
}

/**
 * A slippage tolerance outside [0, 10000] bps was supplied.
 */
export class InvalidSlippageError extends ZapSDKError {
  constructor(toleranceBps: number) {
    super(
      'INVALID_SLIPPAGE',
      `Slippage tolerance must be an integer between 0 and 10000 bps, got ${toleranceBps}`,
      { toleranceBps },
    );
    this.name = 'InvalidSlippageError';
  }
}

/**
 * Realized liquidity or output fell below the caller's floor.
 */
export class SlippageExceededError extends ZapSDKError {
  constructor(minimum: bigint, actual: bigint, details?: Record<string, unknown>) {
    super(
      'SLIPPAGE_EXCEEDED',
      `Slippage tolerance exceeded. Expected at least ${minimum}, got ${actual}`,
      { minimum: minimum.toString(), actual: actual.toString(), ...details },
    );
    this.name = 'SlippageExceededError';
  }
}

/**
 * The requested output asset is neither pair asset.
 */
export class UnsupportedOutputTokenError extends ZapSDKError {
  constructor(outputAsset: string, tokenA: string, tokenB: string) {
    super(
      'UNSUPPORTED_OUTPUT_TOKEN',
      `Output token ${outputAsset} is not part of pair ${tokenA} / ${tokenB}`,
      { outputAsset, tokenA, tokenB },
    );
    this.name = 'UnsupportedOutputTokenError';
  }
}

/**
 * The requested input asset is neither pair asset.
 */
export class UnsupportedInputTokenError extends ZapSDKError {
  constructor(inputAsset: string, tokenA: string, tokenB: string) {
    super(
      'UNSUPPORTED_INPUT_TOKEN',
      `Input token ${inputAsset} is not part of pair ${tokenA} / ${tokenB}`,
      { inputAsset, tokenA, tokenB },
    );
    this.name = 'UnsupportedInputTokenError';
  }
}

/**
 * A pool, router or asset collaborator rejected a call.
 *
 * The original error is kept in `cause` and is never retried.
 */
export class ExternalCollaboratorError extends ZapSDKError {
  readonly cause: unknown;

  constructor(operation: string, cause: unknown) {
    super(
      'EXTERNAL_COLLABORATOR_FAILURE',
      `${operation} failed: ${messageOf(cause) || 'unknown error'}`,
      { operation },
    );
    this.name = 'ExternalCollaboratorError';
    this.cause = cause;
  }
}

/**
 * An entry point was invoked while another was in progress.
 */
export class ReentrancyError extends ZapSDKError {
  constructor(entryPoint: string) {
    super('REENTRANCY', `Reentrant call to ${entryPoint} rejected`, { entryPoint });
    this.name = 'ReentrancyError';
  }
}

/**
 * Invalid input parameters.
 */
export class ValidationError extends ZapSDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Transaction deadline exceeded.
 */
export class DeadlineError extends ZapSDKError {
  constructor(deadline: number) {
    super('DEADLINE_EXCEEDED', `Transaction deadline exceeded (deadline: ${deadline})`, {
      deadline,
    });
    this.name = 'DeadlineError';
  }
}

/**
 * Insufficient liquidity in a pool.
 */
export class InsufficientLiquidityError extends ZapSDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INSUFFICIENT_LIQUIDITY', message, details);
    this.name = 'InsufficientLiquidityError';
  }
}

/**
 * Network or RPC connection errors.
 */
export class NetworkError extends ZapSDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NETWORK_ERROR', message, details);
    this.name = 'NetworkError';
  }
}

/**
 * RPC endpoint errors (timeouts, rate limits).
 */
export class RpcError extends ZapSDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('RPC_ERROR', message, details);
    this.name = 'RpcError';
  }
}

/**
 * Transaction simulation failures.
 */
export class SimulationError extends ZapSDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SIMULATION_ERROR', message, details);
    this.name = 'SimulationError';
  }
}

/**
 * No signing key configured.
 */
export class SignerError extends ZapSDKError {
  constructor() {
    super(
      'NO_SIGNER',
      'No signing key configured. Provide secretKey in config or use external signing.',
    );
    this.name = 'SignerError';
  }
}

/**
 * Map Soroban contract error codes to SDK errors.
 *
 * Contract error codes are returned in the format: Error(Contract, #XXX)
 * where XXX is the error code defined in the contract.
 */
function mapContractError(code: number): ZapSDKError | null {
  const message = ErrorParser.parseContractError(code) ?? `Contract error ${code}`;
  const details = { contractErrorCode: code };

  switch (code) {
    case 111: // Pair: deadline expired
    case 303: // Router: deadline expired
      return new DeadlineError(0);
    case 103:
    case 104:
    case 106:
    case 304:
      return new InsufficientLiquidityError(message, details);
    case 105:
    case 302:
    case 305:
    case 306:
    case 504:
      return new SlippageExceededError(0n, 0n, { ...details, message });
    case 300:
    case 501:
      return new PairNotFoundError('unknown', 'unknown');
    case 500:
      return new ZeroAmountError('amount');
    case 502:
      return new SwapBoundsViolatedError(0n, 0n, details);
    case 503:
      return new InvalidSlippageError(-1);
    case 505:
      return new UnsupportedOutputTokenError('unknown', 'unknown', 'unknown');
    case 506:
      return new ReentrancyError('zap');
    case 507:
      return new UnsupportedInputTokenError('unknown', 'unknown', 'unknown');
    default:
      if (ErrorParser.parseContractError(code) !== null) {
        return new ValidationError(message, details);
      }
      return null;
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Contract error codes take precedence; otherwise the message is matched
 * against known RPC and network failure patterns.
 */
export function mapError(err: unknown): ZapSDKError {
  if (err instanceof ZapSDKError) return err;

  const message = messageOf(err) || String(err);
  const normalizedMessage = message.toLowerCase();

  const errorCode = ErrorParser.extractErrorCode(err);
  if (errorCode !== null) {
    const mapped = mapContractError(errorCode);
    if (mapped) return mapped;
  }

  if (message.includes('EXPIRED') || normalizedMessage.includes('deadline')) {
    const deadlineMatch = message.match(/deadline[:\s]*[a-z]*[:\s]*(\d+)/i);
    return new DeadlineError(deadlineMatch ? parseInt(deadlineMatch[1], 10) : 0);
  }

  if (
    message.includes('ECONNRESET') ||
    message.includes('ETIMEDOUT') ||
    message.includes('ENOTFOUND') ||
    message.includes('ENETUNREACH')
  ) {
    return new NetworkError(message);
  }

  if (
    normalizedMessage.includes('rate limit') ||
    normalizedMessage.includes('too many requests') ||
    message.includes('429')
  ) {
    return new RpcError(message);
  }

  if (normalizedMessage.includes('simulation')) {
    return new SimulationError(message);
  }

  return new ZapSDKError('UNKNOWN_ERROR', message, { originalError: err });
}
