import { Logger } from '../types/common';
import { messageOf } from '../errors/parser';

/**
 * Options for the retry policy of read-only RPC calls.
 */
export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier?: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

function fieldOf(err: unknown, key: string): unknown {
  if (err && typeof err === 'object' && key in err) {
    return Reflect.get(err, key);
  }
  return undefined;
}

/**
 * Helper to determine if an error is a transient transport failure.
 */
export function isRetryable(err: unknown): boolean {
  if (!err) return false;
  const message = messageOf(err).toLowerCase();
  const rawCode = fieldOf(err, 'code');
  const code = typeof rawCode === 'string' ? rawCode.toUpperCase() : '';
  const status = fieldOf(fieldOf(err, 'response'), 'status');

  return (
    status === 429 ||
    status === 503 ||
    code === 'ECONNABORTED' ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    message.includes('timeout') ||
    message.includes('socket hang up') ||
    message.includes('too many requests') ||
    message.includes('service unavailable') ||
    message.includes('econnrefused') ||
    message.includes('econnreset')
  );
}

/**
 * Simple sleep helper.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async read with exponential backoff retry.
 *
 * Only for idempotent reads: zap operations are never retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
  logger?: Logger,
  label: string = 'RPC',
): Promise<T> {
  const multiplier = options.backoffMultiplier ?? 2;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err) || attempt >= options.maxRetries) {
        throw err;
      }

      const delay = Math.min(
        options.maxDelayMs,
        options.baseDelayMs * Math.pow(multiplier, attempt),
      );

      logger?.debug(`${label}: retrying after ${delay}ms`, {
        attempt: attempt + 1,
        maxRetries: options.maxRetries,
        error: messageOf(err),
      });

      await sleep(delay);
    }
  }
}
