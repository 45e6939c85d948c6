import { SorobanRpc } from '@stellar/stellar-sdk';
import { DEFAULTS } from '../config';
import { messageOf } from '../errors/parser';
import { Logger, Result } from '../types/common';

/**
 * Options of a confirmation poll.
 */
export interface PollingOptions {
  /** Delay between polls in milliseconds. */
  intervalMs?: number;
  maxAttempts?: number;
  /** Multiplier applied to the delay after every poll. 1 keeps it fixed. */
  backoffFactor?: number;
  maxIntervalMs?: number;
}

/**
 * Confirmation of a submitted transaction.
 */
export interface Confirmation {
  txHash: string;
  ledger: number;
}

/**
 * Wait for a submitted transaction to leave the pending state.
 *
 * RPC errors during a poll count as "still pending".
 */
export class TransactionPoller {
  private server: SorobanRpc.Server;
  private logger?: Logger;

  constructor(server: SorobanRpc.Server, logger?: Logger) {
    this.server = server;
    this.logger = logger;
  }

  async poll(txHash: string, options: PollingOptions = {}): Promise<Result<Confirmation>> {
    const maxAttempts = options.maxAttempts ?? DEFAULTS.maxPollAttempts;
    const backoffFactor = options.backoffFactor ?? 1;
    const maxIntervalMs = options.maxIntervalMs ?? DEFAULTS.maxRetryDelayMs;
    let intervalMs = options.intervalMs ?? DEFAULTS.pollIntervalMs;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await this.check(txHash, attempt);
      if (outcome) return outcome;

      if (attempt < maxAttempts) {
        await new Promise((resolve) => setTimeout(resolve, intervalMs));
        intervalMs = Math.min(intervalMs * backoffFactor, maxIntervalMs);
      }
    }

    this.logger?.error('TransactionPoller: timed out', { txHash, attempts: maxAttempts });
    return {
      success: false,
      error: {
        code: 'TX_TIMEOUT',
        message: `Transaction confirmation timed out after ${maxAttempts} attempts`,
        details: { txHash, maxAttempts },
      },
      txHash,
    };
  }

  /**
   * Final result of the transaction, or null while it is pending.
   */
  private async check(txHash: string, attempt: number): Promise<Result<Confirmation> | null> {
    let status: SorobanRpc.Api.GetTransactionResponse;
    try {
      status = await this.server.getTransaction(txHash);
    } catch (err) {
      this.logger?.debug('TransactionPoller: RPC error, still pending', {
        txHash,
        attempt,
        error: messageOf(err),
      });
      return null;
    }

    if (status.status === SorobanRpc.Api.GetTransactionStatus.SUCCESS) {
      this.logger?.info('TransactionPoller: confirmed', { txHash, ledger: status.ledger });
      return { success: true, data: { txHash, ledger: status.ledger }, txHash };
    }
    if (status.status === SorobanRpc.Api.GetTransactionStatus.FAILED) {
      this.logger?.error('TransactionPoller: failed on-chain', { txHash, ledger: status.ledger });
      return {
        success: false,
        error: {
          code: 'TX_FAILED',
          message: 'Transaction failed on-chain',
          details: { ledger: status.ledger },
        },
        txHash,
      };
    }

    this.logger?.debug('TransactionPoller: pending', { txHash, attempt });
    return null;
  }
}
