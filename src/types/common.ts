/**
 * Supported Soroban networks for zap deployments.
 */
export enum Network {
  TESTNET = 'testnet',
  MAINNET = 'mainnet',
}

/**
 * Result wrapper for submitted transactions.
 */
export interface Result<T> {
  success: boolean;
  data?: T;
  error?: ZapErrorInfo;
  txHash?: string;
}

/**
 * Structured error carried by a failed {@link Result}.
 */
export interface ZapErrorInfo {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Logger interface for SDK instrumentation.
 *
 * Implement this interface to receive debug, info, and error logs from
 * the zap orchestrators and the RPC clients. Defaults to undefined
 * (no logging).
 */
export interface Logger {
  /** Debug-level log for state transitions, RPC calls and retries. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for committed operations. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for aborted operations and failed submissions. */
  error(msg: string, err?: unknown): void;
}
