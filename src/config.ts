import { Network, Logger } from './types/common';

/**
 * Contract addresses per network deployment.
 */
export interface NetworkConfig {
  rpcUrl: string;
  networkPassphrase: string;
  factoryAddress: string;
  zapAddress: string;
  sorobanTimeout: number;
}

/**
 * SDK client configuration.
 */
export interface ZapConfig {
  /** The Soroban network to connect to */
  network: Network;
  /** Optional custom RPC URL to use */
  rpcUrl?: string;
  /** Contract addresses overriding the network's known deployment */
  contracts?: Partial<Pick<NetworkConfig, 'factoryAddress' | 'zapAddress'>>;
  /** Optional secret key for signing transactions */
  secretKey?: string;
  /** Optional public key for the account */
  publicKey?: string;
  /** Optional logger for RPC and orchestration instrumentation. */
  logger?: Logger;
  /** Default slippage tolerance in basis points (0-10000) */
  defaultSlippageBps?: number;
  /** Default transaction deadline in seconds from now */
  defaultDeadlineSec?: number;
  /** Maximum number of retry attempts for failed RPC reads */
  maxRetries?: number;
  /** Initial delay in milliseconds between retry attempts */
  retryDelayMs?: number;
  /** Maximum delay in milliseconds between retry attempts */
  maxRetryDelayMs?: number;
}

/**
 * Known contract addresses for each network.
 */
export const NETWORK_CONFIGS: Record<Network, NetworkConfig> = {
  [Network.TESTNET]: {
    rpcUrl: 'https://soroban-testnet.stellar.org',
    networkPassphrase: 'Test SDF Network ; September 2015',
    factoryAddress: '',
    zapAddress: '',
    sorobanTimeout: 30,
  },
  [Network.MAINNET]: {
    rpcUrl: 'https://soroban.stellar.org',
    networkPassphrase: 'Public Global Stellar Network ; September 2015',
    factoryAddress: '',
    zapAddress: '',
    sorobanTimeout: 30,
  },
};

/**
 * Default SDK configuration values.
 */
export const DEFAULTS = {
  slippageBps: 50,
  deadlineSec: 1200,
  maxRetries: 3,
  retryDelayMs: 1000,
  maxRetryDelayMs: 10000,
  pollIntervalMs: 1000,
  maxPollAttempts: 30,
} as const;

/**
 * Integer constants of the constant-product pool the zap targets.
 */
export const PRECISION = {
  BPS_DENOMINATOR: 10000n,
  /** Pool fee as numerator / denominator: 0.3%. */
  FEE_NUMERATOR: 997n,
  FEE_DENOMINATOR: 1000n,
  /** LP units locked forever on the first deposit. */
  MINIMUM_LIQUIDITY: 1000n,
  /** Largest Soroban i128, granted as the unlimited allowance. */
  MAX_ALLOWANCE: (1n << 127n) - 1n,
} as const;
