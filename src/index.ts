export { ZapClient } from './client';
export { NETWORK_CONFIGS, DEFAULTS, PRECISION } from './config';
export type { ZapConfig, NetworkConfig } from './config';

export * from './errors';
export { ErrorParser } from './errors/parser';

export { ZapModule } from './modules/zap';
export type { ZapEnvironment } from './modules/zap';
export { AllowanceManager } from './modules/allowance';
export { PairAddressResolver } from './modules/pair-resolver';
export type { ResolveOptions } from './modules/pair-resolver';
export { planZapIn, planZapOut } from './modules/planner';

export { FactoryClient } from './contracts/factory';
export { PairClient } from './contracts/pair';
export { ZapContractClient } from './contracts/zap';

export * from './simulation';

export * from './types/common';
export * from './types/collaborators';
export * from './types/events';
export * from './types/zap';

export {
  isqrt,
  optimalSwap,
  minOut,
  getAmountOut,
  quote,
  liquidityForDeposit,
  optimalDeposit,
} from './utils/math';
export { getPairAddress, sortTokens, isValidAddress } from './utils/addresses';
export { measureReceived } from './utils/balance';
export { ReentrancyLock } from './utils/lock';
export { withRetry } from './utils/retry';
export type { RetryOptions } from './utils/retry';
export { TransactionPoller } from './utils/polling';
export type { PollingOptions, Confirmation } from './utils/polling';
