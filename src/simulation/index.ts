export { LocalLedger, contractError } from './ledger';
export { LocalToken } from './token';
export type { LocalTokenOptions } from './token';
export { LocalPair, LOCKED_LIQUIDITY_HOLDER } from './pair';
export { LocalFactory } from './factory';
export { LocalRouter } from './router';
export { deployLocal } from './deployment';
export type { LocalDeployment, LocalDeploymentOptions } from './deployment';
