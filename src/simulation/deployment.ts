import { Logger } from '../types/common';
import { ZapEventSink } from '../types/events';
import { PairAddressResolver } from '../modules/pair-resolver';
import { ZapModule } from '../modules/zap';
import { LocalFactory } from './factory';
import { LocalLedger } from './ledger';
import { LocalRouter } from './router';

/**
 * Addresses and hooks of a local deployment.
 */
export interface LocalDeploymentOptions {
  factoryAddress: string;
  routerAddress: string;
  /** Custody address of the zap */
  zapAddress: string;
  networkPassphrase: string;
  /** Initial ledger time in unix seconds */
  timestamp?: number;
  events?: ZapEventSink;
  logger?: Logger;
}

/**
 * A zap wired to a fresh local AMM.
 */
export interface LocalDeployment {
  ledger: LocalLedger;
  factory: LocalFactory;
  router: LocalRouter;
  resolver: PairAddressResolver;
  zap: ZapModule;
}

/**
 * Deploy a factory, a router and a zap on a new {@link LocalLedger}.
 *
 * @example
 * ```ts
 * const { ledger, factory, zap } = deployLocal(options);
 * const usdc = new LocalToken(ledger, USDC);
 * const xlm = new LocalToken(ledger, XLM);
 * factory.createPair(USDC, XLM);
 * ```
 */
export function deployLocal(options: LocalDeploymentOptions): LocalDeployment {
  const ledger = new LocalLedger(options.timestamp);
  const factory = new LocalFactory(ledger, options.factoryAddress, options.networkPassphrase);
  const router = new LocalRouter(ledger, factory, options.routerAddress);
  const resolver = new PairAddressResolver(factory, options.factoryAddress, options.networkPassphrase);

  const zap = new ZapModule({
    custody: options.zapAddress,
    router,
    pools: factory,
    assets: ledger,
    resolver,
    executor: ledger,
    events: options.events,
    logger: options.logger,
  });

  return { ledger, factory, router, resolver, zap };
}
