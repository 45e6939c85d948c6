import { StrKey } from '@stellar/stellar-sdk';
import { PRECISION } from '../src/config';
import { Logger } from '../src/types/common';
import { ZapEvent, ZapEventSink } from '../src/types/events';
import { ZapInRequest, ZapOutRequest } from '../src/types/zap';
import { LocalToken, LocalTokenOptions, deployLocal, LocalDeployment } from '../src/simulation';

export const contractAddress = (n: number): string => StrKey.encodeContract(Buffer.alloc(32, n));
export const accountAddress = (n: number): string => StrKey.encodeEd25519PublicKey(Buffer.alloc(32, n));

// contractAddress(n) sorts by n, so TOKEN_A is token0 of every pair it is in.
export const TOKEN_A = contractAddress(1);
export const TOKEN_B = contractAddress(2);
export const TOKEN_C = contractAddress(3);
// Address order puts LOW_ADDRESS first; strkey text order puts HIGH_ADDRESS ('CA7D4...') first.
export const LOW_ADDRESS = contractAddress(0x00);
export const HIGH_ADDRESS = contractAddress(0x3e);
export const FACTORY = contractAddress(10);
export const ROUTER = contractAddress(11);
export const ZAP = contractAddress(12);

export const USER = accountAddress(1);
export const PROVIDER = accountAddress(2);

export const PASSPHRASE = 'Test SDF Network ; September 2015';
export const START_TIME = 1_700_000_000;

export function mockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  };
}

export interface PoolFixture extends LocalDeployment {
  tokenA: LocalToken;
  tokenB: LocalToken;
  pairAddress: string;
  events: ZapEvent[];
  logger: jest.Mocked<Logger>;
}

export interface PoolFixtureOptions {
  reserveA?: bigint;
  reserveB?: bigint;
  tokenA?: LocalTokenOptions;
  tokenB?: LocalTokenOptions;
  /** Input balance minted to USER (both assets) */
  userBalance?: bigint;
  /** Replaces the sink that records into `events` */
  events?: ZapEventSink;
}

/**
 * Local deployment with one A/B pool seeded by PROVIDER, and USER funded
 * and approving the zap for both assets and the LP asset.
 */
export async function poolFixture(options: PoolFixtureOptions = {}): Promise<PoolFixture> {
  const events: ZapEvent[] = [];
  const logger = mockLogger();
  const deployment = deployLocal({
    factoryAddress: FACTORY,
    routerAddress: ROUTER,
    zapAddress: ZAP,
    networkPassphrase: PASSPHRASE,
    timestamp: START_TIME,
    events: options.events ?? { emit: (event) => events.push(event) },
    logger,
  });
  const { ledger, factory, router } = deployment;

  const tokenA = new LocalToken(ledger, TOKEN_A, options.tokenA);
  const tokenB = new LocalToken(ledger, TOKEN_B, options.tokenB);
  new LocalToken(ledger, TOKEN_C);
  const pair = factory.createPair(TOKEN_A, TOKEN_B);

  const reserveA = options.reserveA ?? 1_000_000n;
  const reserveB = options.reserveB ?? 1_000_000n;
  tokenA.mint(PROVIDER, reserveA);
  tokenB.mint(PROVIDER, reserveB);
  await tokenA.approve(PROVIDER, ROUTER, PRECISION.MAX_ALLOWANCE);
  await tokenB.approve(PROVIDER, ROUTER, PRECISION.MAX_ALLOWANCE);
  await router.addLiquidity(PROVIDER, TOKEN_A, TOKEN_B, reserveA, reserveB, 0n, 0n, PROVIDER, START_TIME);

  const userBalance = options.userBalance ?? 10_000n;
  tokenA.mint(USER, userBalance);
  tokenB.mint(USER, userBalance);
  await tokenA.approve(USER, ZAP, PRECISION.MAX_ALLOWANCE);
  await tokenB.approve(USER, ZAP, PRECISION.MAX_ALLOWANCE);
  await pair.approve(USER, ZAP, PRECISION.MAX_ALLOWANCE);
  await pair.approve(PROVIDER, ZAP, PRECISION.MAX_ALLOWANCE);

  return { ...deployment, tokenA, tokenB, pairAddress: pair.address, events, logger };
}

export function zapInRequest(overrides: Partial<ZapInRequest> = {}): ZapInRequest {
  return {
    inputAsset: TOKEN_A,
    pairAssetA: TOKEN_A,
    pairAssetB: TOKEN_B,
    inputAmount: 10_000n,
    maxSlippageBps: 50,
    minimumLiquidityOut: 0n,
    deadline: START_TIME + 600,
    feeOnTransfer: false,
    ...overrides,
  };
}

export function zapOutRequest(overrides: Partial<ZapOutRequest> = {}): ZapOutRequest {
  return {
    outputAsset: TOKEN_A,
    pairAssetA: TOKEN_A,
    pairAssetB: TOKEN_B,
    liquidityIn: 10_000n,
    maxSlippageBps: 50,
    minimumOutputAmount: 0n,
    deadline: START_TIME + 600,
    feeOnTransfer: false,
    ...overrides,
  };
}
