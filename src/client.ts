import { Keypair, SorobanRpc, TransactionBuilder, xdr } from '@stellar/stellar-sdk';
import { ZapConfig, NetworkConfig, NETWORK_CONFIGS, DEFAULTS } from './config';
import { Network, Result, Logger } from './types/common';
import { ZapInParams, ZapInQuote, ZapInRequest, ZapOutParams, ZapOutQuote, ZapOutRequest } from './types/zap';
import { FactoryClient } from './contracts/factory';
import { PairClient } from './contracts/pair';
import { ZapContractClient } from './contracts/zap';
import { PairAddressResolver } from './modules/pair-resolver';
import { planZapIn, planZapOut } from './modules/planner';
import { SignerError, ValidationError, mapError } from './errors';
import { messageOf } from './errors/parser';
import { sortTokens } from './utils/addresses';
import { minOut } from './utils/math';
import { RetryOptions } from './utils/retry';
import { Confirmation, TransactionPoller } from './utils/polling';
import { validateAddress } from './utils/validation';

/**
 * Network entry point of the zap SDK.
 *
 * Reads pools through Soroban RPC, previews zaps with the planner and
 * submits the on-chain zap contract's operations.
 */
export class ZapClient {
  readonly network: Network;
  readonly config: ZapConfig;
  readonly networkConfig: NetworkConfig;
  readonly server: SorobanRpc.Server;
  readonly logger?: Logger;

  private keypair: Keypair | null = null;
  private retryOptions: RetryOptions;
  private _factory: FactoryClient | null = null;
  private _resolver: PairAddressResolver | null = null;
  private _zap: ZapContractClient | null = null;

  constructor(config: ZapConfig) {
    this.config = {
      defaultSlippageBps: DEFAULTS.slippageBps,
      defaultDeadlineSec: DEFAULTS.deadlineSec,
      maxRetries: DEFAULTS.maxRetries,
      retryDelayMs: DEFAULTS.retryDelayMs,
      maxRetryDelayMs: DEFAULTS.maxRetryDelayMs,
      ...config,
    };

    this.network = config.network;
    this.logger = config.logger;
    this.networkConfig = {
      ...NETWORK_CONFIGS[config.network],
      ...(config.rpcUrl ? { rpcUrl: config.rpcUrl } : {}),
      ...config.contracts,
    };

    this.retryOptions = {
      maxRetries: this.config.maxRetries ?? DEFAULTS.maxRetries,
      baseDelayMs: this.config.retryDelayMs ?? DEFAULTS.retryDelayMs,
      maxDelayMs: this.config.maxRetryDelayMs ?? DEFAULTS.maxRetryDelayMs,
    };

    this.server = new SorobanRpc.Server(this.networkConfig.rpcUrl);

    if (config.secretKey) {
      this.keypair = Keypair.fromSecret(config.secretKey);
    }
  }

  /**
   * Get the public key of the configured signer.
   */
  get publicKey(): string {
    if (this.config.publicKey) return this.config.publicKey;
    if (this.keypair) return this.keypair.publicKey();
    throw new SignerError();
  }

  /**
   * Access the Factory contract client (singleton).
   */
  get factory(): FactoryClient {
    if (!this._factory) {
      this._factory = new FactoryClient(
        this.requireAddress('factoryAddress'),
        this.networkConfig.rpcUrl,
        this.networkConfig.networkPassphrase,
        this.retryOptions,
        this.logger,
      );
    }
    return this._factory;
  }

  /**
   * Pair resolver over the factory, with its address cache (singleton).
   */
  get resolver(): PairAddressResolver {
    if (!this._resolver) {
      this._resolver = new PairAddressResolver(
        this.factory,
        this.factory.address,
        this.networkConfig.networkPassphrase,
      );
    }
    return this._resolver;
  }

  /**
   * Access the zap contract's operation builder (singleton).
   */
  get zapContract(): ZapContractClient {
    if (!this._zap) {
      this._zap = new ZapContractClient(this.requireAddress('zapAddress'));
    }
    return this._zap;
  }

  /**
   * Create a PairClient for a specific pair contract address.
   */
  pair(pairAddress: string): PairClient {
    return new PairClient(
      pairAddress,
      this.networkConfig.rpcUrl,
      this.networkConfig.networkPassphrase,
      this.retryOptions,
      this.logger,
    );
  }

  /**
   * Live pool address of a pair, or null when the factory has none.
   */
  async resolvePool(tokenA: string, tokenB: string): Promise<string | null> {
    return this.resolver.resolveLive(tokenA, tokenB);
  }

  /**
   * Pool address the factory deploys (or deployed) for a pair, computed locally.
   */
  derivePairAddress(tokenA: string, tokenB: string): string {
    return this.resolver.deriveDeterministic(tokenA, tokenB);
  }

  /**
   * Preview a zap in against the pool's current state.
   */
  async quoteZapIn(params: ZapInParams): Promise<ZapInQuote> {
    const request = this.zapInRequest(params, params.minimumLiquidityOut ?? 0n);
    const { pairAddress, reserves, totalSupply } = await this.readPool(request.pairAssetA, request.pairAssetB);
    return planZapIn(request, pairAddress, reserves, totalSupply);
  }

  /**
   * Preview a zap out against the pool's current state.
   */
  async quoteZapOut(params: ZapOutParams): Promise<ZapOutQuote> {
    const request = this.zapOutRequest(params, params.minimumOutputAmount ?? 0n);
    const { pairAddress, reserves, totalSupply } = await this.readPool(request.pairAssetA, request.pairAssetB);
    return planZapOut(request, pairAddress, reserves, totalSupply);
  }

  /**
   * Submit a zap in through the zap contract.
   *
   * Without `minimumLiquidityOut` the floor is the quoted liquidity less
   * the slippage tolerance.
   */
  async zapIn(params: ZapInParams, source?: string): Promise<Result<Confirmation>> {
    let minimumLiquidityOut = params.minimumLiquidityOut;
    if (minimumLiquidityOut === undefined) {
      const quote = await this.quoteZapIn(params);
      minimumLiquidityOut = minOut(quote.expectedLiquidity, this.slippage(params.maxSlippageBps));
    }

    const sender = source ?? this.publicKey;
    const request = this.zapInRequest(params, minimumLiquidityOut);
    this.logger?.debug('ZapClient: zap in', { sender, inputAmount: request.inputAmount.toString() });
    return this.submitTransaction([this.zapContract.buildZapIn(sender, request)], sender);
  }

  /**
   * Submit a zap out through the zap contract.
   *
   * Without `minimumOutputAmount` the floor is the quoted output less the
   * slippage tolerance.
   */
  async zapOut(params: ZapOutParams, source?: string): Promise<Result<Confirmation>> {
    let minimumOutputAmount = params.minimumOutputAmount;
    if (minimumOutputAmount === undefined) {
      const quote = await this.quoteZapOut(params);
      minimumOutputAmount = minOut(quote.expectedAmountOut, this.slippage(params.maxSlippageBps));
    }

    const sender = source ?? this.publicKey;
    const request = this.zapOutRequest(params, minimumOutputAmount);
    this.logger?.debug('ZapClient: zap out', { sender, liquidityIn: request.liquidityIn.toString() });
    return this.submitTransaction([this.zapContract.buildZapOut(sender, request)], sender);
  }

  /**
   * Build, simulate, sign and submit a transaction.
   */
  async submitTransaction(operations: xdr.Operation[], source?: string): Promise<Result<Confirmation>> {
    try {
      if (!this.keypair) throw new SignerError();
      const account = await this.server.getAccount(source ?? this.publicKey);

      let builder = new TransactionBuilder(account, {
        fee: '100',
        networkPassphrase: this.networkConfig.networkPassphrase,
      });
      for (const op of operations) {
        builder = builder.addOperation(op);
      }
      const tx = builder.setTimeout(this.networkConfig.sorobanTimeout).build();

      const sim = await this.server.simulateTransaction(tx);
      if (!SorobanRpc.Api.isSimulationSuccess(sim)) {
        const reason = SorobanRpc.Api.isSimulationError(sim) ? sim.error : 'restore required';
        const mapped = mapError(new Error(`Simulation failed: ${reason}`));
        this.logger?.error('ZapClient: simulation failed', mapped);
        return {
          success: false,
          error: { code: mapped.code, message: mapped.message, details: { simulationError: reason } },
        };
      }

      const preparedTx = SorobanRpc.assembleTransaction(tx, sim).build();
      preparedTx.sign(this.keypair);

      const response = await this.server.sendTransaction(preparedTx);
      if (response.status === 'ERROR') {
        this.logger?.error('ZapClient: submission rejected', { hash: response.hash });
        return {
          success: false,
          error: { code: 'SUBMIT_FAILED', message: 'Transaction submission failed' },
          txHash: response.hash,
        };
      }

      return new TransactionPoller(this.server, this.logger).poll(response.hash, {
        intervalMs: DEFAULTS.pollIntervalMs,
        maxAttempts: DEFAULTS.maxPollAttempts,
      });
    } catch (err) {
      const mapped = mapError(err);
      this.logger?.error('ZapClient: transaction failed', mapped);
      return {
        success: false,
        error: { code: mapped.code, message: mapped.message, details: mapped.details },
      };
    }
  }

  /**
   * Calculate a deadline timestamp (now + offset seconds).
   */
  getDeadline(offsetSec?: number): number {
    const offset = offsetSec ?? this.config.defaultDeadlineSec ?? DEFAULTS.deadlineSec;
    return Math.floor(Date.now() / 1000) + offset;
  }

  /**
   * Health check -- verify RPC connection.
   */
  async isHealthy(): Promise<boolean> {
    try {
      const health = await this.server.getHealth();
      return health.status === 'healthy';
    } catch (err) {
      this.logger?.debug('ZapClient: health check failed', { error: messageOf(err) });
      return false;
    }
  }

  private async readPool(tokenA: string, tokenB: string) {
    const pairAddress = await this.resolver.resolveOrThrow(tokenA, tokenB);
    const pool = this.pair(pairAddress);
    const [reserves, tokens, totalSupply] = await Promise.all([
      pool.getReserves(),
      pool.getTokens(),
      pool.totalSupply(),
    ]);

    // Planner takes reserves in sorted order; the pair reports them in its own.
    const [token0, token1] = sortTokens(tokenA, tokenB);
    if (tokens.token0 === token0 && tokens.token1 === token1) {
      return { pairAddress, reserves, totalSupply };
    }
    if (tokens.token0 === token1 && tokens.token1 === token0) {
      return { pairAddress, reserves: { reserve0: reserves.reserve1, reserve1: reserves.reserve0 }, totalSupply };
    }
    throw new ValidationError('Pool does not hold the requested pair', { pairAddress, tokenA, tokenB, ...tokens });
  }

  private zapInRequest(params: ZapInParams, minimumLiquidityOut: bigint): ZapInRequest {
    return {
      inputAsset: params.inputAsset,
      pairAssetA: params.pairAssetA,
      pairAssetB: params.pairAssetB,
      inputAmount: params.inputAmount,
      maxSlippageBps: this.slippage(params.maxSlippageBps),
      minimumLiquidityOut,
      deadline: params.deadline ?? this.getDeadline(),
      feeOnTransfer: params.feeOnTransfer ?? false,
    };
  }

  private zapOutRequest(params: ZapOutParams, minimumOutputAmount: bigint): ZapOutRequest {
    return {
      outputAsset: params.outputAsset,
      pairAssetA: params.pairAssetA,
      pairAssetB: params.pairAssetB,
      liquidityIn: params.liquidityIn,
      maxSlippageBps: this.slippage(params.maxSlippageBps),
      minimumOutputAmount,
      deadline: params.deadline ?? this.getDeadline(),
      feeOnTransfer: params.feeOnTransfer ?? false,
    };
  }

  private slippage(bps?: number): number {
    return bps ?? this.config.defaultSlippageBps ?? DEFAULTS.slippageBps;
  }

  private requireAddress(key: 'factoryAddress' | 'zapAddress'): string {
    const address = this.networkConfig[key];
    if (!address) {
      throw new ValidationError(`${key} not configured for ${this.network}`, { network: this.network });
    }
    validateAddress(address, key);
    return address;
  }
}
