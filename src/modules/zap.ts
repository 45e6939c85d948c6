import {
  AssetDirectory,
  AtomicExecutor,
  FungibleAsset,
  PoolDirectory,
  Router,
} from '../types/collaborators';
import { Logger } from '../types/common';
import { ZapEvent, ZapEventSink } from '../types/events';
import { LiquidityPlan, SwapPlan, ZapInRequest, ZapOutRequest } from '../types/zap';
import {
  ExternalCollaboratorError,
  SlippageExceededError,
  SwapBoundsViolatedError,
  ZapSDKError,
} from '../errors';
import { AllowanceManager } from './allowance';
import { PairAddressResolver } from './pair-resolver';
import { sortTokens } from '../utils/addresses';
import { measureReceived } from '../utils/balance';
import { ReentrancyLock } from '../utils/lock';
import { minOut, optimalSwap } from '../utils/math';
import { validateZapInRequest, validateZapOutRequest } from '../utils/validation';

/**
 * Collaborators of a {@link ZapModule}, fixed at construction.
 */
export interface ZapEnvironment {
  /** Address the zap holds funds under while an operation is in flight */
  custody: string;
  router: Router;
  pools: PoolDirectory;
  assets: AssetDirectory;
  resolver: PairAddressResolver;
  /** All-or-nothing scope every operation runs in */
  executor: AtomicExecutor;
  events?: ZapEventSink;
  logger?: Logger;
}

type ZapState =
  | 'FundsAcquired'
  | 'Sized'
  | 'Quoted'
  | 'Swapped'
  | 'LiquidityAdded'
  | 'LiquidityRemoved'
  | 'Verified';

/**
 * Zap module -- enter or exit a constant-product position with one asset.
 *
 * Each operation pulls the caller's funds into custody first, sizes and
 * executes the swap, performs the liquidity operation and checks the
 * caller's bounds before anything is paid out. It runs under a reentrancy
 * lock and inside the environment's atomic scope, so any failure discards
 * every effect, including the pulled funds.
 */
export class ZapModule {
  private env: ZapEnvironment;
  private lock = new ReentrancyLock();
  private allowances: AllowanceManager;

  constructor(env: ZapEnvironment) {
    this.env = env;
    this.allowances = new AllowanceManager(env.logger);
  }

  /**
   * Pool address of a pair from the registry, or null when absent.
   */
  async resolvePool(tokenA: string, tokenB: string): Promise<string | null> {
    return this.call('getPool', () => this.env.resolver.resolveLive(tokenA, tokenB));
  }

  /**
   * Swap part of a single asset and deposit both legs as liquidity.
   *
   * @param caller - Address the input is pulled from and LP units are minted to.
   * @returns LP units minted.
   */
  async zapInSingleToken(caller: string, request: ZapInRequest): Promise<bigint> {
    const liquidityMinted = await this.guarded('zapInSingleToken', () =>
      this.executeZapIn(caller, request),
    );

    this.emit('zapInSingleToken', {
      type: 'zap_in',
      caller,
      inputAsset: request.inputAsset,
      pairAssetA: request.pairAssetA,
      pairAssetB: request.pairAssetB,
      inputAmount: request.inputAmount,
      liquidityMinted,
    });
    return liquidityMinted;
  }

  /**
   * Withdraw liquidity and convert both legs into a single asset.
   *
   * @param caller - Address the LP units are pulled from and the output is sent to.
   * @returns Amount of output asset sent to the caller.
   */
  async zapOutSingleToken(caller: string, request: ZapOutRequest): Promise<bigint> {
    const amountOut = await this.guarded('zapOutSingleToken', () =>
      this.executeZapOut(caller, request),
    );

    this.emit('zapOutSingleToken', {
      type: 'zap_out',
      caller,
      outputAsset: request.outputAsset,
      pairAssetA: request.pairAssetA,
      pairAssetB: request.pairAssetB,
      liquidityIn: request.liquidityIn,
      amountOut,
    });
    return amountOut;
  }

  private async executeZapIn(caller: string, request: ZapInRequest): Promise<bigint> {
    const otherAsset = validateZapInRequest(request);
    const { custody, router } = this.env;
    const input = this.env.assets.asset(request.inputAsset);
    const other = this.env.assets.asset(otherAsset);

    const credited = await this.pull(input, caller, request.inputAmount, request.feeOnTransfer);
    await this.approveRouter(input, credited);
    this.transition('zapIn', 'FundsAcquired', { credited: credited.toString() });

    const pairAddress = await this.call('getPool', () =>
      this.env.resolver.resolveOrThrow(request.pairAssetA, request.pairAssetB),
    );
    const reserves = await this.call('getReserves', () =>
      this.env.pools.pool(pairAddress).getReserves(),
    );
    const [token0] = sortTokens(request.inputAsset, otherAsset);
    const [reserveIn, reserveOut] = request.inputAsset === token0
      ? [reserves.reserve0, reserves.reserve1]
      : [reserves.reserve1, reserves.reserve0];
    if (reserveIn === 0n || reserveOut === 0n) {
      throw new SwapBoundsViolatedError(0n, credited, { pairAddress, reason: 'empty reserves' });
    }

    const toSwap = optimalSwap(credited, reserveIn);
    if (toSwap <= 0n || toSwap >= credited) {
      throw new SwapBoundsViolatedError(toSwap, credited, { pairAddress });
    }
    this.transition('zapIn', 'Sized', { pairAddress, reserveIn: reserveIn.toString(), toSwap: toSwap.toString() });

    const swap = await this.planSwap(request.inputAsset, otherAsset, toSwap, request.maxSlippageBps);
    const received = await this.executeSwap(swap, other, request.deadline, request.feeOnTransfer);
    this.transition('zapIn', 'Swapped', { received: received.toString() });

    const remainder = credited - toSwap;
    const plan: LiquidityPlan = {
      tokenA: request.inputAsset,
      tokenB: otherAsset,
      amountA: remainder,
      amountB: received,
      minimumA: minOut(remainder, request.maxSlippageBps),
      minimumB: minOut(received, request.maxSlippageBps),
    };
    await this.approveRouter(input, plan.amountA);
    await this.approveRouter(other, plan.amountB);

    const deposit = await this.call('addLiquidity', () =>
      router.addLiquidity(
        custody,
        plan.tokenA,
        plan.tokenB,
        plan.amountA,
        plan.amountB,
        plan.minimumA,
        plan.minimumB,
        caller,
        request.deadline,
      ),
    );
    this.transition('zapIn', 'LiquidityAdded', { liquidity: deposit.liquidity.toString() });

    if (deposit.liquidity < request.minimumLiquidityOut) {
      throw new SlippageExceededError(request.minimumLiquidityOut, deposit.liquidity, { pairAddress });
    }
    this.transition('zapIn', 'Verified');

    // Legs the pool did not take at its ratio go back to the caller.
    await this.payOut(input, caller, plan.amountA - deposit.amountA);
    await this.payOut(other, caller, plan.amountB - deposit.amountB);

    return deposit.liquidity;
  }

  private async executeZapOut(caller: string, request: ZapOutRequest): Promise<bigint> {
    const otherAsset = validateZapOutRequest(request);
    const { custody, router } = this.env;

    const pairAddress = await this.call('getPool', () =>
      this.env.resolver.resolveOrThrow(request.pairAssetA, request.pairAssetB),
    );
    const lp = this.env.assets.asset(pairAddress);
    await this.call('transferFrom', () => lp.transferFrom(custody, caller, custody, request.liquidityIn));
    await this.approveRouter(lp, request.liquidityIn);
    this.transition('zapOut', 'FundsAcquired', { pairAddress });

    const keep = this.env.assets.asset(request.outputAsset);
    const other = this.env.assets.asset(otherAsset);
    const withdraw = () =>
      router.removeLiquidity(
        custody,
        request.outputAsset,
        otherAsset,
        request.liquidityIn,
        0n,
        0n,
        custody,
        request.deadline,
      );

    let kept: bigint;
    let otherAmount: bigint;
    if (request.feeOnTransfer) {
      const [keptBefore, otherBefore] = await this.call('balanceOf', () =>
        Promise.all([keep.balanceOf(custody), other.balanceOf(custody)]),
      );
      await this.call('removeLiquidity', withdraw);
      const [keptAfter, otherAfter] = await this.call('balanceOf', () =>
        Promise.all([keep.balanceOf(custody), other.balanceOf(custody)]),
      );
      kept = keptAfter - keptBefore;
      otherAmount = otherAfter - otherBefore;
    } else {
      const withdrawn = await this.call('removeLiquidity', withdraw);
      kept = withdrawn.amountA;
      otherAmount = withdrawn.amountB;
    }
    this.transition('zapOut', 'LiquidityRemoved', { kept: kept.toString(), other: otherAmount.toString() });

    let converted = 0n;
    if (otherAmount > 0n) {
      await this.approveRouter(other, otherAmount);
      const swap = await this.planSwap(otherAsset, request.outputAsset, otherAmount, request.maxSlippageBps);
      converted = await this.executeSwap(swap, keep, request.deadline, request.feeOnTransfer);
      this.transition('zapOut', 'Swapped', { converted: converted.toString() });
    }

    const amountOut = kept + converted;
    if (amountOut < request.minimumOutputAmount) {
      throw new SlippageExceededError(request.minimumOutputAmount, amountOut, { pairAddress });
    }
    this.transition('zapOut', 'Verified');

    await this.payOut(keep, caller, amountOut);
    return amountOut;
  }

  /**
   * Pull `amount` from the caller into custody, returning the amount credited.
   */
  private async pull(
    asset: FungibleAsset,
    caller: string,
    amount: bigint,
    feeOnTransfer: boolean,
  ): Promise<bigint> {
    const { custody } = this.env;
    const transfer = () => asset.transferFrom(custody, caller, custody, amount);
    if (feeOnTransfer) {
      return this.call('transferFrom', () => measureReceived(asset, custody, transfer));
    }
    await this.call('transferFrom', transfer);
    return amount;
  }

  private async planSwap(
    from: string,
    to: string,
    amountIn: bigint,
    maxSlippageBps: number,
  ): Promise<SwapPlan> {
    const amounts = await this.call('getAmountsOut', () =>
      this.env.router.getAmountsOut(amountIn, [from, to]),
    );
    const expected = this.last(amounts, 'getAmountsOut');
    this.transition('swap', 'Quoted', { from, to, amountIn: amountIn.toString(), expected: expected.toString() });
    return {
      path: [from, to],
      amountIn,
      amountOutMin: minOut(expected, maxSlippageBps),
    };
  }

  /**
   * Execute a swap into custody, returning the amount credited.
   *
   * Fee-on-transfer swaps are credited by the measured balance delta;
   * otherwise the router's reported output is used.
   */
  private async executeSwap(
    plan: SwapPlan,
    out: FungibleAsset,
    deadline: number,
    feeOnTransfer: boolean,
  ): Promise<bigint> {
    const { custody, router } = this.env;
    if (feeOnTransfer) {
      return this.call('swapExactTokensForTokensSupportingFeeOnTransferTokens', () =>
        measureReceived(out, custody, () =>
          router.swapExactTokensForTokensSupportingFeeOnTransferTokens(
            custody,
            plan.amountIn,
            plan.amountOutMin,
            plan.path,
            custody,
            deadline,
          ),
        ),
      );
    }

    const amounts = await this.call('swapExactTokensForTokens', () =>
      router.swapExactTokensForTokens(custody, plan.amountIn, plan.amountOutMin, plan.path, custody, deadline),
    );
    return this.last(amounts, 'swapExactTokensForTokens');
  }

  private async approveRouter(asset: FungibleAsset, amount: bigint): Promise<void> {
    await this.call('approve', () =>
      this.allowances.ensureAllowance(asset, this.env.custody, this.env.router.address, amount),
    );
  }

  private async payOut(asset: FungibleAsset, to: string, amount: bigint): Promise<void> {
    if (amount <= 0n) return;
    await this.call('transfer', () => asset.transfer(this.env.custody, to, amount));
  }

  private last(amounts: bigint[], operation: string): bigint {
    const value = amounts[amounts.length - 1];
    if (value === undefined) {
      throw new ExternalCollaboratorError(operation, new Error('Router returned no amounts'));
    }
    return value;
  }

  /**
   * Run a collaborator call, wrapping foreign errors.
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ZapSDKError) throw err;
      throw new ExternalCollaboratorError(operation, err);
    }
  }

  /**
   * Run an entry point under the reentrancy lock and the atomic scope.
   */
  private async guarded<T>(entryPoint: string, work: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await this.lock.run(entryPoint, () => this.env.executor.atomic(work));
    } catch (err) {
      this.env.logger?.error(`ZapModule: ${entryPoint} aborted`, err);
      throw err;
    }
    this.afterCommit(entryPoint, () => this.env.logger?.info(`ZapModule: ${entryPoint} committed`));
    return result;
  }

  /**
   * Run a side effect of a committed operation, logging its failure
   * instead of rejecting.
   */
  private afterCommit(entryPoint: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.env.logger?.error(`ZapModule: ${entryPoint} notification failed`, err);
    }
  }

  private transition(operation: string, state: ZapState, data?: Record<string, unknown>): void {
    this.env.logger?.debug(`ZapModule: ${operation} -> ${state}`, data);
  }

  private emit(entryPoint: string, event: ZapEvent): void {
    this.afterCommit(entryPoint, () => this.env.events?.emit(event));
  }
}
