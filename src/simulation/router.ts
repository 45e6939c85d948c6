import {
  AddLiquidityResult,
  RemoveLiquidityResult,
  Router,
} from '../types/collaborators';
import { getAmountOut, quote } from '../utils/math';
import { LocalFactory } from './factory';
import { LocalLedger, contractError } from './ledger';
import { LocalPair } from './pair';

/**
 * Router over the pools of a {@link LocalFactory}.
 *
 * Pulls funds from `sender` through the allowance granted to
 * {@link LocalRouter.address} and rejects every call made after its
 * deadline.
 */
export class LocalRouter implements Router {
  readonly address: string;
  private ledger: LocalLedger;
  private factory: LocalFactory;

  constructor(ledger: LocalLedger, factory: LocalFactory, address: string) {
    this.ledger = ledger;
    this.factory = factory;
    this.address = address;
  }

  async getAmountsOut(amountIn: bigint, path: string[]): Promise<bigint[]> {
    if (path.length < 2) throw contractError(301);
    const amounts = [amountIn];
    for (let i = 0; i < path.length - 1; i++) {
      const [reserveIn, reserveOut] = this.reservesFor(path[i], path[i + 1]);
      amounts.push(getAmountOut(amounts[i], reserveIn, reserveOut));
    }
    return amounts;
  }

  async swapExactTokensForTokens(
    sender: string,
    amountIn: bigint,
    amountOutMin: bigint,
    path: string[],
    to: string,
    deadline: number,
  ): Promise<bigint[]> {
    this.ensureDeadline(deadline);
    const amounts = await this.getAmountsOut(amountIn, path);
    if (amounts[amounts.length - 1] < amountOutMin) throw contractError(302);

    await this.ledger
      .asset(path[0])
      .transferFrom(this.address, sender, this.pairFor(path[0], path[1]).address, amountIn);

    for (let i = 0; i < path.length - 1; i++) {
      const recipient = i < path.length - 2 ? this.pairFor(path[i + 1], path[i + 2]).address : to;
      await this.swapHop(path[i], path[i + 1], amounts[i + 1], recipient);
    }
    return amounts;
  }

  async swapExactTokensForTokensSupportingFeeOnTransferTokens(
    sender: string,
    amountIn: bigint,
    amountOutMin: bigint,
    path: string[],
    to: string,
    deadline: number,
  ): Promise<void> {
    this.ensureDeadline(deadline);
    if (path.length < 2) throw contractError(301);

    const last = path[path.length - 1];
    const before = this.ledger.balance(last, to);
    await this.ledger
      .asset(path[0])
      .transferFrom(this.address, sender, this.pairFor(path[0], path[1]).address, amountIn);

    for (let i = 0; i < path.length - 1; i++) {
      const pair = this.pairFor(path[i], path[i + 1]);
      const [reserveIn, reserveOut] = this.reservesFor(path[i], path[i + 1]);
      const amountInput = this.ledger.balance(path[i], pair.address) - reserveIn;
      const amountOutput = getAmountOut(amountInput, reserveIn, reserveOut);
      const recipient = i < path.length - 2 ? this.pairFor(path[i + 1], path[i + 2]).address : to;
      await this.swapHop(path[i], path[i + 1], amountOutput, recipient);
    }

    if (this.ledger.balance(last, to) - before < amountOutMin) throw contractError(302);
  }

  async addLiquidity(
    sender: string,
    tokenA: string,
    tokenB: string,
    amountADesired: bigint,
    amountBDesired: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    to: string,
    deadline: number,
  ): Promise<AddLiquidityResult> {
    this.ensureDeadline(deadline);
    const pair = this.pairFor(tokenA, tokenB);
    const [reserveA, reserveB] = this.reservesFor(tokenA, tokenB);

    let amountA = amountADesired;
    let amountB = amountBDesired;
    if (reserveA !== 0n || reserveB !== 0n) {
      const amountBOptimal = quote(amountADesired, reserveA, reserveB);
      if (amountBOptimal <= amountBDesired) {
        if (amountBOptimal < amountBMin) throw contractError(306);
        amountB = amountBOptimal;
      } else {
        const amountAOptimal = quote(amountBDesired, reserveB, reserveA);
        if (amountAOptimal < amountAMin) throw contractError(305);
        amountA = amountAOptimal;
      }
    }

    await this.ledger.asset(tokenA).transferFrom(this.address, sender, pair.address, amountA);
    await this.ledger.asset(tokenB).transferFrom(this.address, sender, pair.address, amountB);
    const liquidity = await pair.mintLiquidity(to);
    return { amountA, amountB, liquidity };
  }

  async removeLiquidity(
    sender: string,
    tokenA: string,
    tokenB: string,
    liquidity: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    to: string,
    deadline: number,
  ): Promise<RemoveLiquidityResult> {
    this.ensureDeadline(deadline);
    const pair = this.pairFor(tokenA, tokenB);

    await pair.transferFrom(this.address, sender, pair.address, liquidity);
    const [amount0, amount1] = await pair.burnLiquidity(to);
    const [amountA, amountB] = tokenA === pair.token0 ? [amount0, amount1] : [amount1, amount0];

    if (amountA < amountAMin) throw contractError(305);
    if (amountB < amountBMin) throw contractError(306);
    return { amountA, amountB };
  }

  private async swapHop(input: string, output: string, amountOut: bigint, to: string): Promise<void> {
    const pair = this.pairFor(input, output);
    const [amount0Out, amount1Out] = input === pair.token0 ? [0n, amountOut] : [amountOut, 0n];
    await pair.swap(amount0Out, amount1Out, to);
  }

  private pairFor(tokenA: string, tokenB: string): LocalPair {
    const pair = this.factory.findPair(tokenA, tokenB);
    if (!pair) throw contractError(300);
    return pair;
  }

  /**
   * Reserves oriented as (tokenA, tokenB).
   */
  private reservesFor(tokenA: string, tokenB: string): [bigint, bigint] {
    const pair = this.pairFor(tokenA, tokenB);
    const { reserve0, reserve1 } = this.ledger.reserves(pair.address);
    return tokenA === pair.token0 ? [reserve0, reserve1] : [reserve1, reserve0];
  }

  private ensureDeadline(deadline: number): void {
    if (deadline < this.ledger.timestamp) throw contractError(303);
  }
}
