import { PRECISION } from '../config';
import { Pool, Reserves } from '../types/collaborators';
import { isqrt, minBigInt } from '../utils/math';
import { LocalLedger, contractError } from './ledger';
import { LocalToken } from './token';

/** Holder of the LP units locked by the first deposit. */
export const LOCKED_LIQUIDITY_HOLDER = 'locked-liquidity';

/**
 * Constant-product pool on a {@link LocalLedger}.
 *
 * The pool is also its own LP asset. Minting, burning and swapping act on
 * whatever the pool's balances exceed its recorded reserves by.
 */
export class LocalPair extends LocalToken implements Pool {
  readonly token0: string;
  readonly token1: string;

  constructor(ledger: LocalLedger, address: string, token0: string, token1: string) {
    super(ledger, address);
    this.token0 = token0;
    this.token1 = token1;
  }

  async getReserves(): Promise<Reserves> {
    return this.ledger.reserves(this.address);
  }

  /**
   * Mint LP units to `to` for the assets sent in since the last sync.
   */
  async mintLiquidity(to: string): Promise<bigint> {
    const { reserve0, reserve1 } = this.ledger.reserves(this.address);
    const [balance0, balance1] = this.balances();
    const amount0 = balance0 - reserve0;
    const amount1 = balance1 - reserve1;
    const supply = this.ledger.supply(this.address);

    let liquidity: bigint;
    if (supply === 0n) {
      liquidity = isqrt(amount0 * amount1) - PRECISION.MINIMUM_LIQUIDITY;
      if (liquidity > 0n) {
        this.mint(LOCKED_LIQUIDITY_HOLDER, PRECISION.MINIMUM_LIQUIDITY);
      }
    } else {
      liquidity = minBigInt((amount0 * supply) / reserve0, (amount1 * supply) / reserve1);
    }
    if (liquidity <= 0n) throw contractError(103);

    this.mint(to, liquidity);
    this.sync(balance0, balance1);
    return liquidity;
  }

  /**
   * Burn the LP units held by the pool itself and send both legs to `to`.
   *
   * @returns The nominal amounts sent, ordered as token0, token1.
   */
  async burnLiquidity(to: string): Promise<[bigint, bigint]> {
    const [balance0, balance1] = this.balances();
    const liquidity = this.ledger.balance(this.address, this.address);
    const supply = this.ledger.supply(this.address);

    const amount0 = supply === 0n ? 0n : (liquidity * balance0) / supply;
    const amount1 = supply === 0n ? 0n : (liquidity * balance1) / supply;
    if (amount0 <= 0n || amount1 <= 0n) throw contractError(104);

    this.burn(this.address, liquidity);
    await this.ledger.asset(this.token0).transfer(this.address, to, amount0);
    await this.ledger.asset(this.token1).transfer(this.address, to, amount1);

    const [after0, after1] = this.balances();
    this.sync(after0, after1);
    return [amount0, amount1];
  }

  /**
   * Send the requested outputs to `to`, then require the inputs sent in
   * to keep the fee-adjusted product at or above its previous value.
   */
  async swap(amount0Out: bigint, amount1Out: bigint, to: string): Promise<void> {
    if (amount0Out <= 0n && amount1Out <= 0n) throw contractError(105);
    const { reserve0, reserve1 } = this.ledger.reserves(this.address);
    if (amount0Out >= reserve0 || amount1Out >= reserve1) throw contractError(106);

    if (amount0Out > 0n) await this.ledger.asset(this.token0).transfer(this.address, to, amount0Out);
    if (amount1Out > 0n) await this.ledger.asset(this.token1).transfer(this.address, to, amount1Out);

    const [balance0, balance1] = this.balances();
    const amount0In = balance0 > reserve0 - amount0Out ? balance0 - (reserve0 - amount0Out) : 0n;
    const amount1In = balance1 > reserve1 - amount1Out ? balance1 - (reserve1 - amount1Out) : 0n;
    if (amount0In <= 0n && amount1In <= 0n) throw contractError(109);

    const adjusted0 = balance0 * 1000n - amount0In * 3n;
    const adjusted1 = balance1 * 1000n - amount1In * 3n;
    if (adjusted0 * adjusted1 < reserve0 * reserve1 * 1_000_000n) throw contractError(108);

    this.sync(balance0, balance1);
  }

  private balances(): [bigint, bigint] {
    return [
      this.ledger.balance(this.token0, this.address),
      this.ledger.balance(this.token1, this.address),
    ];
  }

  private sync(balance0: bigint, balance1: bigint): void {
    this.ledger.setReserves(this.address, { reserve0: balance0, reserve1: balance1 });
  }
}
