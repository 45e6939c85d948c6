/**
 * Narrow interfaces of the external collaborators a zap runs against.
 *
 * Every state-changing method names the acting address explicitly: the
 * zap acts as its custody address, the router as its own address.
 */

/**
 * Pool reserves, ordered by the sorted token pair.
 */
export interface Reserves {
  reserve0: bigint;
  reserve1: bigint;
}

/**
 * Constant-product pool state.
 */
export interface Pool {
  readonly address: string;
  getReserves(): Promise<Reserves>;
  /** Total supply of the pool's LP units. */
  totalSupply(): Promise<bigint>;
}

/**
 * Registry of deployed pools.
 */
export interface PoolRegistry {
  /** Pool address for a token pair, or null when no pool exists. */
  getPool(tokenA: string, tokenB: string): Promise<string | null>;
}

/**
 * Lookup of a pool handle by address.
 */
export interface PoolDirectory {
  pool(address: string): Pool;
}

/**
 * Fungible asset with allowance semantics.
 *
 * A fee-on-transfer asset may credit the recipient less than the
 * nominal amount.
 */
export interface FungibleAsset {
  readonly address: string;
  balanceOf(owner: string): Promise<bigint>;
  allowance(owner: string, spender: string): Promise<bigint>;
  approve(owner: string, spender: string, amount: bigint): Promise<void>;
  transfer(from: string, to: string, amount: bigint): Promise<void>;
  transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<void>;
}

/**
 * Lookup of a fungible asset handle by address. LP units are the asset
 * at the pool's own address.
 */
export interface AssetDirectory {
  asset(address: string): FungibleAsset;
}

/**
 * Amounts the router actually used for a deposit.
 */
export interface AddLiquidityResult {
  amountA: bigint;
  amountB: bigint;
  liquidity: bigint;
}

/**
 * Amounts returned by a withdrawal.
 */
export interface RemoveLiquidityResult {
  amountA: bigint;
  amountB: bigint;
}

/**
 * Router of a constant-product AMM. Pulls funds from `sender` via
 * allowance granted to {@link Router.address}.
 */
export interface Router {
  readonly address: string;

  swapExactTokensForTokens(
    sender: string,
    amountIn: bigint,
    amountOutMin: bigint,
    path: string[],
    to: string,
    deadline: number,
  ): Promise<bigint[]>;

  /**
   * Same swap for assets that deduct a transfer fee. No trusted return
   * value: callers measure the recipient's balance.
   */
  swapExactTokensForTokensSupportingFeeOnTransferTokens(
    sender: string,
    amountIn: bigint,
    amountOutMin: bigint,
    path: string[],
    to: string,
    deadline: number,
  ): Promise<void>;

  addLiquidity(
    sender: string,
    tokenA: string,
    tokenB: string,
    amountADesired: bigint,
    amountBDesired: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    to: string,
    deadline: number,
  ): Promise<AddLiquidityResult>;

  removeLiquidity(
    sender: string,
    tokenA: string,
    tokenB: string,
    liquidity: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    to: string,
    deadline: number,
  ): Promise<RemoveLiquidityResult>;

  getAmountsOut(amountIn: bigint, path: string[]): Promise<bigint[]>;
}

/**
 * All-or-nothing execution scope of the surrounding environment.
 *
 * If `work` rejects, every effect it made through the collaborators is
 * discarded before the rejection propagates.
 */
export interface AtomicExecutor {
  atomic<T>(work: () => Promise<T>): Promise<T>;
}
