import { AssetDirectory, AtomicExecutor, FungibleAsset, Reserves } from '../types/collaborators';
import { ErrorParser } from '../errors/parser';

/**
 * Raw state of the local ledger. Every field is copied on snapshot.
 */
interface LedgerState {
  /** Keyed by `${asset}|${owner}` */
  balances: Map<string, bigint>;
  /** Keyed by `${asset}|${owner}|${spender}` */
  allowances: Map<string, bigint>;
  supplies: Map<string, bigint>;
  reserves: Map<string, Reserves>;
}

function cloneState(state: LedgerState): LedgerState {
  const reserves = new Map<string, Reserves>();
  for (const [pair, value] of state.reserves) {
    reserves.set(pair, { ...value });
  }
  return {
    balances: new Map(state.balances),
    allowances: new Map(state.allowances),
    supplies: new Map(state.supplies),
    reserves,
  };
}

/**
 * Error in the format Soroban hosts report contract failures,
 * e.g. `Error(Contract, #303) Deadline expired`.
 */
export function contractError(code: number): Error {
  const description = ErrorParser.parseContractError(code) ?? 'Contract error';
  return new Error(`Error(Contract, #${code}) ${description}`);
}

/**
 * In-process ledger holding every balance, allowance, supply and pool
 * reserve of a local AMM deployment.
 *
 * `atomic` snapshots the whole state and restores it when the work
 * rejects. Scopes nest: an inner rollback leaves the outer scope's
 * earlier effects in place.
 */
export class LocalLedger implements AtomicExecutor, AssetDirectory {
  private state: LedgerState = {
    balances: new Map(),
    allowances: new Map(),
    supplies: new Map(),
    reserves: new Map(),
  };
  private assets: Map<string, FungibleAsset> = new Map();
  private now: number;

  constructor(timestamp = 1_700_000_000) {
    this.now = timestamp;
  }

  /** Current ledger time in unix seconds. */
  get timestamp(): number {
    return this.now;
  }

  setTimestamp(timestamp: number): void {
    this.now = timestamp;
  }

  advance(seconds: number): void {
    this.now += seconds;
  }

  async atomic<T>(work: () => Promise<T>): Promise<T> {
    const snapshot = cloneState(this.state);
    try {
      return await work();
    } catch (err) {
      this.state = snapshot;
      throw err;
    }
  }

  /**
   * Make an asset reachable through {@link asset}.
   */
  register(asset: FungibleAsset): void {
    if (this.assets.has(asset.address)) {
      throw new Error(`Asset ${asset.address} already registered`);
    }
    this.assets.set(asset.address, asset);
  }

  asset(address: string): FungibleAsset {
    const asset = this.assets.get(address);
    if (!asset) throw new Error(`Unknown asset ${address}`);
    return asset;
  }

  balance(asset: string, owner: string): bigint {
    return this.state.balances.get(`${asset}|${owner}`) ?? 0n;
  }

  credit(asset: string, owner: string, amount: bigint): void {
    this.state.balances.set(`${asset}|${owner}`, this.balance(asset, owner) + amount);
  }

  debit(asset: string, owner: string, amount: bigint): void {
    const current = this.balance(asset, owner);
    if (current < amount) {
      throw new Error(`Insufficient balance: ${owner} holds ${current} of ${asset}, needs ${amount}`);
    }
    this.state.balances.set(`${asset}|${owner}`, current - amount);
  }

  allowance(asset: string, owner: string, spender: string): bigint {
    return this.state.allowances.get(`${asset}|${owner}|${spender}`) ?? 0n;
  }

  setAllowance(asset: string, owner: string, spender: string, amount: bigint): void {
    this.state.allowances.set(`${asset}|${owner}|${spender}`, amount);
  }

  supply(asset: string): bigint {
    return this.state.supplies.get(asset) ?? 0n;
  }

  adjustSupply(asset: string, delta: bigint): void {
    this.state.supplies.set(asset, this.supply(asset) + delta);
  }

  reserves(pair: string): Reserves {
    const stored = this.state.reserves.get(pair);
    return stored ? { ...stored } : { reserve0: 0n, reserve1: 0n };
  }

  setReserves(pair: string, reserves: Reserves): void {
    this.state.reserves.set(pair, { ...reserves });
  }
}
