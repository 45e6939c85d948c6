import { Pool, PoolDirectory, PoolRegistry } from '../types/collaborators';
import { getPairAddress, sortTokens } from '../utils/addresses';
import { LocalLedger, contractError } from './ledger';
import { LocalPair } from './pair';

/**
 * Pool factory on a {@link LocalLedger}.
 *
 * Pools are deployed at the address a Soroban factory at `address` would
 * give them on the network named by `networkPassphrase`.
 */
export class LocalFactory implements PoolRegistry, PoolDirectory {
  readonly address: string;
  private ledger: LocalLedger;
  private networkPassphrase: string;
  private pairsByTokens: Map<string, LocalPair> = new Map();
  private pairsByAddress: Map<string, LocalPair> = new Map();

  constructor(ledger: LocalLedger, address: string, networkPassphrase: string) {
    this.ledger = ledger;
    this.address = address;
    this.networkPassphrase = networkPassphrase;
  }

  createPair(tokenA: string, tokenB: string): LocalPair {
    const [token0, token1] = sortTokens(tokenA, tokenB);
    const key = `${token0}:${token1}`;
    if (this.pairsByTokens.has(key)) throw contractError(402);

    const address = getPairAddress(this.address, token0, token1, this.networkPassphrase);
    const pair = new LocalPair(this.ledger, address, token0, token1);
    this.pairsByTokens.set(key, pair);
    this.pairsByAddress.set(address, pair);
    return pair;
  }

  /**
   * Deployed pool of a pair, or undefined.
   */
  findPair(tokenA: string, tokenB: string): LocalPair | undefined {
    const [token0, token1] = sortTokens(tokenA, tokenB);
    return this.pairsByTokens.get(`${token0}:${token1}`);
  }

  async getPool(tokenA: string, tokenB: string): Promise<string | null> {
    return this.findPair(tokenA, tokenB)?.address ?? null;
  }

  pool(address: string): Pool {
    const pair = this.pairsByAddress.get(address);
    if (!pair) throw new Error(`No pool deployed at ${address}`);
    return pair;
  }
}
