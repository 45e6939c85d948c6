import { PoolRegistry } from '../types/collaborators';
import { PairNotFoundError } from '../errors';
import { getPairAddress, sortTokens } from '../utils/addresses';

/**
 * Options for resolveLive lookups.
 */
export interface ResolveOptions {
  /** Skip the local cache and query the registry directly. Defaults to false. */
  bypassCache?: boolean;
}

/**
 * Locates the pool of a token pair.
 *
 * Live lookups go to the pool registry and are cached by sorted pair.
 * Missing pools are not cached, so a pool deployed later is found on the
 * next lookup. The deterministic derivation needs no query at all.
 */
export class PairAddressResolver {
  private registry: PoolRegistry;
  private factoryAddress: string;
  private networkPassphrase: string;
  private cache: Map<string, string> = new Map();

  constructor(registry: PoolRegistry, factoryAddress: string, networkPassphrase: string) {
    this.registry = registry;
    this.factoryAddress = factoryAddress;
    this.networkPassphrase = networkPassphrase;
  }

  /**
   * Authoritative pool address from the registry, or null if absent.
   */
  async resolveLive(
    tokenA: string,
    tokenB: string,
    options: ResolveOptions = {},
  ): Promise<string | null> {
    const [t0, t1] = sortTokens(tokenA, tokenB);
    const cacheKey = `${t0}:${t1}`;

    if (!options.bypassCache) {
      const cached = this.cache.get(cacheKey);
      if (cached !== undefined) return cached;
    }

    const pairAddress = await this.registry.getPool(t0, t1);
    if (pairAddress !== null) {
      this.cache.set(cacheKey, pairAddress);
    }
    return pairAddress;
  }

  /**
   * Live pool address, throwing {@link PairNotFoundError} when absent.
   */
  async resolveOrThrow(tokenA: string, tokenB: string): Promise<string> {
    const pairAddress = await this.resolveLive(tokenA, tokenB);
    if (pairAddress === null) {
      throw new PairNotFoundError(tokenA, tokenB);
    }
    return pairAddress;
  }

  /**
   * Local recomputation of the pool address the factory deploys.
   */
  deriveDeterministic(tokenA: string, tokenB: string): string {
    return getPairAddress(this.factoryAddress, tokenA, tokenB, this.networkPassphrase);
  }

  /**
   * True when the registry's pool is the one the derivation predicts.
   */
  async verify(tokenA: string, tokenB: string): Promise<boolean> {
    const live = await this.resolveLive(tokenA, tokenB);
    return live !== null && live === this.deriveDeterministic(tokenA, tokenB);
  }

  /**
   * Pre-load the cache with known pairs.
   *
   * @param pairs - Array of [tokenA, tokenB, pairAddress].
   */
  preload(pairs: Array<[string, string, string]>): void {
    for (const [a, b, addr] of pairs) {
      const [t0, t1] = sortTokens(a, b);
      this.cache.set(`${t0}:${t1}`, addr);
    }
  }

  clearCache(): void {
    this.cache.clear();
  }
}
