import { Address } from '@stellar/stellar-sdk';
import { PoolRegistry } from '../types/collaborators';
import { ContractClient, addressArg } from './base';

/**
 * Read-only client for the pair factory contract.
 */
export class FactoryClient extends ContractClient implements PoolRegistry {
  /**
   * Lookup the pair address for a token pair.
   *
   * @returns The pair address, or null when the factory has none.
   */
  async getPair(tokenA: string, tokenB: string): Promise<string | null> {
    const op = this.contract.call('get_pair', addressArg(tokenA), addressArg(tokenB));
    const result = await this.simulateRead(op, 'FactoryClient_getPair');
    if (!result || result.switch().name === 'scvVoid') return null;
    return Address.fromScVal(result).toString();
  }

  getPool(tokenA: string, tokenB: string): Promise<string | null> {
    return this.getPair(tokenA, tokenB);
  }
}
