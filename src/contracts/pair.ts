import { Address, scValToBigInt, xdr } from '@stellar/stellar-sdk';
import { Pool, Reserves } from '../types/collaborators';
import { ContractClient } from './base';

/**
 * Convert an i128 ScVal to bigint, rejecting any other type.
 */
export function scValToI128(val: xdr.ScVal | undefined): bigint {
  if (!val) throw new Error('Missing field');
  if (val.switch().name !== 'scvI128') {
    throw new Error(`Expected i128, got ${val.switch().name}`);
  }
  return scValToBigInt(val);
}

/**
 * Read-only client for a constant-product pair contract.
 *
 * The pair is also its own LP token, so `totalSupply` reads LP units.
 */
export class PairClient extends ContractClient implements Pool {
  /**
   * Read current reserves from the pair contract.
   */
  async getReserves(): Promise<Reserves> {
    const result = await this.simulateRead(this.contract.call('get_reserves'), 'PairClient_getReserves');
    if (!result) throw new Error('Failed to read reserves');
    const vec = result.vec();
    if (!vec || vec.length < 2) throw new Error('Invalid reserves response');
    return {
      reserve0: scValToI128(vec[0]),
      reserve1: scValToI128(vec[1]),
    };
  }

  /**
   * Read the token addresses for this pair.
   */
  async getTokens(): Promise<{ token0: string; token1: string }> {
    const [r0, r1] = await Promise.all([
      this.simulateRead(this.contract.call('token_0'), 'PairClient_token0'),
      this.simulateRead(this.contract.call('token_1'), 'PairClient_token1'),
    ]);

    if (!r0 || !r1) throw new Error('Failed to read token addresses');
    return {
      token0: Address.fromScVal(r0).toString(),
      token1: Address.fromScVal(r1).toString(),
    };
  }

  async totalSupply(): Promise<bigint> {
    const result = await this.simulateRead(this.contract.call('total_supply'), 'PairClient_totalSupply');
    if (!result) throw new Error('Failed to read total supply');
    return scValToI128(result);
  }
}
