import { PRECISION } from '../config';
import { FungibleAsset } from '../types/collaborators';
import { Logger } from '../types/common';

/**
 * Keeps spending authorization of a spender (the router) topped up.
 *
 * When the current allowance is short, an unlimited allowance is granted
 * rather than the exact amount, so repeated zaps need no further
 * approvals. The spender is trusted with unlimited future pulls from the
 * owner's balance.
 */
export class AllowanceManager {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Ensure `owner` has authorized `spender` for at least `requiredAmount`.
   *
   * @returns true when a new approval was issued.
   */
  async ensureAllowance(
    asset: FungibleAsset,
    owner: string,
    spender: string,
    requiredAmount: bigint,
  ): Promise<boolean> {
    const current = await asset.allowance(owner, spender);
    if (current >= requiredAmount) {
      return false;
    }

    this.logger?.debug('AllowanceManager: granting unlimited allowance', {
      asset: asset.address,
      spender,
      current: current.toString(),
      requiredAmount: requiredAmount.toString(),
    });
    await asset.approve(owner, spender, PRECISION.MAX_ALLOWANCE);
    return true;
  }
}
