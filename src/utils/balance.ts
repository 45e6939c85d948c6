import { FungibleAsset } from '../types/collaborators';

/**
 * Amount `holder` actually gained across `action`.
 *
 * Reads the balance before and after the call and trusts only the delta,
 * for collaborators whose reported amounts cannot be trusted (assets
 * that deduct a fee on transfer). A shrinking balance yields 0.
 */
export async function measureReceived(
  asset: FungibleAsset,
  holder: string,
  action: () => Promise<unknown>,
): Promise<bigint> {
  const before = await asset.balanceOf(holder);
  await action();
  const after = await asset.balanceOf(holder);
  return after > before ? after - before : 0n;
}
