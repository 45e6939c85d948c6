import { ExternalCollaboratorError } from '../src/errors';
import { PoolFixture, poolFixture, zapInRequest, zapOutRequest, PROVIDER, TOKEN_B, USER, ZAP } from './helpers';

/**
 * Token A burns 1% of every transfer. The provider's 1,000,000 A seed
 * arrives as 990,000, so the pool starts at 990,000 A / 1,000,000 B with
 * 994,987 LP units.
 */
describe('fee-on-transfer accounting', () => {
  let fx: PoolFixture;

  beforeEach(async () => {
    fx = await poolFixture({ tokenA: { transferFeeBps: 100 } });
  });

  it('seeds the pool with the amounts actually received', async () => {
    expect(await fx.factory.pool(fx.pairAddress).getReserves()).toEqual({
      reserve0: 990_000n,
      reserve1: 1_000_000n,
    });
    expect(await fx.factory.pool(fx.pairAddress).totalSupply()).toBe(994_987n);
  });

  it('sizes the zap in from the credited amount, not the nominal one', async () => {
    const minted = await fx.zap.zapInSingleToken(
      USER,
      zapInRequest({ inputAmount: 10_000n, maxSlippageBps: 200, feeOnTransfer: true }),
    );

    expect(minted).toBe(4856n);
    expect(fx.logger.debug).toHaveBeenCalledWith('ZapModule: zapIn -> FundsAcquired', { credited: '9900' });
    expect(fx.logger.debug).toHaveBeenCalledWith('ZapModule: zapIn -> Swapped', { received: '4906' });
    // 50 A the pool did not take comes back
    expect(await fx.tokenA.balanceOf(USER)).toBe(50n);
    expect(await fx.tokenA.balanceOf(ZAP)).toBe(0n);
    expect(await fx.tokenB.balanceOf(ZAP)).toBe(0n);
  });

  it('reports the nominal input amount in the event', async () => {
    await fx.zap.zapInSingleToken(
      USER,
      zapInRequest({ inputAmount: 10_000n, maxSlippageBps: 200, feeOnTransfer: true }),
    );

    expect(fx.events).toHaveLength(1);
    expect(fx.events[0]).toMatchObject({ inputAmount: 10_000n, liquidityMinted: 4856n });
  });

  it('fails and rolls back when the flag is not set', async () => {
    const err = await fx.zap
      .zapInSingleToken(USER, zapInRequest({ maxSlippageBps: 200 }))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExternalCollaboratorError);
    expect(await fx.tokenA.balanceOf(USER)).toBe(10_000n);
    expect(await fx.factory.pool(fx.pairAddress).getReserves()).toEqual({
      reserve0: 990_000n,
      reserve1: 1_000_000n,
    });
  });

  it('credits measured withdrawals on zap out', async () => {
    const amountOut = await fx.zap.zapOutSingleToken(
      PROVIDER,
      zapOutRequest({ outputAsset: TOKEN_B, maxSlippageBps: 200, feeOnTransfer: true }),
    );

    // 10,050 B withdrawn + 9,724 B from the 9,850 A that reached custody
    expect(amountOut).toBe(19_774n);
    expect(await fx.tokenB.balanceOf(PROVIDER)).toBe(19_774n);
    expect(fx.logger.debug).toHaveBeenCalledWith('ZapModule: zapOut -> LiquidityRemoved', {
      kept: '10050',
      other: '9850',
    });
    expect(await fx.tokenA.balanceOf(ZAP)).toBe(0n);
  });
});
