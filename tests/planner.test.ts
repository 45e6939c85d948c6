import { planZapIn } from '../src/modules/planner';
import { SwapBoundsViolatedError, UnsupportedInputTokenError, ValidationError } from '../src/errors';
import { HIGH_ADDRESS, LOW_ADDRESS, TOKEN_A, TOKEN_B, TOKEN_C, contractAddress, zapInRequest } from './helpers';

const PAIR = contractAddress(40);

describe('planZapIn', () => {
  it('plans the pre-swap, the deposit and its minimums', () => {
    const quote = planZapIn(zapInRequest(), PAIR, { reserve0: 1_000_000n, reserve1: 1_000_000n }, 1_000_000n);

    expect(quote).toEqual({
      pairAddress: PAIR,
      swap: { path: [TOKEN_A, TOKEN_B], amountIn: 4995n, amountOutMin: 4930n },
      expectedSwapOut: 4955n,
      liquidity: {
        tokenA: TOKEN_A,
        tokenB: TOKEN_B,
        amountA: 5005n,
        amountB: 4955n,
        minimumA: 4979n,
        minimumB: 4930n,
      },
      expectedLiquidity: 4979n,
      expectedDustA: 0n,
      expectedDustB: 0n,
    });
  });

  it('orients reserves by the input asset', () => {
    // TOKEN_B is token1: its reserve is reserve1
    const quote = planZapIn(
      zapInRequest({ inputAsset: TOKEN_B }),
      PAIR,
      { reserve0: 2_000_000n, reserve1: 1_000_000n },
      1_414_213n,
    );

    expect(quote.swap).toEqual({ path: [TOKEN_B, TOKEN_A], amountIn: 4995n, amountOutMin: 9860n });
    expect(quote.expectedSwapOut).toBe(9910n);
    expect(quote.liquidity).toMatchObject({ tokenA: TOKEN_B, tokenB: TOKEN_A, amountA: 5005n, amountB: 9910n });
    expect(quote.expectedLiquidity).toBe(7042n);
  });

  it('orients reserves by address order, not strkey text order', () => {
    const quote = planZapIn(
      zapInRequest({ inputAsset: LOW_ADDRESS, pairAssetA: HIGH_ADDRESS, pairAssetB: LOW_ADDRESS }),
      PAIR,
      { reserve0: 1_000_000n, reserve1: 4_000_000n },
      2_000_000n,
    );

    expect(quote.swap).toEqual({ path: [LOW_ADDRESS, HIGH_ADDRESS], amountIn: 4995n, amountOutMin: 19_721n });
    expect(quote.expectedSwapOut).toBe(19_821n);
  });

  it('reports the deposit leg the pool will not take as dust', () => {
    const quote = planZapIn(
      zapInRequest({ inputAmount: 1000n }),
      PAIR,
      { reserve0: 1_000_000n, reserve1: 1_000_000n },
      1_000_000n,
    );

    expect(quote.swap.amountIn).toBe(500n);
    expect(quote.expectedLiquidity).toBe(497n);
    expect(quote.expectedDustA).toBe(2n);
    expect(quote.expectedDustB).toBe(0n);
  });

  it('rejects an empty pool', () => {
    expect(() => planZapIn(zapInRequest(), PAIR, { reserve0: 0n, reserve1: 0n }, 0n)).toThrow(
      SwapBoundsViolatedError,
    );
  });

  it('rejects an input too small to split', () => {
    expect(() =>
      planZapIn(zapInRequest({ inputAmount: 1n }), PAIR, { reserve0: 1_000_000n, reserve1: 1_000_000n }, 1_000_000n),
    ).toThrow(SwapBoundsViolatedError);
  });

  it('validates the request first', () => {
    const reserves = { reserve0: 1_000_000n, reserve1: 1_000_000n };

    expect(() => planZapIn(zapInRequest({ inputAsset: TOKEN_C }), PAIR, reserves, 1_000_000n)).toThrow(
      UnsupportedInputTokenError,
    );
    expect(() => planZapIn(zapInRequest({ pairAssetB: TOKEN_A }), PAIR, reserves, 1_000_000n)).toThrow(
      ValidationError,
    );
    expect(() => planZapIn(zapInRequest({ deadline: -1 }), PAIR, reserves, 1_000_000n)).toThrow(ValidationError);
  });
});
