/**
 * Local Simulation Example
 *
 * Runs a zap in and a zap out against the in-process AMM, without a
 * network. Useful for checking sizing and slippage settings before
 * touching a live pool.
 */

import { StrKey } from '@stellar/stellar-sdk';
import { PRECISION } from '../src/config';
import { deployLocal, LocalToken } from '../src/simulation';
import { ZapEvent } from '../src/types/events';

const contract = (n: number) => StrKey.encodeContract(Buffer.alloc(32, n));
const account = (n: number) => StrKey.encodeEd25519PublicKey(Buffer.alloc(32, n));

async function main() {
  const events: ZapEvent[] = [];
  const zapAddress = contract(12);
  const { ledger, factory, router, zap } = deployLocal({
    factoryAddress: contract(10),
    routerAddress: contract(11),
    zapAddress,
    networkPassphrase: 'Test SDF Network ; September 2015',
    events: { emit: (event) => events.push(event) },
  });

  const usdc = new LocalToken(ledger, contract(1));
  const xlm = new LocalToken(ledger, contract(2));
  const pair = factory.createPair(usdc.address, xlm.address);

  // Seed the pool at 1 USDC = 4 XLM
  const provider = account(1);
  usdc.mint(provider, 250_000_000n);
  xlm.mint(provider, 1_000_000_000n);
  await usdc.approve(provider, router.address, PRECISION.MAX_ALLOWANCE);
  await xlm.approve(provider, router.address, PRECISION.MAX_ALLOWANCE);
  await router.addLiquidity(
    provider,
    usdc.address,
    xlm.address,
    250_000_000n,
    1_000_000_000n,
    0n,
    0n,
    provider,
    ledger.timestamp + 60,
  );

  const user = account(2);
  usdc.mint(user, 1_000_000n);
  await usdc.approve(user, zapAddress, PRECISION.MAX_ALLOWANCE);
  await pair.approve(user, zapAddress, PRECISION.MAX_ALLOWANCE);

  const minted = await zap.zapInSingleToken(user, {
    inputAsset: usdc.address,
    pairAssetA: usdc.address,
    pairAssetB: xlm.address,
    inputAmount: 1_000_000n,
    maxSlippageBps: 50,
    minimumLiquidityOut: 0n,
    deadline: ledger.timestamp + 60,
    feeOnTransfer: false,
  });
  console.log(`Zapped 1,000,000 USDC units into ${minted} LP units`);

  const amountOut = await zap.zapOutSingleToken(user, {
    outputAsset: usdc.address,
    pairAssetA: usdc.address,
    pairAssetB: xlm.address,
    liquidityIn: minted,
    maxSlippageBps: 50,
    minimumOutputAmount: 0n,
    deadline: ledger.timestamp + 60,
    feeOnTransfer: false,
  });
  console.log(`Zapped ${minted} LP units out into ${amountOut} USDC units`);
  console.log(`Round trip cost: ${1_000_000n - amountOut} units in fees and rounding`);
  console.log(`Events: ${events.map((event) => event.type).join(', ')}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
