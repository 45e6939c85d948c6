/**
 * Basic Zap In Example
 *
 * Deposits a single token into a two-asset pool through the on-chain zap
 * contract. Part of the input is swapped into the paired asset, both legs
 * are deposited, and the LP units are minted to the signer.
 *
 * Prerequisites:
 * - Deployed factory and zap contracts on the chosen network
 * - A balance of the input token, with the zap contract approved to pull it
 * - Environment variables configured (see below)
 */

import 'dotenv/config';
import { Network } from '../src/types/common';
import { ZapClient } from '../src/client';
import { ZapSDKError } from '../src/errors';

async function main() {
  // ============================================================================
  // Environment Configuration
  // ============================================================================

  const secretKey = process.env.ZAP_SECRET_KEY;
  const rpcUrl = process.env.ZAP_RPC_URL;
  const networkEnv = process.env.ZAP_NETWORK ?? 'testnet';
  const factoryAddress = process.env.ZAP_FACTORY_ADDRESS;
  const zapAddress = process.env.ZAP_CONTRACT_ADDRESS;
  const inputToken = process.env.ZAP_INPUT_TOKEN;
  const pairToken = process.env.ZAP_PAIR_TOKEN;
  const amountStr = process.env.ZAP_AMOUNT;

  if (!secretKey || !factoryAddress || !zapAddress || !inputToken || !pairToken || !amountStr) {
    console.error('❌ Missing required environment variables.');
    console.error('Please ensure the following are set in your .env file:');
    console.error('  - ZAP_SECRET_KEY');
    console.error('  - ZAP_FACTORY_ADDRESS');
    console.error('  - ZAP_CONTRACT_ADDRESS');
    console.error('  - ZAP_INPUT_TOKEN');
    console.error('  - ZAP_PAIR_TOKEN');
    console.error('  - ZAP_AMOUNT');
    process.exit(1);
  }

  const network = networkEnv === 'mainnet' ? Network.MAINNET : Network.TESTNET;
  const client = new ZapClient({
    network,
    rpcUrl,
    secretKey,
    contracts: { factoryAddress, zapAddress },
    logger: {
      debug: () => undefined,
      info: (msg, data) => console.log(msg, data ?? ''),
      error: (msg, err) => console.error(msg, err ?? ''),
    },
  });

  const params = {
    inputAsset: inputToken,
    pairAssetA: inputToken,
    pairAssetB: pairToken,
    inputAmount: BigInt(amountStr),
    maxSlippageBps: 100,
  };

  try {
    // ==========================================================================
    // Step 1: Preview
    // ==========================================================================
    // The quote runs the same sizing as the contract against current reserves.

    const quote = await client.quoteZapIn(params);
    console.log('📊 Zap preview:');
    console.log(`  Pool: ${quote.pairAddress}`);
    console.log(`  Swapped: ${quote.swap.amountIn} -> ${quote.expectedSwapOut} (min ${quote.swap.amountOutMin})`);
    console.log(`  Expected LP units: ${quote.expectedLiquidity}`);
    console.log(`  Expected refund: ${quote.expectedDustA} / ${quote.expectedDustB}`);
    console.log('');

    // ==========================================================================
    // Step 2: Submit
    // ==========================================================================
    // Without minimumLiquidityOut the floor is the quote less maxSlippageBps.

    console.log('🚀 Submitting zap...');
    const result = await client.zapIn(params);
    if (!result.success) {
      console.error(`❌ Zap failed: [${result.error?.code}] ${result.error?.message}`);
      process.exit(1);
    }

    console.log('✅ Zap confirmed');
    console.log(`  Transaction Hash: ${result.data?.txHash}`);
    console.log(`  Ledger: ${result.data?.ledger}`);
  } catch (error) {
    if (error instanceof ZapSDKError) {
      console.error(`❌ [${error.code}] ${error.message}`);
    } else {
      console.error('❌ Unexpected error:', error);
    }
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
