import { Contract, nativeToScVal, xdr } from '@stellar/stellar-sdk';
import { ZapInRequest, ZapOutRequest } from '../types/zap';
import { addressArg } from './base';

/**
 * Operation builder for the on-chain zap contract.
 *
 * The contract runs the same zap-in / zap-out sequence as
 * `ZapModule` inside one Soroban transaction.
 */
export class ZapContractClient {
  readonly address: string;
  private contract: Contract;

  constructor(contractAddress: string) {
    this.address = contractAddress;
    this.contract = new Contract(contractAddress);
  }

  /**
   * Build a zap_in_single_token operation.
   */
  buildZapIn(sender: string, request: ZapInRequest): xdr.Operation {
    return this.contract.call(
      'zap_in_single_token',
      addressArg(sender),
      addressArg(request.inputAsset),
      addressArg(request.pairAssetA),
      addressArg(request.pairAssetB),
      nativeToScVal(request.inputAmount, { type: 'i128' }),
      nativeToScVal(request.maxSlippageBps, { type: 'u32' }),
      nativeToScVal(request.minimumLiquidityOut, { type: 'i128' }),
      nativeToScVal(request.deadline, { type: 'u64' }),
      nativeToScVal(request.feeOnTransfer, { type: 'bool' }),
    );
  }

  /**
   * Build a zap_out_single_token operation.
   */
  buildZapOut(sender: string, request: ZapOutRequest): xdr.Operation {
    return this.contract.call(
      'zap_out_single_token',
      addressArg(sender),
      addressArg(request.outputAsset),
      addressArg(request.pairAssetA),
      addressArg(request.pairAssetB),
      nativeToScVal(request.liquidityIn, { type: 'i128' }),
      nativeToScVal(request.maxSlippageBps, { type: 'u32' }),
      nativeToScVal(request.minimumOutputAmount, { type: 'i128' }),
      nativeToScVal(request.deadline, { type: 'u64' }),
      nativeToScVal(request.feeOnTransfer, { type: 'bool' }),
    );
  }
}
