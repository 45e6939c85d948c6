import {
  Address,
  Contract,
  SorobanRpc,
  TransactionBuilder,
  nativeToScVal,
  xdr,
} from '@stellar/stellar-sdk';
import { Logger } from '../types/common';
import { withRetry, RetryOptions } from '../utils/retry';

/** Source account of read-only simulations; never signs. */
export const READ_SOURCE_ACCOUNT = 'GAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAWHF';

/**
 * Address argument for a contract call.
 */
export function addressArg(address: string): xdr.ScVal {
  return nativeToScVal(Address.fromString(address), { type: 'address' });
}

/**
 * Shared plumbing of the Soroban contract clients: a contract handle, an
 * RPC server and read-only simulation with retry.
 */
export abstract class ContractClient {
  readonly address: string;
  readonly server: SorobanRpc.Server;
  protected contract: Contract;
  protected networkPassphrase: string;
  protected retryOptions: RetryOptions;
  protected logger?: Logger;

  constructor(
    contractAddress: string,
    rpcUrl: string,
    networkPassphrase: string,
    retryOptions: RetryOptions,
    logger?: Logger,
  ) {
    this.address = contractAddress;
    this.contract = new Contract(contractAddress);
    this.server = new SorobanRpc.Server(rpcUrl);
    this.networkPassphrase = networkPassphrase;
    this.retryOptions = retryOptions;
    this.logger = logger;
  }

  /**
   * Simulate a read-only contract call.
   *
   * @returns The call's return value, or null when the simulation failed.
   */
  protected async simulateRead(op: xdr.Operation, label: string): Promise<xdr.ScVal | null> {
    const account = await withRetry(
      () => this.server.getAccount(READ_SOURCE_ACCOUNT),
      this.retryOptions,
      this.logger,
      `${label}_getAccount`,
    );

    const tx = new TransactionBuilder(account, {
      fee: '100',
      networkPassphrase: this.networkPassphrase,
    })
      .addOperation(op)
      .setTimeout(30)
      .build();

    const sim = await withRetry(
      () => this.server.simulateTransaction(tx),
      this.retryOptions,
      this.logger,
      `${label}_simulateTransaction`,
    );
    if (SorobanRpc.Api.isSimulationSuccess(sim) && sim.result) {
      return sim.result.retval;
    }
    this.logger?.debug(`${label}: simulation returned no result`);
    return null;
  }
}
