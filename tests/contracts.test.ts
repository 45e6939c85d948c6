import { Account, Address, SorobanRpc, nativeToScVal, scValToNative, xdr } from "@stellar/stellar-sdk";
import { PairClient } from "../src/contracts/pair";
import { FactoryClient } from "../src/contracts/factory";
import { ZapContractClient } from "../src/contracts/zap";
import { ContractClient, READ_SOURCE_ACCOUNT } from "../src/contracts/base";
import { RetryOptions } from "../src/utils/retry";
import { FACTORY, PASSPHRASE, TOKEN_A, TOKEN_B, USER, ZAP, contractAddress, mockLogger, zapInRequest, zapOutRequest } from "./helpers";

const RPC_URL = "https://soroban-testnet.stellar.org";
const PAIR_ADDRESS = contractAddress(40);
const RETRY: RetryOptions = { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 };

const i128 = (value: bigint) => nativeToScVal(value, { type: "i128" });
const address = (value: string) => nativeToScVal(Address.fromString(value), { type: "address" });

function stubServer(client: ContractClient) {
  const getAccount = jest
    .spyOn(client.server, "getAccount")
    .mockResolvedValue(new Account(READ_SOURCE_ACCOUNT, "1"));
  const simulateTransaction = jest.spyOn(client.server, "simulateTransaction");
  return { getAccount, simulateTransaction };
}

function simulationSuccess(retval: xdr.ScVal) {
  return {
    result: { retval, auth: [] },
    latestLedger: 12345,
    events: [],
    transactionData: "",
    minResourceFee: "100",
    _parsed: true,
  } as unknown as SorobanRpc.Api.SimulateTransactionResponse;
}

function simulationFailure(error: string) {
  return {
    error,
    latestLedger: 12345,
    events: [],
    _parsed: true,
  } as unknown as SorobanRpc.Api.SimulateTransactionResponse;
}

describe("PairClient Parsing", () => {
  let client: PairClient;
  let server: ReturnType<typeof stubServer>;

  beforeEach(() => {
    client = new PairClient(PAIR_ADDRESS, RPC_URL, PASSPHRASE, RETRY, mockLogger());
    server = stubServer(client);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("getReserves()", () => {
    it("parses the reserve vector", async () => {
      server.simulateTransaction.mockResolvedValue(
        simulationSuccess(xdr.ScVal.scvVec([i128(1_000n), i128((1n << 64n) + 1n)])),
      );

      await expect(client.getReserves()).resolves.toEqual({
        reserve0: 1_000n,
        reserve1: 18_446_744_073_709_551_617n,
      });
      expect(server.getAccount).toHaveBeenCalledWith(READ_SOURCE_ACCOUNT);
    });

    it("rejects non-i128 reserves", async () => {
      server.simulateTransaction.mockResolvedValue(
        simulationSuccess(xdr.ScVal.scvVec([xdr.ScVal.scvU32(1), xdr.ScVal.scvU32(2)])),
      );

      await expect(client.getReserves()).rejects.toThrow("Expected i128, got scvU32");
    });

    it("rejects a short vector", async () => {
      server.simulateTransaction.mockResolvedValue(simulationSuccess(xdr.ScVal.scvVec([i128(1n)])));

      await expect(client.getReserves()).rejects.toThrow("Invalid reserves response");
    });

    it("fails when the simulation fails", async () => {
      server.simulateTransaction.mockResolvedValue(simulationFailure("HostError: Error(Contract, #106)"));

      await expect(client.getReserves()).rejects.toThrow("Failed to read reserves");
    });
  });

  describe("totalSupply()", () => {
    it("parses the LP supply", async () => {
      server.simulateTransaction.mockResolvedValue(simulationSuccess(i128(1_000_000n)));

      await expect(client.totalSupply()).resolves.toBe(1_000_000n);
    });
  });

  describe("getTokens()", () => {
    it("parses both token addresses", async () => {
      server.simulateTransaction
        .mockResolvedValueOnce(simulationSuccess(address(TOKEN_A)))
        .mockResolvedValueOnce(simulationSuccess(address(TOKEN_B)));

      await expect(client.getTokens()).resolves.toEqual({ token0: TOKEN_A, token1: TOKEN_B });
    });
  });

  describe("retries", () => {
    it("retries a transient getAccount failure", async () => {
      const logger = mockLogger();
      client = new PairClient(PAIR_ADDRESS, RPC_URL, PASSPHRASE, RETRY, logger);
      server = stubServer(client);
      server.getAccount.mockRejectedValueOnce(new Error("socket hang up"));
      server.simulateTransaction.mockResolvedValue(simulationSuccess(i128(7n)));

      await expect(client.totalSupply()).resolves.toBe(7n);
      expect(server.getAccount).toHaveBeenCalledTimes(2);
      expect(logger.debug).toHaveBeenCalledWith("PairClient_totalSupply_getAccount: retrying after 1ms", {
        attempt: 1,
        maxRetries: 1,
        error: "socket hang up",
      });
    });

    it("does not retry other failures", async () => {
      server.getAccount.mockRejectedValueOnce(new Error("account not found"));

      await expect(client.totalSupply()).rejects.toThrow("account not found");
      expect(server.getAccount).toHaveBeenCalledTimes(1);
    });
  });
});

describe("FactoryClient", () => {
  let client: FactoryClient;
  let server: ReturnType<typeof stubServer>;
  let logger: ReturnType<typeof mockLogger>;

  beforeEach(() => {
    logger = mockLogger();
    client = new FactoryClient(FACTORY, RPC_URL, PASSPHRASE, RETRY, logger);
    server = stubServer(client);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns the registered pool", async () => {
    server.simulateTransaction.mockResolvedValue(simulationSuccess(address(PAIR_ADDRESS)));

    await expect(client.getPool(TOKEN_A, TOKEN_B)).resolves.toBe(PAIR_ADDRESS);
  });

  it("returns null for a void result", async () => {
    server.simulateTransaction.mockResolvedValue(simulationSuccess(xdr.ScVal.scvVoid()));

    await expect(client.getPair(TOKEN_A, TOKEN_B)).resolves.toBeNull();
  });

  it("returns null when the simulation fails", async () => {
    server.simulateTransaction.mockResolvedValue(simulationFailure("HostError: Error(Contract, #300)"));

    await expect(client.getPair(TOKEN_A, TOKEN_B)).resolves.toBeNull();
    expect(logger.debug).toHaveBeenCalledWith("FactoryClient_getPair: simulation returned no result");
  });
});

describe("ZapContractClient", () => {
  const client = new ZapContractClient(ZAP);

  function invocation(op: xdr.Operation) {
    return op.body().invokeHostFunctionOp().hostFunction().invokeContract();
  }

  it("encodes zap_in_single_token", () => {
    const call = invocation(client.buildZapIn(USER, zapInRequest({ feeOnTransfer: true })));

    expect(call.functionName().toString()).toBe("zap_in_single_token");
    expect(call.args().map((arg) => scValToNative(arg))).toEqual([
      USER,
      TOKEN_A,
      TOKEN_A,
      TOKEN_B,
      10_000n,
      50,
      0n,
      BigInt(zapInRequest().deadline),
      true,
    ]);
  });

  it("encodes zap_out_single_token", () => {
    const call = invocation(client.buildZapOut(USER, zapOutRequest({ outputAsset: TOKEN_B, minimumOutputAmount: 19_000n })));

    expect(call.functionName().toString()).toBe("zap_out_single_token");
    expect(call.args().map((arg) => scValToNative(arg))).toEqual([
      USER,
      TOKEN_B,
      TOKEN_A,
      TOKEN_B,
      10_000n,
      50,
      19_000n,
      BigInt(zapOutRequest().deadline),
      false,
    ]);
  });
});
