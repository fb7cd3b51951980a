/**
 * Resilient Client Tests
 * Transaction building, send retry, confirmation and reads in both modes
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ComputeBudgetInstruction,
  Keypair,
  PublicKey,
  TransactionInstruction,
  TransactionMessage,
  type AccountInfo,
} from "@solana/web3.js";
import { FailoverRouter } from "../../../../src/services/blockchain/failoverRouter.js";
import {
  ResilientClient,
  type ResilientClientConfig,
} from "../../../../src/services/blockchain/resilientClient.js";
import type { RpcConnection } from "../../../../src/types/rpc.js";
import {
  HttpStatusError,
  NotFoundError,
  TransactionBuildError,
  TransactionSubmitError,
} from "../../../../src/utils/errors.js";
import {
  FakeTransport,
  TEST_ENDPOINT_A,
  TEST_ENDPOINT_B,
  blockhashResponse,
  connectionFactoryFor,
  createFakeConnection,
} from "../../../helpers/testUtils.js";

const FAST_CONFIG: Partial<ResilientClientConfig> = {
  sendRetryBaseDelayMs: 0,
  confirmPollIntervalMs: 0,
  blockhashRefreshIntervalMs: 60_000,
};

function createSingleClient(
  connection: RpcConnection,
  transport: FakeTransport = new FakeTransport()
): ResilientClient {
  return new ResilientClient({
    mode: "single",
    endpoint: TEST_ENDPOINT_A,
    transport,
    connectionFactory: () => connection,
    config: FAST_CONFIG,
  });
}

function memoInstruction(): TransactionInstruction {
  return new TransactionInstruction({
    programId: new PublicKey("MemoSq4gqABAXKb96qnH8TysNcWxMyWCqXgDLGmfcHr"),
    keys: [],
    data: Buffer.from([1, 2, 3]),
  });
}

describe("ResilientClient", () => {
  let client: ResilientClient | null = null;

  afterEach(async () => {
    await client?.stop();
    client = null;
  });

  // ==========================================================================
  // Building
  // ==========================================================================

  describe("buildTransaction", () => {
    it("should put unit limit and unit price before caller instructions", async () => {
      const signer = Keypair.generate();
      const { blockhash } = blockhashResponse();
      client = createSingleClient(
        createFakeConnection({ getLatestBlockhash: async () => ({ blockhash, lastValidBlockHeight: 1 }) })
      );
      const ix1 = memoInstruction();

      const transaction = await client.buildTransaction([ix1], signer, {
        computeUnitLimit: 90_000,
        priorityFeeMicroLamports: 5_000,
      });

      const message = TransactionMessage.decompile(transaction.message);
      expect(message.recentBlockhash).toBe(blockhash);
      expect(message.payerKey.equals(signer.publicKey)).toBe(true);
      expect(message.instructions).toHaveLength(3);

      const [limit, price, caller] = message.instructions;
      expect(ComputeBudgetInstruction.decodeInstructionType(limit)).toBe("SetComputeUnitLimit");
      expect(ComputeBudgetInstruction.decodeSetComputeUnitLimit(limit).units).toBe(90_000);
      expect(ComputeBudgetInstruction.decodeInstructionType(price)).toBe("SetComputeUnitPrice");
      expect(Number(ComputeBudgetInstruction.decodeSetComputeUnitPrice(price).microLamports)).toBe(
        5_000
      );
      expect(caller.programId.equals(ix1.programId)).toBe(true);
      expect(Buffer.from(caller.data)).toEqual(Buffer.from([1, 2, 3]));
      expect(transaction.signatures).toHaveLength(1);
    });

    it("should leave instructions untouched without budget options", async () => {
      client = createSingleClient(
        createFakeConnection({ getLatestBlockhash: async () => blockhashResponse() })
      );

      const transaction = await client.buildTransaction([memoInstruction()], Keypair.generate());

      expect(TransactionMessage.decompile(transaction.message).instructions).toHaveLength(1);
    });

    it("should raise TransactionBuildError when no blockhash is available", async () => {
      client = createSingleClient(
        createFakeConnection({
          getLatestBlockhash: async () => {
            throw new Error("node behind");
          },
        })
      );

      await expect(
        client.buildTransaction([memoInstruction()], Keypair.generate())
      ).rejects.toBeInstanceOf(TransactionBuildError);
    });

    it("should reuse the cached blockhash across builds", async () => {
      const getLatestBlockhash = vi.fn(async () => blockhashResponse());
      client = createSingleClient(createFakeConnection({ getLatestBlockhash }));
      const signer = Keypair.generate();

      const first = await client.buildTransaction([memoInstruction()], signer);
      const second = await client.buildTransaction([memoInstruction()], signer);

      expect(getLatestBlockhash).toHaveBeenCalledTimes(1);
      expect(second.message.recentBlockhash).toBe(first.message.recentBlockhash);
    });
  });

  // ==========================================================================
  // Sending & confirmation
  // ==========================================================================

  describe("sendTransaction", () => {
    it("should retry failed sends and return the signature", async () => {
      const sendRawTransaction = vi
        .fn()
        .mockRejectedValueOnce(new Error("blockhash not found"))
        .mockRejectedValueOnce(new Error("node unhealthy"))
        .mockResolvedValueOnce("sig-ok");
      client = createSingleClient(
        createFakeConnection({
          getLatestBlockhash: async () => blockhashResponse(),
          sendRawTransaction,
        })
      );

      const transaction = await client.buildTransaction([memoInstruction()], Keypair.generate());
      const signature = await client.sendTransaction(transaction);

      expect(signature).toBe("sig-ok");
      expect(sendRawTransaction).toHaveBeenCalledTimes(3);
      expect(sendRawTransaction).toHaveBeenLastCalledWith(expect.any(Uint8Array), {
        skipPreflight: true,
        preflightCommitment: "processed",
      });
    });

    it("should raise TransactionSubmitError after the last attempt", async () => {
      const sendRawTransaction = vi.fn().mockRejectedValue(new Error("nope"));
      client = createSingleClient(
        createFakeConnection({
          getLatestBlockhash: async () => blockhashResponse(),
          sendRawTransaction,
        })
      );
      const transaction = await client.buildTransaction([memoInstruction()], Keypair.generate());

      const error = await client
        .sendTransaction(transaction, { maxRetries: 2 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransactionSubmitError);
      if (error instanceof TransactionSubmitError) {
        expect(error.attempts).toBe(2);
        expect(error.message).toBe(
          "Retry exhausted for send_transaction after 2 attempts: nope"
        );
      }
      expect(sendRawTransaction).toHaveBeenCalledTimes(2);
    });

    it("should cap the wait between sends at sendRetryMaxDelayMs", async () => {
      const sendRawTransaction = vi
        .fn()
        .mockRejectedValueOnce(new Error("node unhealthy"))
        .mockResolvedValueOnce("sig-capped");
      client = new ResilientClient({
        mode: "single",
        endpoint: TEST_ENDPOINT_A,
        transport: new FakeTransport(),
        connectionFactory: () =>
          createFakeConnection({
            getLatestBlockhash: async () => blockhashResponse(),
            sendRawTransaction,
          }),
        config: {
          ...FAST_CONFIG,
          sendRetryBaseDelayMs: 60_000,
          sendRetryMaxDelayMs: 5,
          sendRetryJitterFactor: 0.5,
        },
      });
      const transaction = await client.buildTransaction([memoInstruction()], Keypair.generate());

      const startedAt = Date.now();
      const signature = await client.sendTransaction(transaction);

      expect(signature).toBe("sig-capped");
      expect(sendRawTransaction).toHaveBeenCalledTimes(2);
      expect(Date.now() - startedAt).toBeLessThan(1_000);
    });
  });

  describe("confirmTransaction", () => {
    it("should return true once the status reaches the commitment", async () => {
      const getSignatureStatus = vi
        .fn()
        .mockResolvedValueOnce({
          context: { slot: 1 },
          value: { slot: 1, confirmations: 0, err: null, confirmationStatus: "processed" },
        })
        .mockResolvedValueOnce({
          context: { slot: 2 },
          value: { slot: 2, confirmations: 1, err: null, confirmationStatus: "finalized" },
        });
      client = createSingleClient(createFakeConnection({ getSignatureStatus }));

      await expect(client.confirmTransaction("sig-1")).resolves.toBe(true);
      expect(getSignatureStatus).toHaveBeenCalledTimes(2);
    });

    it("should return false when the transaction failed", async () => {
      client = createSingleClient(
        createFakeConnection({
          getSignatureStatus: async () => ({
            context: { slot: 3 },
            value: { slot: 3, confirmations: 1, err: "InsufficientFunds", confirmationStatus: "confirmed" },
          }),
        })
      );

      await expect(client.confirmTransaction("sig-2")).resolves.toBe(false);
    });
  });

  // ==========================================================================
  // Reads
  // ==========================================================================

  describe("reads", () => {
    it("should return balances as bigint lamports", async () => {
      client = createSingleClient(createFakeConnection({ getBalance: async () => 2_500_000_000 }));

      await expect(client.getBalance(Keypair.generate().publicKey)).resolves.toBe(2_500_000_000n);
    });

    it("should return token balances in raw units", async () => {
      client = createSingleClient(
        createFakeConnection({
          getTokenAccountBalance: async () => ({
            context: { slot: 1 },
            value: { amount: "123456789012", decimals: 6, uiAmount: 123456.789012 },
          }),
        })
      );

      await expect(client.getTokenAccountBalance(Keypair.generate().publicKey)).resolves.toBe(
        123_456_789_012n
      );
    });

    it("should raise NotFoundError for a missing account", async () => {
      client = createSingleClient(createFakeConnection({ getAccountInfo: async () => null }));

      await expect(client.getAccountInfo(Keypair.generate().publicKey)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("should not call the node for an empty multi-account read", async () => {
      const getMultipleAccountsInfo = vi.fn(async (): Promise<(AccountInfo<Buffer> | null)[]> => []);
      client = createSingleClient(createFakeConnection({ getMultipleAccountsInfo }));

      await expect(client.getMultipleAccounts([])).resolves.toEqual([]);
      expect(getMultipleAccountsInfo).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // Raw JSON-RPC
  // ==========================================================================

  describe("postRpc", () => {
    it("should return the JSON-RPC response", async () => {
      const transport = new FakeTransport(() => ({
        status: 200,
        data: { jsonrpc: "2.0", id: 1, result: "ok" },
      }));
      client = createSingleClient(createFakeConnection(), transport);

      await expect(client.getHealth()).resolves.toBe("ok");
      expect(transport.calls[0]).toEqual({
        url: TEST_ENDPOINT_A,
        body: { jsonrpc: "2.0", id: 1, method: "getHealth" },
        timeoutMs: 10_000,
      });
    });

    it("should return Err for non-2xx responses", async () => {
      const transport = new FakeTransport(() => ({ status: 503, data: {} }));
      client = createSingleClient(createFakeConnection(), transport);

      const result = await client.postRpc({ jsonrpc: "2.0", id: 2, method: "getSlot" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(HttpStatusError);
        expect(result.error.message).toBe("HTTP 503");
      }
      await expect(client.getHealth()).resolves.toBeNull();
    });
  });

  // ==========================================================================
  // Failover mode
  // ==========================================================================

  describe("failover mode", () => {
    it("should route reads through the strategy", async () => {
      const router = new FailoverRouter(
        [TEST_ENDPOINT_A, TEST_ENDPOINT_B],
        {
          transport: new FakeTransport(),
          connectionFactory: connectionFactoryFor({
            [TEST_ENDPOINT_A]: createFakeConnection({
              getBalance: async () => {
                throw new Error("429 Too Many Requests");
              },
            }),
            [TEST_ENDPOINT_B]: createFakeConnection({ getBalance: async () => 5 }),
          }),
        },
        { backoffBaseMs: 0 }
      );
      client = new ResilientClient({ mode: "failover", strategy: router, config: FAST_CONFIG });

      expect(client.mode).toBe("failover");
      await expect(client.getBalance(Keypair.generate().publicKey)).resolves.toBe(5n);
      expect(router.getCurrentProvider()).toBe(TEST_ENDPOINT_B);
    });
  });
});
