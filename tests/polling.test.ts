import { SorobanRpc } from '@stellar/stellar-sdk';
import { TransactionPoller } from '../src/utils/polling';
import { Logger } from '../src/types/common';

describe('TransactionPoller', () => {
    let mockServer: jest.Mocked<SorobanRpc.Server>;
    let mockLogger: jest.Mocked<Logger>;
    let poller: TransactionPoller;

    beforeEach(() => {
        mockServer = {
            getTransaction: jest.fn(),
        } as any;

        mockLogger = {
            debug: jest.fn(),
            info: jest.fn(),
            error: jest.fn(),
        };

        poller = new TransactionPoller(mockServer, mockLogger);
    });

    it('confirms a transaction on the first attempt', async () => {
        mockServer.getTransaction.mockResolvedValueOnce({
            status: 'SUCCESS',
            ledger: 100,
        } as any);

        const result = await poller.poll('TX_HASH');

        expect(result).toEqual({ success: true, data: { txHash: 'TX_HASH', ledger: 100 }, txHash: 'TX_HASH' });
        expect(mockServer.getTransaction).toHaveBeenCalledTimes(1);
        expect(mockLogger.info).toHaveBeenCalledWith('TransactionPoller: confirmed', { txHash: 'TX_HASH', ledger: 100 });
    });

    it('polls at a fixed interval until success', async () => {
        mockServer.getTransaction
            .mockResolvedValueOnce({ status: 'NOT_FOUND' } as any)
            .mockResolvedValueOnce({ status: 'NOT_FOUND' } as any)
            .mockResolvedValueOnce({ status: 'SUCCESS', ledger: 101 } as any);

        const startTime = Date.now();
        const result = await poller.poll('TX_HASH', { intervalMs: 50, maxAttempts: 5 });
        const duration = Date.now() - startTime;

        expect(result.success).toBe(true);
        expect(result.data?.ledger).toBe(101);
        expect(mockServer.getTransaction).toHaveBeenCalledTimes(3);
        expect(duration).toBeGreaterThanOrEqual(90); // 2 intervals of 50ms, minus timer jitter
    });

    it('grows the interval by the backoff factor', async () => {
        mockServer.getTransaction
            .mockResolvedValueOnce({ status: 'NOT_FOUND' } as any)
            .mockResolvedValueOnce({ status: 'NOT_FOUND' } as any)
            .mockResolvedValueOnce({ status: 'SUCCESS', ledger: 102 } as any);

        const startTime = Date.now();
        await poller.poll('TX_HASH', { intervalMs: 50, backoffFactor: 2, maxAttempts: 5 });
        const duration = Date.now() - startTime;

        // 50ms then 100ms
        expect(duration).toBeGreaterThanOrEqual(140);
        expect(mockServer.getTransaction).toHaveBeenCalledTimes(3);
    });

    it('reports an on-chain failure immediately', async () => {
        mockServer.getTransaction.mockResolvedValueOnce({
            status: 'FAILED',
            ledger: 104,
        } as any);

        const result = await poller.poll('TX_HASH');

        expect(result.success).toBe(false);
        expect(result.error).toEqual({
            code: 'TX_FAILED',
            message: 'Transaction failed on-chain',
            details: { ledger: 104 },
        });
        expect(result.txHash).toBe('TX_HASH');
        expect(mockServer.getTransaction).toHaveBeenCalledTimes(1);
    });

    it('times out after maxAttempts', async () => {
        mockServer.getTransaction.mockResolvedValue({ status: 'NOT_FOUND' } as any);

        const result = await poller.poll('TX_HASH', { intervalMs: 10, maxAttempts: 3 });

        expect(result.success).toBe(false);
        expect(result.error?.code).toBe('TX_TIMEOUT');
        expect(result.error?.message).toBe('Transaction confirmation timed out after 3 attempts');
        expect(mockServer.getTransaction).toHaveBeenCalledTimes(3);
        expect(mockLogger.error).toHaveBeenCalledWith('TransactionPoller: timed out', { txHash: 'TX_HASH', attempts: 3 });
    });

    it('continues polling on RPC errors', async () => {
        mockServer.getTransaction
            .mockRejectedValueOnce(new Error('Network error'))
            .mockResolvedValueOnce({ status: 'SUCCESS', ledger: 103 } as any);

        const result = await poller.poll('TX_HASH', { intervalMs: 10 });

        expect(result.success).toBe(true);
        expect(result.data?.ledger).toBe(103);
        expect(mockServer.getTransaction).toHaveBeenCalledTimes(2);
        expect(mockLogger.debug).toHaveBeenCalledWith('TransactionPoller: RPC error, still pending', {
            txHash: 'TX_HASH',
            attempt: 1,
            error: 'Network error',
        });
    });
});
