import { describe, expect, it } from 'vitest';
import { openPosition, type Trade } from '@fillwatch/core';
import { MemoryLedgerRepository } from './memoryRepository.js';
import { fromTradeRow, toTradeRow } from './pgRepository.js';

const ACCOUNT = '0x00000000000000000000000000000000000000a1';
const BLOCK_TIME = new Date('2025-03-01T12:00:00Z');

function trade(blockNumber: number, logIndex: number, overrides: Partial<Trade> = {}): Trade {
    const txHash = `0x${blockNumber.toString(16).padStart(64, '0')}`;
    return {
        id: `${txHash}:${logIndex}:${ACCOUNT}`,
        txHash,
        logIndex,
        blockNumber,
        blockTimestamp: new Date(BLOCK_TIME.getTime() + blockNumber * 2000),
        account: ACCOUNT,
        counterparty: '0x00000000000000000000000000000000000000c3',
        role: 'maker',
        contractVariant: 'ctf',
        exchangeAddress: '0x4bfb41d5b3570defd03c39a9a4d8de6bd8b8982e',
        orderHash: null,
        assetId: '1234',
        side: 'buy',
        amount: '10',
        signedAmount: '10',
        price: '0.4',
        usdcAmount: '4',
        fee: '0',
        gasUsed: null,
        gasPrice: null,
        executionStatus: 'success',
        decodeFailed: false,
        decodeError: null,
        rawData: '0x',
        rawTopics: ['0x01'],
        ingestedAt: BLOCK_TIME,
        captureDelaySeconds: 0,
        ...overrides,
    };
}

describe('MemoryLedgerRepository', () => {
    it('inserts a trade id once', async () => {
        const repository = new MemoryLedgerRepository();

        const results = await repository.transaction(async tx => [
            await tx.insertTrade(trade(10, 0)),
            await tx.insertTrade(trade(10, 0)),
        ]);

        expect(results).toEqual([true, false]);
        expect(await repository.listTrades()).toHaveLength(1);
    });

    it('discards every write of a failed transaction', async () => {
        const repository = new MemoryLedgerRepository();

        await expect(repository.transaction(async tx => {
            await tx.insertTrade(trade(10, 0));
            await tx.savePosition(openPosition(ACCOUNT, '1234', BLOCK_TIME));
            await tx.advanceCursor(100, 'test-monitor', BLOCK_TIME);
            throw new Error('abort');
        })).rejects.toThrow('abort');

        expect(await repository.listTrades()).toEqual([]);
        expect(await repository.listPositions()).toEqual([]);
        expect(await repository.getSyncState()).toBeNull();
    });

    it('keeps running transactions after a failed one', async () => {
        const repository = new MemoryLedgerRepository();

        const failed = repository.transaction(async () => {
            throw new Error('abort');
        });
        const next = repository.transaction(async tx => tx.insertTrade(trade(11, 0)));

        await expect(failed).rejects.toThrow('abort');
        await expect(next).resolves.toBe(true);
    });

    it('never moves the cursor backwards', async () => {
        const repository = new MemoryLedgerRepository();
        const later = new Date(BLOCK_TIME.getTime() + 60_000);

        await repository.transaction(tx => tx.advanceCursor(200, 'worker-1', BLOCK_TIME));
        await repository.transaction(tx => tx.advanceCursor(150, 'worker-2', later));

        expect(await repository.getSyncState()).toEqual({
            lastBlockProcessed: 200,
            lastUpdateTime: later,
            monitorId: 'worker-2',
        });
    });

    it('notifies listeners only after commit', async () => {
        const repository = new MemoryLedgerRepository();
        const seen: string[] = [];
        repository.onTradePersisted(t => seen.push(t.id));

        await repository.transaction(async tx => {
            await tx.insertTrade(trade(10, 0));
            expect(seen).toEqual([]);
        });
        await repository.transaction(async tx => {
            await tx.insertTrade(trade(10, 1));
            throw new Error('abort');
        }).catch(() => undefined);

        expect(seen).toEqual([trade(10, 0).id]);
    });

    it('lists trades in chain order with filters', async () => {
        const repository = new MemoryLedgerRepository();
        await repository.transaction(async tx => {
            await tx.insertTrade(trade(12, 0));
            await tx.insertTrade(trade(10, 3, { assetId: '99' }));
            await tx.insertTrade(trade(10, 1));
        });

        const all = await repository.listTrades();
        expect(all.map(t => [t.blockNumber, t.logIndex])).toEqual([[10, 1], [10, 3], [12, 0]]);

        const asset = await repository.listTrades({ assetId: '1234', limit: 1 });
        expect(asset.map(t => t.blockNumber)).toEqual([10]);

        const from = await repository.listTrades({ from: trade(12, 0).blockTimestamp });
        expect(from.map(t => t.blockNumber)).toEqual([12]);

        const upper = await repository.listTrades({ account: ACCOUNT.toUpperCase().replace('0X', '0x') });
        expect(upper).toHaveLength(3);
    });

    it('lists positions by status and incomplete ones', async () => {
        const repository = new MemoryLedgerRepository();
        const active = openPosition(ACCOUNT, '1', BLOCK_TIME);
        const closed = { ...openPosition(ACCOUNT, '2', new Date(BLOCK_TIME.getTime() + 1000)), status: 'closed' as const };
        const incomplete = { ...openPosition(ACCOUNT, '3', BLOCK_TIME), isComplete: false };
        await repository.transaction(async tx => {
            await tx.savePosition(active);
            await tx.savePosition(closed);
            await tx.savePosition(incomplete);
        });

        expect((await repository.listPositions()).map(p => p.assetId)).toEqual(['2', '1', '3']);
        expect((await repository.listPositions({ status: 'closed' })).map(p => p.assetId)).toEqual(['2']);
        expect((await repository.listIncompletePositions()).map(p => p.assetId)).toEqual(['3']);
    });

    it('leaves incomplete positions that were already backfilled out of the incomplete list', async () => {
        const repository = new MemoryLedgerRepository();
        const pending = { ...openPosition(ACCOUNT, '3', BLOCK_TIME), isComplete: false };
        const backfilled = { ...openPosition(ACCOUNT, '4', BLOCK_TIME), isComplete: false, backfillAttemptedAt: BLOCK_TIME };
        await repository.transaction(async tx => {
            await tx.savePosition(pending);
            await tx.savePosition(backfilled);
        });

        expect((await repository.listIncompletePositions()).map(p => p.assetId)).toEqual(['3']);
        expect((await repository.getPosition(ACCOUNT, '4'))?.backfillAttemptedAt).toEqual(BLOCK_TIME);
    });

    it('lists every trade when no limit is given', async () => {
        const repository = new MemoryLedgerRepository();
        await repository.transaction(async tx => {
            for (let block = 1; block <= 1001; block++) await tx.insertTrade(trade(block, 0));
        });

        expect(await repository.listTrades()).toHaveLength(1001);
        expect((await repository.listTrades({ limit: 2 })).map(t => t.blockNumber)).toEqual([1, 2]);
    });

    it('reads trades in chain order and positions inside a transaction', async () => {
        const repository = new MemoryLedgerRepository();
        await repository.transaction(async tx => {
            await tx.insertTrade(trade(12, 0));
            await tx.insertTrade(trade(10, 1));
            await tx.savePosition(openPosition(ACCOUNT, '1234', BLOCK_TIME));
        });

        const [blocks, assets] = await repository.transaction(async tx => [
            (await tx.listTradesInChainOrder()).map(t => t.blockNumber),
            (await tx.listPositions()).map(p => p.assetId),
        ]);

        expect(blocks).toEqual([10, 12]);
        expect(assets).toEqual(['1234']);
    });

    it('clears positions inside a transaction', async () => {
        const repository = new MemoryLedgerRepository();
        await repository.transaction(tx => tx.savePosition(openPosition(ACCOUNT, '1', BLOCK_TIME)));

        await repository.transaction(tx => tx.clearPositions());

        expect(await repository.getPosition(ACCOUNT, '1')).toBeNull();
    });

    it('hands out copies', async () => {
        const repository = new MemoryLedgerRepository();
        await repository.transaction(async tx => {
            await tx.insertTrade(trade(10, 0));
        });

        const [first] = await repository.listTrades();
        if (first) first.rawTopics.push('0x02');

        const [again] = await repository.listTrades();
        expect(again?.rawTopics).toEqual(['0x01']);
    });
});

describe('trade row mapping', () => {
    it('round-trips a trade through its row', () => {
        const original = trade(10, 0, { side: 'unknown', contractVariant: 'unknown', executionStatus: 'failed' });
        const row = { ...toTradeRow(original), decodeFailed: original.decodeFailed };

        expect(fromTradeRow({
            ...row,
            orderHash: original.orderHash,
            gasUsed: original.gasUsed,
            gasPrice: original.gasPrice,
            decodeError: original.decodeError,
        })).toEqual(original);
    });

    it('rejects values outside the domain unions', () => {
        const row = { ...toTradeRow(trade(10, 0)), decodeFailed: false, orderHash: null, gasUsed: null, gasPrice: null, decodeError: null };

        expect(() => fromTradeRow({ ...row, side: 'short' })).toThrow();
    });
});
