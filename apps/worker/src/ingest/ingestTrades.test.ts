import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_LEDGER_SETTINGS, type LedgerRepository, type LedgerTransaction } from '@fillwatch/core';
import { MemoryLedgerRepository } from '@fillwatch/db';
import { captureDelaySeconds, classifyCaptureDelay } from '../captureDelay.js';
import { createSilentLogger } from '../logger.js';
import { ACCOUNT_A, ACCOUNT_B, COUNTERPARTY, CTF } from '../testing/fakes.js';
import { TradeIngestor, rebuildPositions, type PendingTrade } from './ingestTrades.js';

const INGESTED_AT = new Date('2025-03-01T12:00:00Z');

let sequence = 0;

function pending(overrides: Partial<PendingTrade> = {}): PendingTrade {
    sequence++;
    const txHash = `0x${sequence.toString(16).padStart(64, '0')}`;
    const account = overrides.account ?? ACCOUNT_A;
    return {
        id: `${txHash}:0:${account}`,
        txHash,
        logIndex: 0,
        blockNumber: 1000 + sequence,
        blockTimestamp: new Date(INGESTED_AT.getTime() - 30_000),
        account,
        counterparty: COUNTERPARTY,
        role: 'maker',
        contractVariant: 'ctf',
        exchangeAddress: CTF,
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
        rawTopics: [],
        ...overrides,
    };
}

/**
 * Repository whose transactions fail at the cursor advance, after every trade was written
 */
function failingOnAdvance(inner: MemoryLedgerRepository): LedgerRepository {
    return {
        name: 'failing',
        transaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
            return inner.transaction(tx => fn({
                insertTrade: trade => tx.insertTrade(trade),
                getPosition: (account, assetId) => tx.getPosition(account, assetId),
                savePosition: position => tx.savePosition(position),
                advanceCursor: async () => {
                    throw new Error('connection lost');
                },
                clearPositions: () => tx.clearPositions(),
                listTradesInChainOrder: () => tx.listTradesInChainOrder(),
                listPositions: () => tx.listPositions(),
            }));
        },
        getSyncState: () => inner.getSyncState(),
        listTrades: query => inner.listTrades(query),
        getPosition: (account, assetId) => inner.getPosition(account, assetId),
        listPositions: query => inner.listPositions(query),
        listIncompletePositions: () => inner.listIncompletePositions(),
        ping: () => inner.ping(),
        close: () => inner.close(),
    };
}

describe('TradeIngestor', () => {
    let repository: MemoryLedgerRepository;
    let ingestor: TradeIngestor;

    beforeEach(() => {
        sequence = 0;
        repository = new MemoryLedgerRepository();
        ingestor = new TradeIngestor(repository, DEFAULT_LEDGER_SETTINGS, createSilentLogger(), () => INGESTED_AT);
    });

    it('stores trades, stamps ingestion time and folds them into positions', async () => {
        const buy = pending();
        const sell = pending({ side: 'sell', amount: '4', signedAmount: '-4', price: '0.5', usdcAmount: '2' });

        const result = await ingestor.store([buy, sell], { advanceTo: 2000, monitorId: 'test-monitor' });

        expect(result.stored).toBe(2);
        expect(result.duplicates).toBe(0);
        expect(result.positionsUpdated).toBe(1);
        expect(result.storedTrades[0]?.ingestedAt).toEqual(INGESTED_AT);
        expect(result.storedTrades[0]?.captureDelaySeconds).toBe(30);

        expect(await repository.getPosition(ACCOUNT_A, '1234')).toMatchObject({
            currentPosition: '6',
            totalBought: '10',
            totalSold: '4',
            realizedPnl: '0.4',
            tradeCount: 2,
        });
        expect(await repository.getSyncState()).toEqual({
            lastBlockProcessed: 2000,
            lastUpdateTime: INGESTED_AT,
            monitorId: 'test-monitor',
        });
    });

    it('counts distinct positions', async () => {
        const result = await ingestor.store([
            pending(),
            pending({ assetId: '99' }),
            pending({ account: ACCOUNT_B }),
            pending(),
        ], { monitorId: 'test-monitor' });

        expect(result.stored).toBe(4);
        expect(result.positionsUpdated).toBe(3);
    });

    it('ignores trades it has already stored', async () => {
        const trades = [pending(), pending({ side: 'sell', amount: '2', signedAmount: '-2', price: '0.6' })];
        await ingestor.store(trades, { monitorId: 'test-monitor' });
        const position = await repository.getPosition(ACCOUNT_A, '1234');

        const again = await ingestor.store(trades, { monitorId: 'test-monitor' });

        expect(again.stored).toBe(0);
        expect(again.duplicates).toBe(2);
        expect(again.positionsUpdated).toBe(0);
        expect(await repository.getPosition(ACCOUNT_A, '1234')).toEqual(position);
        expect(await repository.listTrades()).toHaveLength(2);
    });

    it('does not advance the cursor without a target block', async () => {
        await ingestor.store([pending()], { monitorId: 'test-monitor' });

        expect(await repository.getSyncState()).toBeNull();
    });

    it('advances the cursor for an empty window', async () => {
        const result = await ingestor.store([], { advanceTo: 1500, monitorId: 'test-monitor' });

        expect(result.stored).toBe(0);
        expect((await repository.getSyncState())?.lastBlockProcessed).toBe(1500);
    });

    it('keeps unknown-side trades out of the ledger', async () => {
        const unknown = pending({
            side: 'unknown',
            assetId: 'unknown',
            amount: '0',
            signedAmount: '0',
            price: '0',
            usdcAmount: '0',
            decodeFailed: true,
            decodeError: 'Expected 4 topics, got 3',
        });

        const result = await ingestor.store([unknown], { monitorId: 'test-monitor' });

        expect(result.stored).toBe(1);
        expect(result.positionsUpdated).toBe(0);
        expect(await repository.listPositions()).toEqual([]);
        expect((await repository.listTrades())[0]?.decodeError).toBe('Expected 4 topics, got 3');
    });

    it('commits nothing when the transaction fails', async () => {
        const failing = new TradeIngestor(
            failingOnAdvance(repository),
            DEFAULT_LEDGER_SETTINGS,
            createSilentLogger(),
            () => INGESTED_AT,
        );
        const handler = vi.fn();
        failing.onTradePersisted(handler);

        await expect(failing.store([pending()], { advanceTo: 1500, monitorId: 'test-monitor' }))
            .rejects.toThrow('connection lost');

        expect(await repository.listTrades()).toEqual([]);
        expect(await repository.listPositions()).toEqual([]);
        expect(await repository.getSyncState()).toBeNull();
        expect(handler).not.toHaveBeenCalled();
    });

    it('notifies handlers once per newly stored trade', async () => {
        const seen: string[] = [];
        ingestor.onTradePersisted(trade => {
            seen.push(trade.id);
        });
        const first = pending();
        const second = pending();

        await ingestor.store([first], { monitorId: 'test-monitor' });
        await ingestor.store([first, second], { monitorId: 'test-monitor' });

        expect(seen).toEqual([first.id, second.id]);
    });

    it('keeps storing when a handler throws', async () => {
        const after = vi.fn();
        ingestor.onTradePersisted(() => {
            throw new Error('handler failed');
        });
        ingestor.onTradePersisted(after);

        const result = await ingestor.store([pending()], { monitorId: 'test-monitor' });

        expect(result.stored).toBe(1);
        expect(after).toHaveBeenCalledTimes(1);
    });

    it('stops notifying after unsubscribe', async () => {
        const handler = vi.fn();
        const unsubscribe = ingestor.onTradePersisted(handler);
        unsubscribe();

        await ingestor.store([pending()], { monitorId: 'test-monitor' });

        expect(handler).not.toHaveBeenCalled();
    });
});

describe('rebuildPositions', () => {
    it('recomputes the ledger from stored trades', async () => {
        sequence = 0;
        const repository = new MemoryLedgerRepository();
        const ingestor = new TradeIngestor(repository, DEFAULT_LEDGER_SETTINGS, createSilentLogger(), () => INGESTED_AT);
        await ingestor.store([
            pending(),
            pending({ side: 'sell', amount: '10', signedAmount: '-10', price: '0.97' }),
            pending({ account: ACCOUNT_B, assetId: '77' }),
        ], { monitorId: 'test-monitor' });
        const before = await repository.listPositions();

        await repository.transaction(async tx => {
            await tx.clearPositions();
        });
        expect(await repository.listPositions()).toEqual([]);

        const result = await rebuildPositions(repository, DEFAULT_LEDGER_SETTINGS);

        expect(result).toEqual({ tradesReplayed: 3, positionsWritten: 2 });
        expect(await repository.listPositions()).toEqual(before);
        expect(await repository.getPosition(ACCOUNT_A, '1234')).toMatchObject({
            status: 'settled_win',
            settlementPrice: '1',
            currentPosition: '0',
        });
    });

    it('keeps backfill marks on rebuilt positions', async () => {
        const repository = new MemoryLedgerRepository();
        const ingestor = new TradeIngestor(repository, DEFAULT_LEDGER_SETTINGS, createSilentLogger(), () => INGESTED_AT);
        await ingestor.store([pending({ side: 'sell', amount: '5', signedAmount: '-5', price: '0.5' })], { monitorId: 'test-monitor' });
        await repository.transaction(async tx => {
            const position = await tx.getPosition(ACCOUNT_A, '1234');
            if (position) await tx.savePosition({ ...position, backfillAttemptedAt: INGESTED_AT });
        });

        await rebuildPositions(repository, DEFAULT_LEDGER_SETTINGS);

        expect((await repository.getPosition(ACCOUNT_A, '1234'))?.backfillAttemptedAt).toEqual(INGESTED_AT);
    });

    it('does not lose a window stored while it runs', async () => {
        const repository = new MemoryLedgerRepository();
        const ingestor = new TradeIngestor(repository, DEFAULT_LEDGER_SETTINGS, createSilentLogger(), () => INGESTED_AT);
        await ingestor.store([pending()], { monitorId: 'test-monitor' });

        const rebuilt = rebuildPositions(repository, DEFAULT_LEDGER_SETTINGS);
        const stored = ingestor.store([pending({ amount: '6', signedAmount: '6' })], { monitorId: 'test-monitor' });
        await Promise.all([rebuilt, stored]);

        expect(await rebuilt).toEqual({ tradesReplayed: 1, positionsWritten: 1 });
        expect(await repository.getPosition(ACCOUNT_A, '1234')).toMatchObject({
            totalBought: '16',
            currentPosition: '16',
            tradeCount: 2,
        });
    });
});

describe('captureDelay', () => {
    it('measures whole seconds and never goes negative', () => {
        const block = new Date('2025-03-01T12:00:00Z');
        expect(captureDelaySeconds(block, new Date('2025-03-01T12:01:30.900Z'))).toBe(90);
        expect(captureDelaySeconds(block, new Date('2025-03-01T11:59:00Z'))).toBe(0);
    });

    it('classifies delays', () => {
        expect(classifyCaptureDelay(59)).toBe('realtime');
        expect(classifyCaptureDelay(60)).toBe('slow');
        expect(classifyCaptureDelay(299)).toBe('slow');
        expect(classifyCaptureDelay(300)).toBe('delayed');
        expect(classifyCaptureDelay(3600)).toBe('historical');
    });
});
