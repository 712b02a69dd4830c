/**
 * In-process LedgerRepository
 *
 * Holds everything in maps. A transaction works on a copy of the state and
 * swaps it in only when the callback resolves, so a rejection leaves nothing behind.
 * Transactions are serialized the way a single Postgres connection would run them.
 */

import {
    positionKey,
    type LedgerRepository,
    type LedgerTransaction,
    type Position,
    type PositionQuery,
    type SyncState,
    type Trade,
    type TradeQuery,
} from '@fillwatch/core';

interface LedgerState {
    trades: Map<string, Trade>;
    positions: Map<string, Position>;
    syncState: SyncState | null;
}

export type TradePersistedListener = (trade: Trade) => void;

function cloneState(state: LedgerState): LedgerState {
    return {
        trades: new Map(state.trades),
        positions: new Map(state.positions),
        syncState: state.syncState ? { ...state.syncState } : null,
    };
}

function copyTrade(trade: Trade): Trade {
    return { ...trade, rawTopics: [...trade.rawTopics] };
}

function chainOrder(a: Trade, b: Trade): number {
    if (a.blockNumber !== b.blockNumber) return a.blockNumber - b.blockNumber;
    if (a.logIndex !== b.logIndex) return a.logIndex - b.logIndex;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

class MemoryLedgerTransaction implements LedgerTransaction {
    readonly inserted: Trade[] = [];

    constructor(private readonly state: LedgerState) { }

    async insertTrade(trade: Trade): Promise<boolean> {
        if (this.state.trades.has(trade.id)) return false;
        const stored = { ...copyTrade(trade), account: trade.account.toLowerCase() };
        this.state.trades.set(trade.id, stored);
        this.inserted.push(stored);
        return true;
    }

    async getPosition(account: string, assetId: string): Promise<Position | null> {
        const position = this.state.positions.get(positionKey(account, assetId));
        return position ? { ...position } : null;
    }

    async savePosition(position: Position): Promise<void> {
        this.state.positions.set(positionKey(position.account, position.assetId), { ...position });
    }

    async advanceCursor(block: number, monitorId: string, at: Date): Promise<void> {
        const current = this.state.syncState?.lastBlockProcessed ?? -1;
        this.state.syncState = {
            lastBlockProcessed: Math.max(current, block),
            lastUpdateTime: at,
            monitorId,
        };
    }

    async clearPositions(): Promise<void> {
        this.state.positions.clear();
    }

    async listTradesInChainOrder(): Promise<Trade[]> {
        return [...this.state.trades.values()].sort(chainOrder).map(copyTrade);
    }

    async listPositions(): Promise<Position[]> {
        return [...this.state.positions.values()].map(p => ({ ...p }));
    }
}

export class MemoryLedgerRepository implements LedgerRepository {
    readonly name = 'memory';

    private state: LedgerState = { trades: new Map(), positions: new Map(), syncState: null };
    private queue: Promise<unknown> = Promise.resolve();
    private readonly listeners: TradePersistedListener[] = [];

    /**
     * Called once per newly inserted trade after its transaction commits.
     * Stands in for the Postgres notification channel.
     */
    onTradePersisted(listener: TradePersistedListener): void {
        this.listeners.push(listener);
    }

    transaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
        const run = async (): Promise<T> => {
            const draft = cloneState(this.state);
            const tx = new MemoryLedgerTransaction(draft);
            const result = await fn(tx);
            this.state = draft;
            for (const trade of tx.inserted) {
                for (const listener of this.listeners) listener(copyTrade(trade));
            }
            return result;
        };

        const next = this.queue.then(run, run);
        this.queue = next.catch(() => undefined);
        return next;
    }

    async getSyncState(): Promise<SyncState | null> {
        return this.state.syncState ? { ...this.state.syncState } : null;
    }

    async listTrades(query: TradeQuery = {}): Promise<Trade[]> {
        const account = query.account?.toLowerCase();
        return [...this.state.trades.values()]
            .filter(t => account === undefined || t.account === account)
            .filter(t => query.assetId === undefined || t.assetId === query.assetId)
            .filter(t => query.from === undefined || t.blockTimestamp >= query.from)
            .filter(t => query.to === undefined || t.blockTimestamp <= query.to)
            .sort(chainOrder)
            .slice(0, query.limit)
            .map(copyTrade);
    }

    async getPosition(account: string, assetId: string): Promise<Position | null> {
        const position = this.state.positions.get(positionKey(account, assetId));
        return position ? { ...position } : null;
    }

    async listPositions(query: PositionQuery = {}): Promise<Position[]> {
        const account = query.account?.toLowerCase();
        return [...this.state.positions.values()]
            .filter(p => account === undefined || p.account === account)
            .filter(p => query.status === undefined || p.status === query.status)
            .sort((a, b) => b.lastTradeAt.getTime() - a.lastTradeAt.getTime())
            .map(p => ({ ...p }));
    }

    async listIncompletePositions(): Promise<Position[]> {
        return [...this.state.positions.values()]
            .filter(p => !p.isComplete && p.backfillAttemptedAt === null)
            .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
            .map(p => ({ ...p }));
    }

    async ping(): Promise<void> { }

    async close(): Promise<void> { }
}
