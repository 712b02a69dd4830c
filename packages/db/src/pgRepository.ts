/**
 * Postgres implementation of the LedgerRepository port (drizzle-orm over node-postgres)
 */

import { and, asc, desc, eq, gte, isNull, lte, sql, type SQL } from 'drizzle-orm';
import type {
    LedgerRepository,
    LedgerTransaction,
    Position,
    PositionQuery,
    SyncState,
    Trade,
    TradeQuery,
} from '@fillwatch/core';
import type { Database } from './client.js';
import {
    positions,
    syncState,
    trades,
    type NewPositionRow,
    type NewTradeRow,
    type PositionRow,
    type TradeRow,
} from './schema.js';
import { parseContractVariant, parsePositionStatus, parseRole, parseSide, parseStatus } from './rows.js';

/**
 * Channel the "trade persisted" notification is published on.
 * Payload: {"id","account","assetId"} as JSON. Delivered on commit only.
 */
export const TRADE_PERSISTED_CHANNEL = 'trade_persisted';

const SYNC_STATE_ID = 1;

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];
type Executor = Database | Transaction;

// ============================================================================
// Row mapping
// ============================================================================

export function toTradeRow(trade: Trade): NewTradeRow {
    return { ...trade, rawTopics: [...trade.rawTopics] };
}

export function fromTradeRow(row: TradeRow): Trade {
    return {
        ...row,
        role: parseRole(row.role),
        contractVariant: parseContractVariant(row.contractVariant),
        side: parseSide(row.side),
        executionStatus: parseStatus(row.executionStatus),
    };
}

export function toPositionRow(position: Position): NewPositionRow {
    return { ...position };
}

export function fromPositionRow(row: PositionRow): Position {
    return { ...row, status: parsePositionStatus(row.status) };
}

async function selectPosition(db: Executor, account: string, assetId: string): Promise<Position | null> {
    const rows = await db
        .select()
        .from(positions)
        .where(and(eq(positions.account, account.toLowerCase()), eq(positions.assetId, assetId)))
        .limit(1);
    return rows[0] ? fromPositionRow(rows[0]) : null;
}

// ============================================================================
// Transaction
// ============================================================================

class PgLedgerTransaction implements LedgerTransaction {
    constructor(private readonly tx: Transaction) { }

    async insertTrade(trade: Trade): Promise<boolean> {
        const inserted = await this.tx
            .insert(trades)
            .values(toTradeRow(trade))
            .onConflictDoNothing({ target: trades.id })
            .returning({ id: trades.id });

        if (inserted.length === 0) return false;

        const payload = JSON.stringify({ id: trade.id, account: trade.account, assetId: trade.assetId });
        await this.tx.execute(sql`SELECT pg_notify(${TRADE_PERSISTED_CHANNEL}, ${payload})`);
        return true;
    }

    getPosition(account: string, assetId: string): Promise<Position | null> {
        return selectPosition(this.tx, account, assetId);
    }

    async savePosition(position: Position): Promise<void> {
        const row = toPositionRow(position);
        await this.tx
            .insert(positions)
            .values(row)
            .onConflictDoUpdate({
                target: [positions.account, positions.assetId],
                set: {
                    currentPosition: row.currentPosition,
                    totalBought: row.totalBought,
                    totalSold: row.totalSold,
                    averageBuyPrice: row.averageBuyPrice,
                    totalBuyValue: row.totalBuyValue,
                    totalSellValue: row.totalSellValue,
                    realizedPnl: row.realizedPnl,
                    status: row.status,
                    isComplete: row.isComplete,
                    settlementPrice: row.settlementPrice,
                    settledAt: row.settledAt,
                    backfillAttemptedAt: row.backfillAttemptedAt,
                    lastTradeAt: row.lastTradeAt,
                    tradeCount: row.tradeCount,
                    updatedAt: row.updatedAt,
                },
            });
    }

    async advanceCursor(block: number, monitorId: string, at: Date): Promise<void> {
        await this.tx
            .insert(syncState)
            .values({ id: SYNC_STATE_ID, lastBlockProcessed: block, lastUpdateTime: at, monitorId })
            .onConflictDoUpdate({
                target: syncState.id,
                set: {
                    // never moves backwards
                    lastBlockProcessed: sql`GREATEST(${syncState.lastBlockProcessed}, excluded.last_block_processed)`,
                    lastUpdateTime: at,
                    monitorId,
                },
            });
    }

    async clearPositions(): Promise<void> {
        await this.tx.delete(positions);
    }

    async listTradesInChainOrder(): Promise<Trade[]> {
        // SHARE conflicts with the ROW EXCLUSIVE an insert takes: writers wait for our commit
        await this.tx.execute(sql`LOCK TABLE trades IN SHARE MODE`);
        const rows = await this.tx
            .select()
            .from(trades)
            .orderBy(asc(trades.blockNumber), asc(trades.logIndex), asc(trades.id));
        return rows.map(fromTradeRow);
    }

    async listPositions(): Promise<Position[]> {
        const rows = await this.tx.select().from(positions);
        return rows.map(fromPositionRow);
    }
}

// ============================================================================
// Repository
// ============================================================================

export class PgLedgerRepository implements LedgerRepository {
    readonly name = 'postgres';

    constructor(
        private readonly db: Database,
        private readonly onClose: () => Promise<void> = async () => { },
    ) { }

    transaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
        return this.db.transaction(tx => fn(new PgLedgerTransaction(tx)));
    }

    async getSyncState(): Promise<SyncState | null> {
        const rows = await this.db.select().from(syncState).where(eq(syncState.id, SYNC_STATE_ID)).limit(1);
        const row = rows[0];
        if (!row) return null;
        return {
            lastBlockProcessed: row.lastBlockProcessed,
            lastUpdateTime: row.lastUpdateTime,
            monitorId: row.monitorId,
        };
    }

    async listTrades(query: TradeQuery = {}): Promise<Trade[]> {
        const conditions: SQL[] = [];
        if (query.account) conditions.push(eq(trades.account, query.account.toLowerCase()));
        if (query.assetId) conditions.push(eq(trades.assetId, query.assetId));
        if (query.from) conditions.push(gte(trades.blockTimestamp, query.from));
        if (query.to) conditions.push(lte(trades.blockTimestamp, query.to));

        const select = this.db
            .select()
            .from(trades)
            .where(and(...conditions))
            .orderBy(asc(trades.blockNumber), asc(trades.logIndex))
            .$dynamic();
        const rows = await (query.limit === undefined ? select : select.limit(query.limit));

        return rows.map(fromTradeRow);
    }

    getPosition(account: string, assetId: string): Promise<Position | null> {
        return selectPosition(this.db, account, assetId);
    }

    async listPositions(query: PositionQuery = {}): Promise<Position[]> {
        const conditions: SQL[] = [];
        if (query.account) conditions.push(eq(positions.account, query.account.toLowerCase()));
        if (query.status) conditions.push(eq(positions.status, query.status));

        const rows = await this.db
            .select()
            .from(positions)
            .where(and(...conditions))
            .orderBy(desc(positions.lastTradeAt));

        return rows.map(fromPositionRow);
    }

    async listIncompletePositions(): Promise<Position[]> {
        const rows = await this.db
            .select()
            .from(positions)
            .where(and(eq(positions.isComplete, false), isNull(positions.backfillAttemptedAt)))
            .orderBy(desc(positions.updatedAt));

        return rows.map(fromPositionRow);
    }

    async ping(): Promise<void> {
        await this.db.execute(sql`SELECT 1`);
    }

    close(): Promise<void> {
        return this.onClose();
    }
}
