/**
 * LedgerRepository - storage port for trades, positions and the sync cursor
 *
 * Implementations:
 * - PgLedgerRepository (Postgres via drizzle-orm)
 * - MemoryLedgerRepository (in-process, for tests)
 */

import type { Position, PositionQuery, SyncState, Trade, TradeQuery } from './types.js';

/**
 * Operations available inside one atomic unit of work.
 * Everything written through a transaction becomes visible together or not at all.
 */
export interface LedgerTransaction {
    /**
     * Insert a trade keyed by its id.
     * Returns false (and writes nothing) when the id already exists.
     */
    insertTrade(trade: Trade): Promise<boolean>;

    getPosition(account: string, assetId: string): Promise<Position | null>;

    /**
     * Insert or replace the row for (account, assetId)
     */
    savePosition(position: Position): Promise<void>;

    /**
     * Move the cursor to `block` unless it is already further ahead
     */
    advanceCursor(block: number, monitorId: string, at: Date): Promise<void>;

    /**
     * Drop every position row (trades and cursor are untouched)
     */
    clearPositions(): Promise<void>;

    /**
     * Every trade in chain order (block number, log index).
     * No trade can be inserted by anyone else until this transaction ends.
     */
    listTradesInChainOrder(): Promise<Trade[]>;

    listPositions(): Promise<Position[]>;
}

export interface LedgerRepository {
    readonly name: string;

    /**
     * Run `fn` atomically. A rejection rolls every write back.
     */
    transaction<T>(fn: (tx: LedgerTransaction) => Promise<T>): Promise<T>;

    getSyncState(): Promise<SyncState | null>;

    /**
     * Trades in chain order. Unbounded unless `limit` is given.
     */
    listTrades(query?: TradeQuery): Promise<Trade[]>;

    getPosition(account: string, assetId: string): Promise<Position | null>;

    listPositions(query?: PositionQuery): Promise<Position[]>;

    /**
     * Positions flagged incomplete (at some point more was sold than had been bought)
     * that no backfill has looked at yet
     */
    listIncompletePositions(): Promise<Position[]>;

    /**
     * Cheap connectivity check
     */
    ping(): Promise<void>;

    close(): Promise<void>;
}
