// Table definitions for the trade store, the position ledger and the sync cursor
// Kept in step with sql/schema.sql, which is what creates them

import {
    bigint,
    boolean,
    index,
    integer,
    jsonb,
    numeric,
    pgTable,
    primaryKey,
    text,
    timestamp,
} from 'drizzle-orm/pg-core';

export const trades = pgTable(
    'trades',
    {
        id: text('id').primaryKey(),
        txHash: text('tx_hash').notNull(),
        logIndex: integer('log_index').notNull(),
        blockNumber: bigint('block_number', { mode: 'number' }).notNull(),
        blockTimestamp: timestamp('block_timestamp', { withTimezone: true, mode: 'date' }).notNull(),

        account: text('account').notNull(),
        counterparty: text('counterparty').notNull(),
        role: text('role').notNull(), // maker/taker

        contractVariant: text('contract_variant').notNull(),
        exchangeAddress: text('exchange_address').notNull(),
        orderHash: text('order_hash'),

        assetId: text('asset_id').notNull(),
        side: text('side').notNull(), // buy/sell/unknown
        amount: numeric('amount').notNull(),
        signedAmount: numeric('signed_amount').notNull(),
        price: numeric('price').notNull(),
        usdcAmount: numeric('usdc_amount').notNull(),
        fee: numeric('fee').notNull(),

        gasUsed: numeric('gas_used'),
        gasPrice: numeric('gas_price'),
        executionStatus: text('execution_status').notNull(),

        decodeFailed: boolean('decode_failed').notNull().default(false),
        decodeError: text('decode_error'),
        rawData: text('raw_data').notNull(),
        rawTopics: jsonb('raw_topics').$type<string[]>().notNull(),

        ingestedAt: timestamp('ingested_at', { withTimezone: true, mode: 'date' }).notNull(),
        captureDelaySeconds: integer('capture_delay_seconds').notNull(),
    },
    table => [
        index('trades_account_idx').on(table.account),
        index('trades_asset_idx').on(table.assetId),
        index('trades_block_idx').on(table.blockNumber, table.logIndex),
        index('trades_block_timestamp_idx').on(table.blockTimestamp),
    ],
);

export const positions = pgTable(
    'positions',
    {
        account: text('account').notNull(),
        assetId: text('asset_id').notNull(),

        currentPosition: numeric('current_position').notNull(),
        totalBought: numeric('total_bought').notNull(),
        totalSold: numeric('total_sold').notNull(),
        averageBuyPrice: numeric('average_buy_price'),
        totalBuyValue: numeric('total_buy_value').notNull(),
        totalSellValue: numeric('total_sell_value').notNull(),
        realizedPnl: numeric('realized_pnl').notNull(),

        status: text('status').notNull(), // active/closed/settled_win/settled_loss
        isComplete: boolean('is_complete').notNull().default(true),
        settlementPrice: numeric('settlement_price'),
        settledAt: timestamp('settled_at', { withTimezone: true, mode: 'date' }),
        backfillAttemptedAt: timestamp('backfill_attempted_at', { withTimezone: true, mode: 'date' }),

        firstTradeAt: timestamp('first_trade_at', { withTimezone: true, mode: 'date' }).notNull(),
        lastTradeAt: timestamp('last_trade_at', { withTimezone: true, mode: 'date' }).notNull(),
        tradeCount: integer('trade_count').notNull(),
        updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull(),
    },
    table => [
        primaryKey({ columns: [table.account, table.assetId] }),
        index('positions_status_idx').on(table.status),
    ],
);

// Single row, id = 1
export const syncState = pgTable('sync_state', {
    id: integer('id').primaryKey(),
    lastBlockProcessed: bigint('last_block_processed', { mode: 'number' }).notNull(),
    lastUpdateTime: timestamp('last_update_time', { withTimezone: true, mode: 'date' }).notNull(),
    monitorId: text('monitor_id'),
});

export type TradeRow = typeof trades.$inferSelect;
export type NewTradeRow = typeof trades.$inferInsert;
export type PositionRow = typeof positions.$inferSelect;
export type NewPositionRow = typeof positions.$inferInsert;
