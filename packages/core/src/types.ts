// Normalized types for the fill ledger

export type TradeSide = 'buy' | 'sell' | 'unknown';

export type TradeRole = 'maker' | 'taker';

export type ContractVariant = 'ctf' | 'neg_risk';

export type ExecutionStatus = 'success' | 'failed';

export type PositionStatus = 'active' | 'closed' | 'settled_win' | 'settled_loss';

/**
 * A canonical trade, one per (log, watched account).
 * Decimal quantities are carried as strings so no precision is lost on the way to Postgres numerics.
 */
export interface Trade {
    id: string;
    txHash: string;
    logIndex: number;
    blockNumber: number;
    blockTimestamp: Date;

    account: string;
    counterparty: string;
    role: TradeRole;

    contractVariant: ContractVariant | 'unknown';
    exchangeAddress: string;
    orderHash: string | null;

    assetId: string;
    side: TradeSide;
    amount: string;
    signedAmount: string;
    price: string;
    usdcAmount: string;
    fee: string;

    gasUsed: string | null;
    gasPrice: string | null;
    executionStatus: ExecutionStatus;

    decodeFailed: boolean;
    decodeError: string | null;
    rawData: string;
    rawTopics: string[];

    ingestedAt: Date;
    captureDelaySeconds: number;
}

export interface Position {
    account: string;
    assetId: string;

    currentPosition: string;
    totalBought: string;
    totalSold: string;
    averageBuyPrice: string | null;
    totalBuyValue: string;
    totalSellValue: string;
    realizedPnl: string;

    status: PositionStatus;
    isComplete: boolean;
    settlementPrice: string | null;
    settledAt: Date | null;
    /** Set once a history backfill has looked for this position's missing buys */
    backfillAttemptedAt: Date | null;

    firstTradeAt: Date;
    lastTradeAt: Date;
    tradeCount: number;
    updatedAt: Date;
}

export interface SyncState {
    lastBlockProcessed: number;
    lastUpdateTime: Date;
    monitorId: string | null;
}

export interface TradeQuery {
    account?: string;
    assetId?: string;
    from?: Date;
    to?: Date;
    limit?: number;
}

export interface PositionQuery {
    account?: string;
    status?: PositionStatus;
}
