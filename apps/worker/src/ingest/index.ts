/**
 * Trade ingestion and position ledger persistence
 */
export {
    TradeIngestor,
    rebuildPositions,
    type PendingTrade,
    type RebuildResult,
    type StoreOptions,
    type StoreResult,
    type TradePersistedHandler,
} from './ingestTrades.js';
