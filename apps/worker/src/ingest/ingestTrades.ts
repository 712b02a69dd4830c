/**
 * Trade ingestion - idempotent storage of canonical trades plus the position ledger update
 *
 * One call to store() is one repository transaction:
 * - each trade is inserted keyed by its id; an existing id is a duplicate and touches nothing
 * - each newly stored buy/sell is folded into its position before the next trade is looked at
 * - the cursor advance, when given, commits with them
 * "Trade persisted" handlers run only after the commit.
 */

import type { Logger } from 'pino';
import {
    applyTrade,
    isLedgerTrade,
    positionKey,
    replayTrades,
    type LedgerRepository,
    type LedgerSettings,
    type Trade,
} from '@fillwatch/core';
import { captureDelaySeconds, classifyCaptureDelay } from '../captureDelay.js';
import { serializeError } from '../errors.js';

/**
 * A trade as it leaves the scanner; ingestion stamps the rest
 */
export type PendingTrade = Omit<Trade, 'ingestedAt' | 'captureDelaySeconds'>;

export interface StoreOptions {
    /** Cursor position committed with the trades */
    advanceTo?: number;
    monitorId: string;
}

export interface StoreResult {
    stored: number;
    duplicates: number;
    /** Distinct positions written */
    positionsUpdated: number;
    storedTrades: Trade[];
}

export type TradePersistedHandler = (trade: Trade) => Promise<void> | void;

export class TradeIngestor {
    private readonly handlers: TradePersistedHandler[] = [];
    private readonly logger: Logger;

    constructor(
        private readonly repository: LedgerRepository,
        private readonly settings: LedgerSettings,
        logger: Logger,
        private readonly now: () => Date = () => new Date(),
    ) {
        this.logger = logger.child({ module: 'ingest' });
    }

    /**
     * Subscribe to newly stored trades. Returns an unsubscribe function.
     */
    onTradePersisted(handler: TradePersistedHandler): () => void {
        this.handlers.push(handler);
        return () => {
            const idx = this.handlers.indexOf(handler);
            if (idx >= 0) this.handlers.splice(idx, 1);
        };
    }

    async store(trades: readonly PendingTrade[], options: StoreOptions): Promise<StoreResult> {
        const ingestedAt = this.now();

        const result = await this.repository.transaction(async tx => {
            const storedTrades: Trade[] = [];
            const touched = new Set<string>();
            let duplicates = 0;

            for (const pending of trades) {
                const trade: Trade = {
                    ...pending,
                    ingestedAt,
                    captureDelaySeconds: captureDelaySeconds(pending.blockTimestamp, ingestedAt),
                };

                const inserted = await tx.insertTrade(trade);
                if (!inserted) {
                    duplicates++;
                    continue;
                }
                storedTrades.push(trade);

                if (!isLedgerTrade(trade)) continue;

                const previous = await tx.getPosition(trade.account, trade.assetId);
                await tx.savePosition(applyTrade(previous, trade, this.settings));
                touched.add(positionKey(trade.account, trade.assetId));
            }

            if (options.advanceTo !== undefined) {
                await tx.advanceCursor(options.advanceTo, options.monitorId, ingestedAt);
            }

            return {
                stored: storedTrades.length,
                duplicates,
                positionsUpdated: touched.size,
                storedTrades,
            };
        });

        for (const trade of result.storedTrades) {
            this.logger.info({
                id: trade.id,
                account: trade.account,
                assetId: trade.assetId,
                side: trade.side,
                amount: trade.amount,
                price: trade.price,
                blockNumber: trade.blockNumber,
                captureDelaySeconds: trade.captureDelaySeconds,
                captureDelay: classifyCaptureDelay(trade.captureDelaySeconds),
            }, 'Trade stored');
        }

        if (result.duplicates > 0) {
            this.logger.debug({ duplicates: result.duplicates }, 'Skipped already stored trades');
        }

        await this.notify(result.storedTrades);
        return result;
    }

    private async notify(trades: Trade[]): Promise<void> {
        for (const trade of trades) {
            for (const handler of this.handlers) {
                try {
                    await handler(trade);
                } catch (error) {
                    this.logger.error({ error: serializeError(error), id: trade.id }, 'Trade persisted handler error');
                }
            }
        }
    }
}

// ============================================================================
// Rebuild
// ============================================================================

export interface RebuildResult {
    tradesReplayed: number;
    positionsWritten: number;
}

/**
 * Recompute every position from the stored trades, in chain order, and replace the ledger.
 * Reads and writes in one transaction, so a window committed meanwhile is either
 * part of the replay or applied on top of its result. Backfill marks survive.
 */
export async function rebuildPositions(
    repository: LedgerRepository,
    settings: LedgerSettings,
): Promise<RebuildResult> {
    return repository.transaction(async tx => {
        const trades = await tx.listTradesInChainOrder();
        const backfilled = new Map<string, Date | null>();
        for (const previous of await tx.listPositions()) {
            backfilled.set(positionKey(previous.account, previous.assetId), previous.backfillAttemptedAt);
        }

        const positions = replayTrades(trades, settings);

        await tx.clearPositions();
        for (const [key, position] of positions) {
            await tx.savePosition({ ...position, backfillAttemptedAt: backfilled.get(key) ?? null });
        }

        return { tradesReplayed: trades.length, positionsWritten: positions.size };
    });
}
