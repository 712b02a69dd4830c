// Position ledger - per (account, asset) aggregate derived purely from the trade stream
// applyTrade is a pure reducer: callers own persistence

import type { Position, Trade } from './types.js';
import type { LedgerSettings } from './settings.js';
import { SETTLEMENT_LOSS_PRICE, SETTLEMENT_WIN_PRICE } from './settings.js';
import { divide, toDecimal, toDecimalString } from './decimal.js';

/**
 * The part of a trade the reducer reads. Unknown-side trades never reach it.
 */
export type LedgerTrade = Pick<Trade, 'account' | 'assetId' | 'amount' | 'price' | 'blockTimestamp'> & {
    side: 'buy' | 'sell';
};

export function isLedgerTrade<T extends Pick<Trade, 'side'>>(trade: T): trade is T & { side: 'buy' | 'sell' } {
    return trade.side === 'buy' || trade.side === 'sell';
}

export function positionKey(account: string, assetId: string): string {
    return `${account.toLowerCase()}:${assetId}`;
}

// ============================================================================
// Open Position
// ============================================================================

export function openPosition(account: string, assetId: string, at: Date): Position {
    return {
        account: account.toLowerCase(),
        assetId,
        currentPosition: '0',
        totalBought: '0',
        totalSold: '0',
        averageBuyPrice: null,
        totalBuyValue: '0',
        totalSellValue: '0',
        realizedPnl: '0',
        status: 'active',
        isComplete: true,
        settlementPrice: null,
        settledAt: null,
        backfillAttemptedAt: null,
        firstTradeAt: at,
        lastTradeAt: at,
        tradeCount: 0,
        updatedAt: at,
    };
}

// ============================================================================
// Apply Trade
// ============================================================================

/**
 * Fold one trade into a position.
 *
 * - buy: totals grow, average buy price is the quantity-weighted mean of everything bought so far
 * - sell: realized P&L moves by amount × (price − average buy price)
 * - a sell priced at or beyond a settlement threshold marks the position settled (win at 1, loss at 0),
 *   otherwise a sell that takes an active position to exactly zero closes it
 * - selling more than was ever bought marks the position incomplete for good
 *
 * Totals are never reset, so re-entry after a close or settlement keeps accumulating.
 */
export function applyTrade(
    previous: Position | null,
    trade: LedgerTrade,
    settings: LedgerSettings,
): Position {
    const base = previous ?? openPosition(trade.account, trade.assetId, trade.blockTimestamp);
    const amount = toDecimal(trade.amount);
    const price = toDecimal(trade.price);

    let totalBought = toDecimal(base.totalBought);
    let totalSold = toDecimal(base.totalSold);
    let totalBuyValue = toDecimal(base.totalBuyValue);
    let totalSellValue = toDecimal(base.totalSellValue);
    let realizedPnl = toDecimal(base.realizedPnl);
    let averageBuyPrice = base.averageBuyPrice;
    let status = base.status;
    let isComplete = base.isComplete;
    let settlementPrice = base.settlementPrice;
    let settledAt = base.settledAt;

    switch (trade.side) {
        case 'buy': {
            totalBought = totalBought.plus(amount);
            totalBuyValue = totalBuyValue.plus(amount.times(price));
            if (totalBought.greaterThan(0)) {
                averageBuyPrice = toDecimalString(divide(totalBuyValue, totalBought));
            }

            if (totalBought.minus(totalSold).greaterThan(0)) {
                // re-entry after settlement: the old settlement no longer prices the holding
                status = 'active';
                settlementPrice = null;
                settledAt = null;
            }
            break;
        }

        case 'sell': {
            totalSold = totalSold.plus(amount);
            totalSellValue = totalSellValue.plus(amount.times(price));
            if (averageBuyPrice !== null) {
                realizedPnl = realizedPnl.plus(amount.times(price.minus(averageBuyPrice)));
            }

            const current = totalBought.minus(totalSold);
            if (current.isNegative()) {
                isComplete = false;
            }

            if (price.greaterThanOrEqualTo(settings.settlementWinThreshold)) {
                status = 'settled_win';
                settlementPrice = SETTLEMENT_WIN_PRICE;
                settledAt = trade.blockTimestamp;
            } else if (price.lessThanOrEqualTo(settings.settlementLossThreshold)) {
                status = 'settled_loss';
                settlementPrice = SETTLEMENT_LOSS_PRICE;
                settledAt = trade.blockTimestamp;
            } else if (current.isZero() && base.status === 'active') {
                status = 'closed';
            }
            break;
        }
    }

    return {
        ...base,
        currentPosition: toDecimalString(totalBought.minus(totalSold)),
        totalBought: toDecimalString(totalBought),
        totalSold: toDecimalString(totalSold),
        averageBuyPrice,
        totalBuyValue: toDecimalString(totalBuyValue),
        totalSellValue: toDecimalString(totalSellValue),
        realizedPnl: toDecimalString(realizedPnl),
        status,
        isComplete,
        settlementPrice,
        settledAt,
        lastTradeAt: trade.blockTimestamp,
        tradeCount: base.tradeCount + 1,
        updatedAt: trade.blockTimestamp,
    };
}

// ============================================================================
// Replay
// ============================================================================

/**
 * Rebuild positions from a trade history, in the order given.
 * Unknown-side trades are skipped.
 */
export function replayTrades(
    trades: Iterable<Pick<Trade, 'account' | 'assetId' | 'side' | 'amount' | 'price' | 'blockTimestamp'>>,
    settings: LedgerSettings,
): Map<string, Position> {
    const positions = new Map<string, Position>();

    for (const trade of trades) {
        if (!isLedgerTrade(trade)) continue;
        const key = positionKey(trade.account, trade.assetId);
        positions.set(key, applyTrade(positions.get(key) ?? null, trade, settings));
    }

    return positions;
}

// ============================================================================
// Valuation
// ============================================================================

/**
 * Value of the quantity still held, at the settlement price.
 * Null while the position is unsettled: the ledger has no market price of its own.
 */
export function settledValue(position: Position): string | null {
    if (position.settlementPrice === null) return null;
    return toDecimalString(toDecimal(position.currentPosition).times(position.settlementPrice));
}

/**
 * Sum of settledValue over the positions that have one
 */
export function totalSettledValue(positions: readonly Position[]): string {
    let total = toDecimal('0');
    for (const position of positions) {
        const value = settledValue(position);
        if (value !== null) total = total.plus(value);
    }
    return toDecimalString(total);
}

/**
 * current = bought − sold, the identity every stored position must satisfy
 */
export function hasConsistentTotals(position: Position): boolean {
    return toDecimal(position.totalBought)
        .minus(position.totalSold)
        .equals(position.currentPosition);
}
