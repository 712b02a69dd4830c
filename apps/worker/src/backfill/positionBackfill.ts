/**
 * Position backfill - looks for the buys an incomplete position is missing
 *
 * A position goes incomplete when the ledger saw more sold than bought, usually because
 * the buys happened before the first scanned block. For each such position:
 * - scan a bounded range before the position's first stored trade for the account's fills
 * - store what turns up without touching the sync cursor
 * Found trades arrive behind later ones, so the ledger is then replayed in chain order,
 * and every position that was looked at is marked so it is not picked again.
 */

import type { Logger } from 'pino';
import { positionKey, type Position } from '@fillwatch/core';
import type { IngestionContext } from '../context.js';
import { errorMessage, serializeError } from '../errors.js';
import { rebuildPositions } from '../ingest/index.js';
import { LogScanner } from '../polygon/index.js';

export interface BackfillOptions {
    /** Checked between windows and between positions */
    shouldContinue?: () => boolean;
    now?: () => Date;
}

/**
 * Result of the backfill for a single position
 */
export interface PositionBackfillResult {
    account: string;
    assetId: string;
    fromBlock: number;
    toBlock: number;
    tradesFound: number;
    tradesStored: number;
    /** Complete again after the replay */
    completed: boolean;
    error?: string;
}

export interface BackfillResult {
    positions: PositionBackfillResult[];
    tradesStored: number;
    rebuilt: boolean;
    errors: number;
}

export async function backfillPositions(
    ctx: IngestionContext,
    options: BackfillOptions = {},
    scanner: Pick<LogScanner, 'scanRange'> = new LogScanner(ctx),
): Promise<BackfillResult> {
    const { config, repository } = ctx;
    const logger: Logger = ctx.logger.child({ module: 'backfill' });
    const shouldContinue = options.shouldContinue ?? (() => true);
    const now = options.now ?? (() => new Date());

    const incomplete = await repository.listIncompletePositions();
    if (incomplete.length === 0) {
        logger.info('No incomplete positions to backfill');
        return { positions: [], tradesStored: 0, rebuilt: false, errors: 0 };
    }

    const lookbackBlocks = config.backfillLookbackHours * config.blocksPerHour;
    logger.info({ positions: incomplete.length, lookbackBlocks }, 'Starting position backfill');

    const results: PositionBackfillResult[] = [];
    const attempted: Position[] = [];

    for (const position of incomplete) {
        if (!shouldContinue()) break;

        const [first] = await repository.listTrades({
            account: position.account,
            assetId: position.assetId,
            limit: 1,
        });
        const toBlock = first ? first.blockNumber - 1 : -1;
        const fromBlock = Math.max(0, toBlock - lookbackBlocks + 1);
        const result: PositionBackfillResult = {
            account: position.account,
            assetId: position.assetId,
            fromBlock,
            toBlock,
            tradesFound: 0,
            tradesStored: 0,
            completed: false,
        };
        results.push(result);

        if (toBlock < fromBlock) {
            logger.warn({ account: position.account, assetId: position.assetId }, 'Nothing before the first trade to scan');
            attempted.push(position);
            continue;
        }

        logger.info({
            account: position.account,
            assetId: position.assetId,
            totalBought: position.totalBought,
            totalSold: position.totalSold,
            fromBlock,
            toBlock,
        }, 'Backfilling position');

        try {
            const scanned = await scanner.scanRange(fromBlock, toBlock, { accounts: [position.account] }, shouldContinue);
            result.tradesFound = scanned.tradesFound;
            result.tradesStored = scanned.tradesStored;
            // a stop mid-range is not an attempt
            if (shouldContinue()) attempted.push(position);
        } catch (error) {
            result.error = errorMessage(error);
            logger.error({
                error: serializeError(error),
                account: position.account,
                assetId: position.assetId,
                fromBlock,
                toBlock,
            }, 'Backfill scan failed, position left for the next run');
        }
    }

    const tradesStored = results.reduce((sum, r) => sum + r.tradesStored, 0);
    const rebuilt = tradesStored > 0;
    if (rebuilt) {
        const rebuild = await rebuildPositions(repository, ctx.ledger);
        logger.info({ ...rebuild, tradesStored }, 'Ledger replayed with backfilled trades');
    }

    const attemptedAt = now();
    const completed = await repository.transaction(async tx => {
        const done = new Set<string>();
        for (const position of attempted) {
            const current = await tx.getPosition(position.account, position.assetId);
            if (!current) continue;
            if (current.isComplete) done.add(positionKey(current.account, current.assetId));
            await tx.savePosition({ ...current, backfillAttemptedAt: attemptedAt });
        }
        return done;
    });

    for (const result of results) {
        result.completed = completed.has(positionKey(result.account, result.assetId));
    }

    const summary = {
        positionsProcessed: results.length,
        completed: completed.size,
        stillIncomplete: attempted.length - completed.size,
        tradesStored,
        errors: results.filter(r => r.error !== undefined).length,
    };
    logger.info(summary, 'Position backfill complete');

    return { positions: results, tradesStored, rebuilt, errors: summary.errors };
}
