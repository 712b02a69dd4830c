/**
 * Log scanner - walks the chain from the sync cursor to the head in bounded windows
 *
 * For each window it asks the endpoint pool for OrderFilled logs of every
 * (exchange × watched account × role), decodes them in chain order, and hands the
 * window to the ingestor together with the window's end block, so trades, positions and
 * the cursor commit as one unit. A failed window leaves the cursor where it was.
 */

import { ethers } from 'ethers';
import type { Logger } from 'pino';
import type { ExecutionStatus, TradeRole } from '@fillwatch/core';
import type { IngestionContext } from '../context.js';
import { RangeExceededError } from '../errors.js';
import type { PendingTrade } from '../ingest/index.js';
import type { RawLog } from '../ports/index.js';
import { ORDER_FILLED_TOPIC, fillWarnings } from './orderFilledDecoder.js';

export const ROLES: readonly TradeRole[] = ['maker', 'taker'];

export interface AdvanceResult {
    tradesFound: number;
    tradesStored: number;
    duplicates: number;
    decodeFailures: number;
    windowsProcessed: number;
    /** Last block fully processed, null if nothing has been processed yet */
    newCursor: number | null;
    head: number;
    /** Blocks between the cursor and the head */
    backlog: number;
    /** Backlog within the catch-up threshold: the caller should wait before the next advance */
    caughtUp: boolean;
}

export interface WindowResult {
    tradesFound: number;
    tradesStored: number;
    duplicates: number;
    decodeFailures: number;
}

export interface ScanResult extends WindowResult {
    windowsProcessed: number;
}

export interface ScanOptions {
    /** Defaults to every watched account */
    accounts?: readonly string[];
}

interface MatchedLog {
    log: RawLog;
    account: string;
    role: TradeRole;
}

/**
 * Topic filter for OrderFilled logs where `account` plays `role`
 * Topic 1 is the order hash (any), 2 the maker, 3 the taker.
 */
export function accountTopics(account: string, role: TradeRole): Array<string | null> {
    const accountTopic = ethers.zeroPadValue(account, 32);
    return role === 'maker'
        ? [ORDER_FILLED_TOPIC, null, accountTopic]
        : [ORDER_FILLED_TOPIC, null, null, accountTopic];
}

interface WindowOptions extends ScanOptions {
    advanceCursor: boolean;
}

function chainOrder(a: MatchedLog, b: MatchedLog): number {
    if (a.log.blockNumber !== b.log.blockNumber) return a.log.blockNumber - b.log.blockNumber;
    return a.log.logIndex - b.log.logIndex;
}

export class LogScanner {
    private readonly logger: Logger;

    constructor(private readonly ctx: IngestionContext) {
        this.logger = ctx.logger.child({ module: 'log-scanner' });
    }

    /**
     * First block to scan: the block after the cursor, else the configured start block,
     * else the head minus the lookback window
     */
    startBlock(head: number, cursor: number | null): number {
        const { config } = this.ctx;
        if (cursor !== null) return cursor + 1;
        if (config.startBlock !== null) return config.startBlock;
        return Math.max(0, head - config.lookbackHours * config.blocksPerHour);
    }

    /**
     * Process up to maxWindowsPerAdvance windows between the cursor and the chain head.
     * `shouldContinue` is checked between windows, never inside one.
     */
    async advance(shouldContinue: () => boolean = () => true): Promise<AdvanceResult> {
        const { config, pool, repository } = this.ctx;

        const head = await pool.getBlockNumber();
        const syncState = await repository.getSyncState();
        let cursor = syncState ? syncState.lastBlockProcessed : null;
        let from = this.startBlock(head, cursor);

        const totals: WindowResult = { tradesFound: 0, tradesStored: 0, duplicates: 0, decodeFailures: 0 };
        let windowsProcessed = 0;

        while (windowsProcessed < config.maxWindowsPerAdvance && from <= head && shouldContinue()) {
            const to = this.windowEnd(from, head);
            const window = await this.tryWindow(from, to, { advanceCursor: true });
            if (!window) continue;

            totals.tradesFound += window.tradesFound;
            totals.tradesStored += window.tradesStored;
            totals.duplicates += window.duplicates;
            totals.decodeFailures += window.decodeFailures;
            windowsProcessed++;
            cursor = to;
            from = to + 1;
        }

        const backlog = Math.max(0, head - (from - 1));

        return {
            ...totals,
            windowsProcessed,
            newCursor: cursor,
            head,
            backlog,
            caughtUp: backlog <= config.catchUpThreshold,
        };
    }

    /**
     * Walk [from, to] window by window without moving the cursor, for history behind it.
     * Unlike advance() there is no window budget; `shouldContinue` is checked between windows.
     */
    async scanRange(
        from: number,
        to: number,
        options: ScanOptions = {},
        shouldContinue: () => boolean = () => true,
    ): Promise<ScanResult> {
        const totals: ScanResult = { tradesFound: 0, tradesStored: 0, duplicates: 0, decodeFailures: 0, windowsProcessed: 0 };

        let next = from;
        while (next <= to && shouldContinue()) {
            const end = this.windowEnd(next, to);
            const window = await this.tryWindow(next, end, { ...options, advanceCursor: false });
            if (!window) continue;

            totals.tradesFound += window.tradesFound;
            totals.tradesStored += window.tradesStored;
            totals.duplicates += window.duplicates;
            totals.decodeFailures += window.decodeFailures;
            totals.windowsProcessed++;
            next = end + 1;
        }

        return totals;
    }

    private windowEnd(from: number, last: number): number {
        const size = Math.max(1, Math.min(this.ctx.config.batchSize, this.ctx.pool.maxBlockRange()));
        return Math.min(from + size - 1, last);
    }

    /**
     * processWindow, or null when the endpoint rejected the span and the caller should re-plan
     */
    private async tryWindow(from: number, to: number, options: WindowOptions): Promise<WindowResult | null> {
        try {
            return await this.processWindow(from, to, options);
        } catch (error) {
            if (error instanceof RangeExceededError && to > from) {
                this.logger.info({
                    fromBlock: from,
                    toBlock: to,
                    maxBlockRange: error.maxBlockRange,
                }, 'Window too wide for endpoint, re-planning');
                return null;
            }
            throw error;
        }
    }

    /**
     * Scan, decode and store [from, to], committing `to` as the cursor when asked. Throws if any query fails; nothing is committed then.
     */
    private async processWindow(from: number, to: number, options: WindowOptions): Promise<WindowResult> {
        const { config, pool, decoder, ingestor } = this.ctx;
        const accounts = options.accounts ?? config.watchedAccounts;

        const matches: MatchedLog[] = [];
        for (const variant of decoder.registry.list()) {
            for (const account of accounts) {
                for (const role of ROLES) {
                    const logs = await pool.getLogs({
                        address: variant.address,
                        topics: accountTopics(account, role),
                        fromBlock: from,
                        toBlock: to,
                    });
                    for (const log of logs) {
                        matches.push({ log, account, role });
                    }
                }
            }
        }

        matches.sort(chainOrder);

        const pending: PendingTrade[] = [];
        const seen = new Set<string>();
        const blockTimes = new Map<number, Date>();
        const receipts = new Map<string, { gasUsed: string | null; gasPrice: string | null; status: ExecutionStatus }>();
        let decodeFailures = 0;

        for (const { log, account, role } of matches) {
            const result = decoder.decodeFill(log, account, role);
            const fill = result.fill;

            // An account trading against itself matches both role queries
            if (seen.has(fill.id)) continue;
            seen.add(fill.id);

            if (!result.ok) {
                decodeFailures++;
                this.logger.warn({
                    ...result.error.context,
                    account,
                    role,
                    txHash: log.transactionHash,
                    logIndex: log.logIndex,
                    blockNumber: log.blockNumber,
                    error: result.error.message,
                }, 'Could not decode OrderFilled log, storing as unknown');
            }

            for (const warning of fillWarnings(fill)) {
                this.logger.warn({ id: fill.id, account, warning }, 'Suspicious fill values');
            }

            let blockTimestamp = blockTimes.get(log.blockNumber);
            if (!blockTimestamp) {
                blockTimestamp = new Date((await pool.getBlockTimestamp(log.blockNumber)) * 1000);
                blockTimes.set(log.blockNumber, blockTimestamp);
            }

            const txKey = log.transactionHash.toLowerCase();
            let execution = receipts.get(txKey);
            if (!execution) {
                const receipt = await pool.getReceipt(log.transactionHash);
                execution = {
                    gasUsed: receipt ? receipt.gasUsed.toString() : null,
                    gasPrice: receipt && receipt.gasPrice !== null ? receipt.gasPrice.toString() : null,
                    status: receipt?.status === 0 ? 'failed' : 'success',
                };
                receipts.set(txKey, execution);
            }

            pending.push({
                ...fill,
                blockTimestamp,
                gasUsed: execution.gasUsed,
                gasPrice: execution.gasPrice,
                executionStatus: execution.status,
            });
        }

        const stored = await ingestor.store(pending, {
            advanceTo: options.advanceCursor ? to : undefined,
            monitorId: config.monitorId,
        });

        const summary = {
            fromBlock: from,
            toBlock: to,
            endpoint: pool.activeEndpoint().id,
            tradesFound: pending.length,
            tradesStored: stored.stored,
            duplicates: stored.duplicates,
            decodeFailures,
        };
        if (pending.length > 0) {
            this.logger.info(summary, 'Window processed');
        } else {
            this.logger.debug(summary, 'Window processed');
        }

        return {
            tradesFound: pending.length,
            tradesStored: stored.stored,
            duplicates: stored.duplicates,
            decodeFailures,
        };
    }
}
