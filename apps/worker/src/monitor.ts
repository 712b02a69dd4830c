/**
 * Monitor loop - drives the scanner until told to stop
 *
 * Catch-up: advance again at once while the backlog is above the threshold.
 * Steady state: sleep the poll interval between advances.
 * On failure: sleep twice the poll interval; give up with FatalLoopError once
 * maxConsecutiveErrors failures happen in a row.
 */

import type { IngestionContext } from './context.js';
import { FatalLoopError, serializeError } from './errors.js';
import { HealthTracker } from './health.js';
import { LogScanner } from './polygon/index.js';
import { sleep as defaultSleep, type Sleep } from './retry.js';

export interface MonitorOptions {
    /** Checked between iterations and between windows */
    shouldContinue: () => boolean;
    sleep?: Sleep;
    now?: () => number;
    scanner?: Pick<LogScanner, 'advance'>;
    health?: HealthTracker;
}

export interface MonitorSummary {
    iterations: number;
    tradesStored: number;
}

// ============================================================================
// Stop signal
// ============================================================================

/**
 * Cooperative stop flag whose sleep() returns early once stop() is called
 */
export class StopSignal {
    private stopped = false;
    private readonly wakers = new Set<() => void>();

    get isStopped(): boolean {
        return this.stopped;
    }

    stop(): void {
        this.stopped = true;
        for (const wake of this.wakers) wake();
        this.wakers.clear();
    }

    readonly shouldContinue = (): boolean => !this.stopped;

    readonly sleep: Sleep = ms => {
        if (this.stopped) return Promise.resolve();
        return new Promise(resolve => {
            const wake = () => {
                clearTimeout(timer);
                this.wakers.delete(wake);
                resolve();
            };
            const timer = setTimeout(wake, ms);
            this.wakers.add(wake);
        });
    };
}

// ============================================================================
// Loop
// ============================================================================

export async function runMonitor(ctx: IngestionContext, options: MonitorOptions): Promise<MonitorSummary> {
    const { config } = ctx;
    const logger = ctx.logger.child({ module: 'monitor' });
    const scanner = options.scanner ?? new LogScanner(ctx);
    const health = options.health ?? new HealthTracker();
    const sleep = options.sleep ?? defaultSleep;
    const now = options.now ?? Date.now;

    let consecutiveErrors = 0;
    let iterations = 0;
    let tradesStored = 0;
    let lastHealthLog = now();

    logger.info({
        accounts: config.watchedAccounts.length,
        exchanges: ctx.decoder.registry.list().map(v => v.variant),
        pollIntervalMs: config.pollIntervalMs,
        catchUpThreshold: config.catchUpThreshold,
    }, 'Monitor starting');

    while (options.shouldContinue()) {
        iterations++;
        let delayMs: number;

        try {
            const result = await scanner.advance(options.shouldContinue);
            consecutiveErrors = 0;
            health.recordAdvance(result);
            tradesStored += result.tradesStored;

            const summary = {
                windows: result.windowsProcessed,
                tradesFound: result.tradesFound,
                tradesStored: result.tradesStored,
                duplicates: result.duplicates,
                decodeFailures: result.decodeFailures,
                cursor: result.newCursor,
                head: result.head,
                backlog: result.backlog,
                mode: result.caughtUp ? 'steady' : 'catch-up',
            };
            if (result.tradesStored > 0 || !result.caughtUp) {
                logger.info(summary, 'Advance complete');
            } else {
                logger.debug(summary, 'Advance complete');
            }

            delayMs = result.caughtUp ? config.pollIntervalMs : 0;
        } catch (error) {
            consecutiveErrors++;
            health.recordError(error);

            logger.error({
                error: serializeError(error),
                consecutiveErrors,
                maxConsecutiveErrors: config.maxConsecutiveErrors,
                endpoint: ctx.pool.activeEndpoint().id,
            }, 'Advance failed');

            if (consecutiveErrors >= config.maxConsecutiveErrors) {
                throw new FatalLoopError(consecutiveErrors, error);
            }

            delayMs = config.pollIntervalMs * 2;
        }

        const current = now();
        if (current - lastHealthLog >= config.healthLogIntervalMs) {
            health.logHealthStatus(logger, ctx.pool.describe());
            lastHealthLog = current;
        }

        if (delayMs > 0 && options.shouldContinue()) {
            await sleep(delayMs);
        }
    }

    logger.info({ iterations, tradesStored }, 'Monitor stopped');
    return { iterations, tradesStored };
}
