// Health tracking for worker status monitoring
import type { Logger } from 'pino';
import type { LedgerRepository } from '@fillwatch/core';
import { errorMessage } from './errors.js';
import type { AdvanceResult } from './polygon/index.js';
import type { EndpointDescriptor } from './rpc/endpointPool.js';
import { withRetry, type RetryPolicy, type Sleep } from './retry.js';

// Consecutive failed advances before the worker reports itself degraded
const DEGRADED_AFTER_ERRORS = 3;

export interface WorkerHealth {
    startedAt: Date;
    lastAdvanceAt: Date | null;
    totalAdvances: number;
    windowsProcessed: number;
    tradesStored: number;
    duplicates: number;
    decodeFailures: number;
    totalErrors: number;
    consecutiveErrors: number;
    lastError: string | null;
    cursor: number | null;
    head: number | null;
    backlog: number | null;
}

export class HealthTracker {
    private readonly health: WorkerHealth;

    constructor(private readonly now: () => Date = () => new Date()) {
        this.health = {
            startedAt: now(),
            lastAdvanceAt: null,
            totalAdvances: 0,
            windowsProcessed: 0,
            tradesStored: 0,
            duplicates: 0,
            decodeFailures: 0,
            totalErrors: 0,
            consecutiveErrors: 0,
            lastError: null,
            cursor: null,
            head: null,
            backlog: null,
        };
    }

    /**
     * Update after a successful advance
     */
    recordAdvance(result: AdvanceResult): void {
        const h = this.health;
        h.lastAdvanceAt = this.now();
        h.totalAdvances++;
        h.windowsProcessed += result.windowsProcessed;
        h.tradesStored += result.tradesStored;
        h.duplicates += result.duplicates;
        h.decodeFailures += result.decodeFailures;
        h.consecutiveErrors = 0;
        h.cursor = result.newCursor;
        h.head = result.head;
        h.backlog = result.backlog;
    }

    recordError(error: unknown): void {
        this.health.totalErrors++;
        this.health.consecutiveErrors++;
        this.health.lastError = errorMessage(error);
    }

    getWorkerHealth(): WorkerHealth & { isHealthy: boolean } {
        return {
            ...this.health,
            isHealthy: this.health.consecutiveErrors < DEGRADED_AFTER_ERRORS,
        };
    }

    /**
     * Get health summary for logging
     */
    getHealthSummary(endpoints: EndpointDescriptor[] = []) {
        const h = this.getWorkerHealth();
        const nowMs = this.now().getTime();

        return {
            uptime: Math.floor((nowMs - h.startedAt.getTime()) / 1000),
            lastAdvance: h.lastAdvanceAt?.toISOString() ?? 'never',
            advances: h.totalAdvances,
            windows: h.windowsProcessed,
            tradesStored: h.tradesStored,
            duplicates: h.duplicates,
            decodeFailures: h.decodeFailures,
            errors: h.totalErrors,
            consecutiveErrors: h.consecutiveErrors,
            lastError: h.lastError,
            cursor: h.cursor,
            head: h.head,
            backlog: h.backlog,
            isHealthy: h.isHealthy,
            endpoints: endpoints.map(e => ({
                id: e.id,
                maxBlockRange: e.maxBlockRange,
                calls: e.totalCalls,
                failures: e.totalFailures,
                coolingDown: e.cooldownUntil !== null && e.cooldownUntil > nowMs,
            })),
        };
    }

    /**
     * Log health status periodically
     */
    logHealthStatus(logger: Logger, endpoints: EndpointDescriptor[] = []): void {
        const summary = this.getHealthSummary(endpoints);

        if (summary.isHealthy) {
            logger.info(summary, 'Worker health: OK');
        } else {
            logger.warn(summary, 'Worker health: DEGRADED');
        }
    }
}

/**
 * Wait for database to be available with retries
 */
export async function waitForDatabase(
    repository: LedgerRepository,
    logger: Logger,
    policy: Pick<RetryPolicy, 'maxAttempts' | 'delayMs'> = { maxAttempts: 10, delayMs: 2000 },
    sleep?: Sleep,
): Promise<boolean> {
    try {
        await withRetry(
            async attempt => {
                logger.info({ attempt, maxAttempts: policy.maxAttempts }, 'Checking database connection...');
                await repository.ping();
            },
            'database-ping',
            policy,
            { logger, sleep },
        );
        logger.info({ repository: repository.name }, 'Database connection established');
        return true;
    } catch (error) {
        logger.error({ maxAttempts: policy.maxAttempts, error: errorMessage(error) }, 'Failed to connect to database after max attempts');
        return false;
    }
}
