// Worker entry point - OrderFilled ingestion loop with graceful shutdown
import 'dotenv/config';
import type { Logger } from 'pino';
import { PgLedgerRepository, TRADE_PERSISTED_CHANNEL, applySchema, createDatabase } from '@fillwatch/db';
import { loadConfig, logConfig } from './config.js';
import { createIngestionContext, type IngestionContext } from './context.js';
import { FatalLoopError, serializeError } from './errors.js';
import { HealthTracker, waitForDatabase } from './health.js';
import { createLogger } from './logger.js';
import { StopSignal, runMonitor } from './monitor.js';

const stopSignal = new StopSignal();
const health = new HealthTracker();

let logger: Logger = createLogger();
let context: IngestionContext | null = null;

/**
 * Main loop with hardening
 */
async function main(): Promise<void> {
    const config = loadConfig();
    logger = createLogger({ level: config.logLevel, pretty: config.logPretty });

    // Log full configuration on startup
    logConfig(logger, config);

    const { pool, db } = createDatabase(config.databaseUrl);
    const repository = new PgLedgerRepository(db, () => pool.end());

    // Wait for database to be available
    const dbReady = await waitForDatabase(repository, logger);
    if (!dbReady) {
        logger.fatal('Cannot start worker without database connection');
        await repository.close();
        process.exitCode = 1;
        return;
    }

    try {
        await applySchema(pool);
    } catch (error) {
        await repository.close();
        throw error;
    }
    logger.info('Database schema ready');

    context = createIngestionContext(config, logger, repository);
    context.ingestor.onTradePersisted(trade => {
        logger.debug({ id: trade.id, assetId: trade.assetId, channel: TRADE_PERSISTED_CHANNEL }, 'Trade persisted');
    });

    const syncState = await repository.getSyncState();
    logger.info({
        cursor: syncState?.lastBlockProcessed ?? null,
        lastUpdate: syncState?.lastUpdateTime.toISOString() ?? null,
        previousMonitor: syncState?.monitorId ?? null,
    }, 'Resuming from sync state');

    try {
        await runMonitor(context, {
            shouldContinue: stopSignal.shouldContinue,
            sleep: stopSignal.sleep,
            health,
        });
    } finally {
        await cleanup();
    }
}

async function cleanup(): Promise<void> {
    if (!context) return;
    const ctx = context;
    context = null;

    ctx.pool.close();
    try {
        await ctx.repository.close();
    } catch (error) {
        logger.error({ error: serializeError(error) }, 'Error closing database pool');
    }

    // Log final health status
    logger.info(health.getHealthSummary(ctx.pool.describe()), 'Final worker health status');
}

/**
 * Graceful shutdown handler
 * The loop finishes the window in flight and exits on its own.
 */
function shutdown(signal: string): void {
    if (stopSignal.isStopped) {
        logger.warn({ signal }, 'Second shutdown signal, exiting now');
        process.exit(1);
    }
    logger.info({ signal }, 'Received shutdown signal');
    stopSignal.stop();
}

// Graceful shutdown handlers
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

// Unhandled rejection handler
process.on('unhandledRejection', (reason) => {
    logger.error({ reason: serializeError(reason) }, 'Unhandled promise rejection');
});

// Uncaught exception handler
process.on('uncaughtException', (error) => {
    logger.fatal({ error: serializeError(error) }, 'Uncaught exception - shutting down');
    process.exit(1);
});

// Start the worker
main().catch((error: unknown) => {
    if (error instanceof FatalLoopError) {
        logger.fatal({ error: serializeError(error) }, 'Too many consecutive failures, stopping ingestion');
    } else {
        logger.fatal({ error: serializeError(error) }, 'Worker crashed');
    }
    process.exitCode = 1;
});
