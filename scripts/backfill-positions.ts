// Backfill script - scans before each incomplete position for the buys it is missing
// Run with: npx tsx scripts/backfill-positions.ts

import 'dotenv/config';
import { openPgRepository } from '@fillwatch/db';
import { backfillPositions } from '@fillwatch/worker/backfill';
import { loadConfig } from '@fillwatch/worker/config';
import { createIngestionContext } from '@fillwatch/worker/context';
import { createLogger } from '@fillwatch/worker/logger';
import { StopSignal } from '@fillwatch/worker/monitor';

async function main() {
    const config = loadConfig();
    const logger = createLogger({ name: 'fillwatch-backfill', level: config.logLevel, pretty: config.logPretty });
    const repository = await openPgRepository(config.databaseUrl, { migrate: true });
    const ctx = createIngestionContext(config, logger, repository);

    const stopSignal = new StopSignal();
    process.on('SIGINT', () => stopSignal.stop());

    try {
        console.log(`Starting position backfill (${config.backfillLookbackHours}h before each position's first trade)...`);
        const result = await backfillPositions(ctx, { shouldContinue: stopSignal.shouldContinue });

        for (const p of result.positions) {
            const outcome = p.error ? `failed: ${p.error}` : p.completed ? 'complete' : 'still incomplete';
            console.log(`  ${p.account} ${p.assetId}  blocks ${p.fromBlock}-${p.toBlock}  found=${p.tradesFound} stored=${p.tradesStored}  ${outcome}`);
        }
        console.log(`\nBackfill complete: ${result.positions.length} positions, ${result.tradesStored} trades stored, ${result.errors} errors`);
        if (result.rebuilt) console.log('Positions were rebuilt from the stored trades');
        if (stopSignal.isStopped) console.log('Stopped early, unfinished positions are picked again next run');
    } finally {
        ctx.pool.close();
        await repository.close();
    }
}

main().catch(error => {
    console.error('Backfill failed:', error);
    process.exitCode = 1;
});
