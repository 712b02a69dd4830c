// Rebuild script - recomputes every position from the stored trades
// Run with: npx tsx scripts/rebuild-positions.ts

import 'dotenv/config';
import { buildLedgerSettings } from '@fillwatch/core';
import { openPgRepository } from '@fillwatch/db';
import { rebuildPositions } from '@fillwatch/worker/ingest';

async function main() {
    const databaseUrl = process.env.DATABASE_URL;
    if (!databaseUrl) {
        throw new Error('DATABASE_URL is not set');
    }

    const settings = buildLedgerSettings({
        ...(process.env.SETTLEMENT_WIN_THRESHOLD ? { settlementWinThreshold: Number(process.env.SETTLEMENT_WIN_THRESHOLD) } : {}),
        ...(process.env.SETTLEMENT_LOSS_THRESHOLD ? { settlementLossThreshold: Number(process.env.SETTLEMENT_LOSS_THRESHOLD) } : {}),
    });

    const repository = await openPgRepository(databaseUrl, { migrate: true });

    try {
        console.log('Starting position rebuild...');
        const result = await rebuildPositions(repository, settings);
        console.log(`Rebuild complete: ${result.tradesReplayed} trades replayed, ${result.positionsWritten} positions written`);

        const incomplete = await repository.listIncompletePositions();
        if (incomplete.length > 0) {
            console.log(`\n${incomplete.length} incomplete positions (more sold than bought, earlier buys missing):`);
            for (const p of incomplete) {
                console.log(`  ${p.account} ${p.assetId}  bought=${p.totalBought} sold=${p.totalSold} current=${p.currentPosition}`);
            }
        }
    } finally {
        await repository.close();
    }
}

main().catch(error => {
    console.error('Rebuild failed:', error);
    process.exitCode = 1;
});
