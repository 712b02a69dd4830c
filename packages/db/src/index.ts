// Database package - drizzle schema, the Postgres ledger repository and an in-process one for tests

import type { LedgerRepository } from '@fillwatch/core';
import { createDatabase } from './client.js';
import { applySchema } from './migrate.js';
import { PgLedgerRepository } from './pgRepository.js';

export * from './schema.js';
export { createDatabase, type Database, type DatabaseHandle } from './client.js';
export { applySchema, readSchemaSql } from './migrate.js';
export { PgLedgerRepository, TRADE_PERSISTED_CHANNEL, fromTradeRow, toTradeRow, fromPositionRow, toPositionRow } from './pgRepository.js';
export { MemoryLedgerRepository, type TradePersistedListener } from './memoryRepository.js';

export interface OpenRepositoryOptions {
    /** Create missing tables before returning */
    migrate?: boolean;
}

/**
 * Connect to Postgres and return a repository that owns the pool
 */
export async function openPgRepository(
    connectionString: string,
    options: OpenRepositoryOptions = {},
): Promise<LedgerRepository> {
    const { pool, db } = createDatabase(connectionString);
    if (options.migrate) {
        try {
            await applySchema(pool);
        } catch (err) {
            await pool.end();
            throw err;
        }
    }
    return new PgLedgerRepository(db, () => pool.end());
}
