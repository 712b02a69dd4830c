// Database client - node-postgres pool wrapped by drizzle

import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
    pool: pg.Pool;
    db: Database;
}

export function createDatabase(connectionString: string): DatabaseHandle {
    const pool = new pg.Pool({ connectionString });
    const db = drizzle(pool, { schema });
    return { pool, db };
}
