// Applies sql/schema.sql. Every statement is IF NOT EXISTS so this runs on each start.

import { readFile } from 'node:fs/promises';
import type pg from 'pg';

const SCHEMA_FILE = new URL('../sql/schema.sql', import.meta.url);

export async function readSchemaSql(): Promise<string> {
    return readFile(SCHEMA_FILE, 'utf8');
}

export async function applySchema(pool: pg.Pool): Promise<void> {
    const ddl = await readSchemaSql();
    await pool.query(ddl);
}
