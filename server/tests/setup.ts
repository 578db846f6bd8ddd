/**
 * In-process PostgreSQL for the test suites. Each test file boots its own
 * PGlite instance with the production schema file applied.
 */

import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import * as schema from '../src/db/schema';
import { loadSchemaSql } from '../src/db/schema-sql';
import type { Database } from '../src/db/types';

let client: PGlite | null = null;
let db: Database | null = null;

export async function setupTestDatabase(): Promise<Database> {
    client = new PGlite();
    await client.exec(await loadSchemaSql());
    db = drizzle(client, { schema });
    return db;
}

export function getTestDb(): Database {
    if (!db) throw new Error('setupTestDatabase() has not run');
    return db;
}

/** Raw client, for statements drizzle does not model (renaming tables, forcing drift) */
export function getTestClient(): PGlite {
    if (!client) throw new Error('setupTestDatabase() has not run');
    return client;
}

export async function cleanAllData(): Promise<void> {
    await getTestClient().exec('TRUNCATE stock_movements, sales_returns, payments, line_items, documents, items, parties');
}

export async function teardownTestDatabase(): Promise<void> {
    await client?.close();
    client = null;
    db = null;
}
