import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';

export const SCHEMA_SQL_PATH = fileURLToPath(new URL('../../drizzle/0000_billing_core.sql', import.meta.url));

export async function loadSchemaSql(): Promise<string> {
    return readFile(SCHEMA_SQL_PATH, 'utf8');
}
