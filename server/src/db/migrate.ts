import 'dotenv/config';
import { Pool, neonConfig } from '@neondatabase/serverless';
import ws from 'ws';
import { loadSchemaSql, SCHEMA_SQL_PATH } from './schema-sql';
import { logger } from '../middleware/logger';

neonConfig.webSocketConstructor = ws;

async function main() {
    const databaseUrl = process.env.DATABASE_URL;
    if (!databaseUrl) {
        throw new Error('DATABASE_URL not found in environment variables');
    }

    logger.info(`Applying schema from ${SCHEMA_SQL_PATH}`);

    const pool = new Pool({ connectionString: databaseUrl });
    try {
        const started = Date.now();
        await pool.query(await loadSchemaSql());
        logger.db('CREATE TABLE IF NOT EXISTS', 'parties, documents, line_items, payments, sales_returns', Date.now() - started);
    } finally {
        await pool.end();
    }

    logger.success('Migrations complete');
}

main().catch((err: unknown) => {
    logger.error('Migration failed', { error: err });
    process.exit(1);
});
