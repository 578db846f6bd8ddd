// Fix DNS resolution for Neon - force IPv4 first
import dns from 'dns';
dns.setDefaultResultOrder('ipv4first');

import 'dotenv/config';
import { sql } from 'drizzle-orm';
import { SERVER_CONFIG } from './config/app.config';
import { db } from './db/index';
import { createApp } from './app';
import { logger } from './middleware/logger';

const app = createApp(db);
const PORT = SERVER_CONFIG.server.port;

app.listen(PORT, async () => {
    logger.info(`Billing server listening on port ${PORT}`, {
        environment: SERVER_CONFIG.server.env,
        api: `http://localhost:${PORT}${SERVER_CONFIG.server.apiPrefix}`,
    });

    // Proactive DB Connection Check
    try {
        await db.execute(sql`SELECT 1`);
        logger.success('Database connected successfully');
    } catch (error) {
        logger.error('Database connection failed', { error });
    }
});
