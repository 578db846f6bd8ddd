import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle } from 'drizzle-orm/neon-serverless';
import * as schema from './schema';
import ws from 'ws';
import type { Database } from './types';

// Configure WebSocket for Node environment
neonConfig.webSocketConstructor = ws;

// Neon serverless Pool: transactions need a session, which the HTTP driver does not give
const pool = new Pool({ connectionString: process.env.DATABASE_URL });

export const db: Database = drizzle(pool, { schema });

export type { Database } from './types';
