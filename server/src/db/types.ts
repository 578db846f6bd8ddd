import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema';

/**
 * Any drizzle Postgres handle over the billing schema. Transactions extend
 * the database type, so every service accepts either.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;
