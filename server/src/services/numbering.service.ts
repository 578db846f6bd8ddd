/**
 * Sequential Numbering Service
 *
 * Hands out `SERIES-000001` style numbers. Each attempt reads the highest
 * sequence in the series, takes the next one and writes the record inside a
 * single transaction. The unique constraints on the numbered table decide who
 * wins a race; the loser retries with a fresh read.
 *
 * Nothing is cached between calls: the series maximum is always read from the
 * table, so restarts and parallel instances see the same state.
 */

import { eq, getTableName, sql } from 'drizzle-orm';
import type { AnyPgColumn, PgTable } from 'drizzle-orm/pg-core';
import type { Database } from '../db/types';
import { documents, payments, salesReturns } from '../db/schema';
import { SERVER_CONFIG } from '../config/app.config';
import { formatDocumentNumber } from '../utils/generateCode';
import { isUniqueViolation, NumberGenerationExhausted } from '../utils/errors';
import { logger } from '../middleware/logger';

/**
 * Lookup over the numbers already taken in a series.
 */
export interface SequenceSource {
    /** Table name, for logs */
    readonly name: string;
    /** Unique constraints whose violation means a concurrent writer took the number */
    readonly constraints: readonly string[];
    /** Highest sequence in the series, soft-deleted rows included; 0 when empty */
    maxSequence(client: Database, series: string): Promise<number>;
}

export interface NumberSlot {
    series: string;
    sequence: number;
    number: string;
    attempt: number;
}

export interface AllocateOptions {
    maxAttempts?: number;
    width?: number;
}

type SequencedTable = PgTable & { series: AnyPgColumn; sequence: AnyPgColumn };

export function tableSequenceSource(table: SequencedTable, constraints: readonly string[]): SequenceSource {
    return {
        name: getTableName(table),
        constraints,
        async maxSequence(client, series) {
            const [row] = await client
                .select({ value: sql<number>`coalesce(max(${table.sequence}), 0)`.mapWith(Number) })
                .from(table)
                .where(eq(table.series, series));
            return row?.value ?? 0;
        },
    };
}

export const documentSequence = tableSequenceSource(documents, [
    'documents_number_unique',
    'documents_series_sequence_unique',
]);

export const paymentSequence = tableSequenceSource(payments, [
    'payments_number_unique',
    'payments_series_sequence_unique',
]);

export const returnSequence = tableSequenceSource(salesReturns, [
    'sales_returns_number_unique',
    'sales_returns_series_sequence_unique',
]);

/**
 * Next free slot in a series, read through `client`.
 * Only meaningful inside the transaction that will write the slot.
 */
export async function nextNumber(
    client: Database,
    source: SequenceSource,
    series: string,
    width: number = SERVER_CONFIG.numbering.sequenceWidth
): Promise<Omit<NumberSlot, 'attempt'>> {
    const sequence = (await source.maxSequence(client, series)) + 1;
    return { series, sequence, number: formatDocumentNumber(series, sequence, width) };
}

/**
 * Run `write` with the next number of `series`, retrying when another writer
 * took that number first. Everything `write` does commits or rolls back with
 * the number.
 *
 * @throws NumberGenerationExhausted when every attempt collided
 */
export async function allocateNumbered<T>(
    db: Database,
    source: SequenceSource,
    series: string,
    write: (tx: Database, slot: NumberSlot) => Promise<T>,
    options: AllocateOptions = {}
): Promise<T> {
    const maxAttempts = options.maxAttempts ?? SERVER_CONFIG.numbering.maxAttempts;
    let lastCollision: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await db.transaction(async (tx) => {
                const slot = await nextNumber(tx, source, series, options.width);
                return write(tx, { ...slot, attempt });
            });
        } catch (error) {
            if (!isUniqueViolation(error, source.constraints)) {
                throw error;
            }
            lastCollision = error;
            logger.warn(`[Numbering] ${series} taken by a concurrent writer`, {
                table: source.name,
                series,
                attempt,
                maxAttempts,
            });
        }
    }

    logger.error(`[Numbering] Gave up on series ${series}`, {
        table: source.name,
        series,
        attempts: maxAttempts,
        error: lastCollision,
    });
    throw new NumberGenerationExhausted(series, maxAttempts, { cause: lastCollision });
}
