import { and, eq, type SQL } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';

interface SoftDeletable {
    isActive: AnyPgColumn;
}

/** WHERE clause keeping only live rows of a soft-deletable table */
export function activeWhere(table: SoftDeletable, ...conditions: (SQL | undefined)[]): SQL | undefined {
    return and(eq(table.isActive, true), ...conditions);
}

/** Column values that retire a row; soft delete is one-way */
export function softDeleteValues(at: Date = new Date()) {
    return { isActive: false, deletedAt: at, updatedAt: at };
}
