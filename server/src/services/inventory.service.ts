/**
 * Inventory Service
 *
 * Item catalogue and stock. Every change to an item's stock writes a
 * stock_movements row with the running balance, in the transaction of the
 * invoice, return or adjustment that caused it.
 *
 * Movement Types:
 * - SALE: invoice lines (out), and lines reduced or retired (back in)
 * - RETURN: returns linked to an invoice line (in), and their reversal (out)
 * - ADJUSTMENT: manual corrections and opening stock
 */

import { asc, count as countFn, desc, eq, ilike, inArray } from 'drizzle-orm';
import type { Database } from '../db/types';
import { items, stockMovements, type Item, type StockMovement } from '../db/schema';
import { getPaginationParams, SERVER_CONFIG, type StockMovementType, type StockReferenceType } from '../config/app.config';
import { activeWhere, softDeleteValues } from '../utils/soft-delete';
import { parseMeasure } from '../utils/calculations';
import { dec, Decimal } from '../utils/money';
import { AppError, InactiveRecordError, InsufficientStockError, NotFoundError, ValidationError, isUniqueViolation } from '../utils/errors';
import type { Paginated } from '../types/api';
import { logger } from '../middleware/logger';

// ============================================================
// TYPE DEFINITIONS
// ============================================================

export interface ItemInput {
    name: string;
    hsnCode?: string | null;
    unit?: string;
    rate?: Decimal.Value;
    taxPercent?: Decimal.Value;
    /** Recorded as an ADJUSTMENT movement */
    openingStock?: Decimal.Value;
}

export type UpdateItemInput = Partial<Omit<ItemInput, 'openingStock'>>;

export interface ItemListQuery {
    search?: string;
    page?: number;
    limit?: number;
}

export interface StockReference {
    type: StockReferenceType;
    id: string | null;
    /** Human-readable code, e.g. the invoice number */
    code: string;
}

/** Signed quantity: negative takes stock out, positive puts it back */
export interface StockChange {
    itemId: string;
    quantity: Decimal;
}

const ITEM_NAME_CONSTRAINTS = ['items_name_unique'] as const;

class DuplicateItemError extends AppError {
    constructor(name: string) {
        super(`An item named "${name}" already exists`, 409, 'DUPLICATE_ITEM', { name });
    }
}

function priceItem(input: UpdateItemInput) {
    return {
        ...(input.rate !== undefined && {
            rate: parseMeasure(input.rate, 'rate', { places: 4, max: SERVER_CONFIG.measures.maxRate }).toFixed(),
        }),
        ...(input.taxPercent !== undefined && {
            taxPercent: parseMeasure(input.taxPercent, 'taxPercent', { places: 2, max: SERVER_CONFIG.measures.maxTaxPercent }).toFixed(),
        }),
    };
}

// ============================================================
// STOCK MOVEMENTS
// ============================================================

/**
 * Apply stock changes, one movement per item. Items are locked in id order so
 * two writers touching the same items cannot deadlock.
 */
export async function applyStockChanges(
    tx: Database,
    changes: StockChange[],
    movementType: StockMovementType,
    reference: StockReference,
    reason: string
): Promise<StockMovement[]> {
    const byItem = new Map<string, Decimal>();
    for (const change of changes) {
        byItem.set(change.itemId, (byItem.get(change.itemId) ?? dec(0)).plus(change.quantity));
    }

    const movements: StockMovement[] = [];
    for (const itemId of [...byItem.keys()].sort()) {
        const quantity = byItem.get(itemId) ?? dec(0);
        if (quantity.isZero()) continue;

        const [item] = await tx.select().from(items).where(eq(items.id, itemId)).for('no key update');
        if (!item) throw new NotFoundError('Item', itemId);
        if (!item.isActive && movementType === 'SALE' && quantity.isNegative()) {
            throw new InactiveRecordError('Item', itemId);
        }

        const balance = dec(item.stock).plus(quantity);
        if (balance.isNegative()) {
            throw new InsufficientStockError(item.name, dec(item.stock).toFixed(), quantity.negated().toFixed());
        }
        if (balance.gt(SERVER_CONFIG.measures.maxQuantity)) {
            throw new ValidationError(`Stock of "${item.name}" cannot exceed ${SERVER_CONFIG.measures.maxQuantity}`, { itemId });
        }

        await tx.update(items).set({ stock: balance.toFixed(), updatedAt: new Date() }).where(eq(items.id, itemId));
        const [movement] = await tx
            .insert(stockMovements)
            .values({
                itemId,
                movementType,
                quantityIn: quantity.isPositive() ? quantity.toFixed() : '0',
                quantityOut: quantity.isNegative() ? quantity.negated().toFixed() : '0',
                runningBalance: balance.toFixed(),
                referenceType: reference.type,
                referenceCode: reference.code,
                referenceId: reference.id,
                reason,
            })
            .returning();
        movements.push(movement);

        logger.debug(`[Stock] ${item.name} ${quantity.isPositive() ? '+' : ''}${quantity.toFixed()} -> ${balance.toFixed()}`, {
            itemId,
            movementType,
            reference: reference.code,
        });
    }
    return movements;
}

/**
 * Lines may only point at active catalogue items.
 */
export async function assertItemsActive(client: Database, itemIds: Array<string | null | undefined>): Promise<void> {
    const ids = [...new Set(itemIds.filter((id): id is string => Boolean(id)))];
    if (ids.length === 0) return;

    const found = await client.select({ id: items.id, isActive: items.isActive }).from(items).where(inArray(items.id, ids));
    for (const id of ids) {
        const row = found.find((candidate) => candidate.id === id);
        if (!row) throw new NotFoundError('Item', id);
        if (!row.isActive) throw new InactiveRecordError('Item', id);
    }
}

// ============================================================
// CATALOGUE
// ============================================================

export async function createItem(db: Database, input: ItemInput): Promise<Item> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('name is required', { field: 'name' });
    const openingStock =
        input.openingStock === undefined
            ? dec(0)
            : parseMeasure(input.openingStock, 'openingStock', { places: 3, max: SERVER_CONFIG.measures.maxQuantity });

    try {
        const item = await db.transaction(async (tx) => {
            const [created] = await tx
                .insert(items)
                .values({
                    name,
                    hsnCode: input.hsnCode ?? null,
                    unit: input.unit ?? SERVER_CONFIG.inventory.defaultUnit,
                    ...priceItem(input),
                })
                .returning();

            if (openingStock.isZero()) return created;
            await applyStockChanges(
                tx,
                [{ itemId: created.id, quantity: openingStock }],
                'ADJUSTMENT',
                { type: 'adjustment', id: null, code: 'OPENING' },
                'Opening stock'
            );
            const [stocked] = await tx.select().from(items).where(eq(items.id, created.id));
            return stocked;
        });

        logger.success(`Item created: ${item.name}`, { itemId: item.id, stock: item.stock });
        return item;
    } catch (error) {
        if (isUniqueViolation(error, ITEM_NAME_CONSTRAINTS)) {
            throw new DuplicateItemError(name);
        }
        throw error;
    }
}

async function requireActiveItem(client: Database, itemId: string): Promise<Item> {
    const [item] = await client.select().from(items).where(eq(items.id, itemId));
    if (!item) throw new NotFoundError('Item', itemId);
    if (!item.isActive) throw new InactiveRecordError('Item', itemId);
    return item;
}

export async function updateItem(db: Database, itemId: string, patch: UpdateItemInput): Promise<Item> {
    await requireActiveItem(db, itemId);
    const name = patch.name?.trim();
    if (name === '') throw new ValidationError('name is required', { field: 'name' });

    try {
        const [item] = await db
            .update(items)
            .set({
                ...(name !== undefined && { name }),
                ...(patch.hsnCode !== undefined && { hsnCode: patch.hsnCode }),
                ...(patch.unit !== undefined && { unit: patch.unit }),
                ...priceItem(patch),
                updatedAt: new Date(),
            })
            .where(eq(items.id, itemId))
            .returning();
        return item;
    } catch (error) {
        if (name && isUniqueViolation(error, ITEM_NAME_CONSTRAINTS)) {
            throw new DuplicateItemError(name);
        }
        throw error;
    }
}

/**
 * Retire an item. Existing lines keep pointing at it and may still hand stock
 * back; new sales of it are refused.
 */
export async function softDeleteItem(db: Database, itemId: string): Promise<Item> {
    await requireActiveItem(db, itemId);
    const [item] = await db.update(items).set(softDeleteValues()).where(eq(items.id, itemId)).returning();
    logger.info(`Item deleted: ${item.name}`, { itemId });
    return item;
}

export async function getItem(db: Database, itemId: string): Promise<Item> {
    const [item] = await db.select().from(items).where(eq(items.id, itemId));
    if (!item) throw new NotFoundError('Item', itemId);
    return item;
}

export async function listItems(db: Database, query: ItemListQuery = {}): Promise<Paginated<Item>> {
    const { page, limit, offset } = getPaginationParams(query.page, query.limit);
    const where = activeWhere(items, query.search ? ilike(items.name, `%${query.search}%`) : undefined);

    const [{ total }] = await db.select({ total: countFn() }).from(items).where(where);
    const data = await db.select().from(items).where(where).orderBy(asc(items.name)).limit(limit).offset(offset);

    return {
        data,
        meta: { total, page, limit, totalPages: Math.ceil(total / limit) },
    };
}

/**
 * Manual correction of an item's stock by a signed quantity.
 */
export async function adjustStock(
    db: Database,
    itemId: string,
    input: { quantity: Decimal.Value; reason?: string | null }
): Promise<{ item: Item; movement: StockMovement }> {
    let quantity: Decimal;
    try {
        quantity = new Decimal(input.quantity).toDecimalPlaces(3, Decimal.ROUND_HALF_UP);
    } catch {
        throw new ValidationError('quantity must be a number', { field: 'quantity' });
    }
    if (!quantity.isFinite()) {
        throw new ValidationError('quantity must be a number', { field: 'quantity' });
    }
    if (quantity.isZero()) {
        throw new ValidationError('quantity must not be zero', { field: 'quantity' });
    }
    if (quantity.abs().gt(SERVER_CONFIG.measures.maxQuantity)) {
        throw new ValidationError(`quantity cannot exceed ${SERVER_CONFIG.measures.maxQuantity}`, { field: 'quantity' });
    }

    return db.transaction(async (tx) => {
        await requireActiveItem(tx, itemId);
        const [movement] = await applyStockChanges(
            tx,
            [{ itemId, quantity }],
            'ADJUSTMENT',
            { type: 'adjustment', id: null, code: 'MANUAL' },
            input.reason?.trim() || 'Manual adjustment'
        );
        const [item] = await tx.select().from(items).where(eq(items.id, itemId));
        return { item, movement };
    });
}

export async function listStockMovements(
    db: Database,
    itemId: string,
    query: { page?: number; limit?: number } = {}
): Promise<Paginated<StockMovement>> {
    await getItem(db, itemId);
    const { page, limit, offset } = getPaginationParams(query.page, query.limit);
    const where = eq(stockMovements.itemId, itemId);

    const [{ total }] = await db.select({ total: countFn() }).from(stockMovements).where(where);
    const data = await db
        .select()
        .from(stockMovements)
        .where(where)
        .orderBy(desc(stockMovements.createdAt))
        .limit(limit)
        .offset(offset);

    return {
        data,
        meta: { total, page, limit, totalPages: Math.ceil(total / limit) },
    };
}
