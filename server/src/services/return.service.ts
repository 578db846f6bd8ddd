/**
 * Sales Return Service
 *
 * Returns reduce what a party owes on an invoice. A return linked to a line
 * item is valued from that item and follows its price; a manual return
 * carries the amount it was entered with.
 */

import { count as countFn, desc, eq, type SQL } from 'drizzle-orm';
import type { Database } from '../db/types';
import { lineItems, salesReturns, type Document, type LineItem, type SalesReturn } from '../db/schema';
import { getPaginationParams, getSeries } from '../config/app.config';
import { activeWhere, softDeleteValues } from '../utils/soft-delete';
import { computeLinkedReturnAmount, parseMeasure } from '../utils/calculations';
import { dec, Decimal, parsePositiveAmount, toMoney } from '../utils/money';
import { InactiveRecordError, InvalidAmountError, NotFoundError, ValidationError } from '../utils/errors';
import type { Paginated } from '../types/api';
import { allocateNumbered, returnSequence } from './numbering.service';
import { refreshLedger } from './ledger.service';
import { returnedQuantity } from './line-item.service';
import { lockActiveDocument } from './locks';
import { applyStockChanges } from './inventory.service';
import { logger } from '../middleware/logger';

export interface CreateReturnInput {
    documentId: string;
    /** Set for a return of specific goods; omit for a manual amount */
    lineItemId?: string | null;
    quantity?: Decimal.Value;
    amount?: unknown;
    reason?: string | null;
    date: Date;
}

export interface UpdateReturnInput {
    quantity?: Decimal.Value;
    amount?: unknown;
    reason?: string | null;
    date?: Date;
}

export interface ReturnListQuery {
    documentId?: string;
    partyId?: string;
    page?: number;
    limit?: number;
}

export interface ReturnChange {
    salesReturn: SalesReturn;
    document: Document;
}

async function lockInvoice(tx: Database, documentId: string): Promise<Document> {
    const document = await lockActiveDocument(tx, documentId);
    if (document.kind !== 'INVOICE') {
        throw new ValidationError('Returns can only be recorded against an invoice', { documentId, kind: document.kind });
    }
    return document;
}

async function findReturnableItem(tx: Database, document: Document, lineItemId: string): Promise<LineItem> {
    const [item] = await tx.select().from(lineItems).where(eq(lineItems.id, lineItemId));
    if (!item || item.documentId !== document.id) {
        throw new NotFoundError('Line item', lineItemId);
    }
    if (!item.isActive) throw new InactiveRecordError('Line item', lineItemId);
    return item;
}

/**
 * Value of returning `quantity` units of `item`, once the units still
 * returnable are checked.
 */
async function valueLinkedReturn(tx: Database, item: LineItem, quantity: Decimal, excludeReturnId?: string): Promise<Decimal> {
    const returnable = dec(item.quantity).minus(await returnedQuantity(tx, item.id, excludeReturnId));
    if (quantity.gt(returnable)) {
        throw new ValidationError(`Only ${returnable.toFixed()} unit(s) of "${item.description}" remain returnable`, {
            lineItemId: item.id,
            quantity: quantity.toFixed(),
            returnable: returnable.toFixed(),
        });
    }
    return computeLinkedReturnAmount(item, quantity);
}

/** Returns on an invoice may not exceed the value of its active items */
function checkReturnable(amount: Decimal, document: Document, alreadyReturned: Decimal.Value) {
    const available = dec(document.itemsTotal).minus(alreadyReturned);
    if (amount.gt(available)) {
        throw new InvalidAmountError(
            `Return of ${toMoney(amount)} exceeds the returnable value of ${toMoney(available)} on ${document.number}`,
            { documentId: document.id, amount: toMoney(amount), returnable: toMoney(available) }
        );
    }
}

/**
 * Units coming back (positive) or a return being undone (negative) for a
 * line that sold catalogue stock.
 */
async function moveReturnStock(tx: Database, salesReturn: SalesReturn, item: LineItem | null, quantity: Decimal, reason: string) {
    if (!item?.itemId || quantity.isZero()) return;
    await applyStockChanges(
        tx,
        [{ itemId: item.itemId, quantity }],
        'RETURN',
        { type: 'return', id: salesReturn.id, code: salesReturn.number },
        reason
    );
}

function parseReturnQuantity(value: Decimal.Value | undefined): Decimal {
    return parseMeasure(value ?? 1, 'quantity', { places: 3, positive: true });
}

export async function createReturn(db: Database, input: CreateReturnInput): Promise<ReturnChange> {
    const linked = Boolean(input.lineItemId);
    const quantity = parseReturnQuantity(input.quantity);
    const manualAmount = linked ? null : parsePositiveAmount(input.amount);
    const series = getSeries('RETURN', input.date);

    const change = await allocateNumbered(db, returnSequence, series, async (tx, slot) => {
        const document = await lockInvoice(tx, input.documentId);

        let amount: Decimal;
        let item: LineItem | null = null;
        if (input.lineItemId) {
            item = await findReturnableItem(tx, document, input.lineItemId);
            amount = await valueLinkedReturn(tx, item, quantity);
        } else if (manualAmount) {
            amount = manualAmount;
        } else {
            throw new InvalidAmountError('amount is required', { field: 'amount' });
        }
        checkReturnable(amount, document, document.returnAmount);

        const [created] = await tx
            .insert(salesReturns)
            .values({
                series: slot.series,
                sequence: slot.sequence,
                number: slot.number,
                documentId: document.id,
                partyId: document.partyId,
                lineItemId: input.lineItemId ?? null,
                quantity: quantity.toFixed(),
                amount: toMoney(amount),
                reason: input.reason ?? null,
                date: input.date,
            })
            .returning();
        await moveReturnStock(tx, created, item, quantity, `Returned against ${document.number}`);

        const refreshed = await refreshLedger(tx, document.id, { entity: 'return', id: created.id, action: 'created' });
        return { salesReturn: created, document: refreshed.document };
    });

    logger.success(`Return ${change.salesReturn.number} recorded against ${change.document.number}`, {
        returnId: change.salesReturn.id,
        amount: change.salesReturn.amount,
    });
    return change;
}

async function lockReturn(tx: Database, returnId: string): Promise<{ salesReturn: SalesReturn; document: Document }> {
    const [found] = await tx.select({ documentId: salesReturns.documentId }).from(salesReturns).where(eq(salesReturns.id, returnId));
    if (!found) throw new NotFoundError('Return', returnId);

    const document = await lockActiveDocument(tx, found.documentId);

    const [salesReturn] = await tx.select().from(salesReturns).where(eq(salesReturns.id, returnId));
    if (!salesReturn.isActive) throw new InactiveRecordError('Return', returnId);
    return { salesReturn, document };
}

export async function updateReturn(db: Database, returnId: string, patch: UpdateReturnInput): Promise<ReturnChange> {
    return db.transaction(async (tx) => {
        const { salesReturn: current, document } = await lockReturn(tx, returnId);

        let quantity = dec(current.quantity);
        let amount: Decimal;
        let item: LineItem | null = null;
        if (current.lineItemId) {
            if (patch.amount !== undefined) {
                throw new ValidationError('The amount of a return linked to a line item follows its quantity', { returnId });
            }
            quantity = patch.quantity === undefined ? quantity : parseReturnQuantity(patch.quantity);
            item = await findReturnableItem(tx, document, current.lineItemId);
            amount = await valueLinkedReturn(tx, item, quantity, returnId);
        } else {
            amount = patch.amount === undefined ? dec(current.amount) : parsePositiveAmount(patch.amount);
        }
        checkReturnable(amount, document, dec(document.returnAmount).minus(current.amount));

        const [salesReturn] = await tx
            .update(salesReturns)
            .set({
                quantity: quantity.toFixed(),
                amount: toMoney(amount),
                reason: patch.reason === undefined ? current.reason : patch.reason,
                date: patch.date ?? current.date,
                updatedAt: new Date(),
            })
            .where(eq(salesReturns.id, returnId))
            .returning();
        await moveReturnStock(tx, salesReturn, item, quantity.minus(current.quantity), `Return quantity changed on ${document.number}`);

        const refreshed = await refreshLedger(tx, document.id, { entity: 'return', id: returnId, action: 'updated' });
        return { salesReturn, document: refreshed.document };
    });
}

export async function softDeleteReturn(db: Database, returnId: string): Promise<ReturnChange> {
    const change = await db.transaction(async (tx) => {
        const { document } = await lockReturn(tx, returnId);
        const [salesReturn] = await tx.update(salesReturns).set(softDeleteValues()).where(eq(salesReturns.id, returnId)).returning();
        if (salesReturn.lineItemId) {
            const [item] = await tx.select().from(lineItems).where(eq(lineItems.id, salesReturn.lineItemId));
            await moveReturnStock(tx, salesReturn, item ?? null, dec(salesReturn.quantity).negated(), `Return deleted on ${document.number}`);
        }
        const refreshed = await refreshLedger(tx, document.id, { entity: 'return', id: returnId, action: 'deleted' });
        return { salesReturn, document: refreshed.document };
    });

    logger.info(`Return ${change.salesReturn.number} deleted`, { returnId });
    return change;
}

export async function listReturns(db: Database, query: ReturnListQuery = {}): Promise<Paginated<SalesReturn>> {
    const { page, limit, offset } = getPaginationParams(query.page, query.limit);

    const conditions: SQL[] = [];
    if (query.documentId) conditions.push(eq(salesReturns.documentId, query.documentId));
    if (query.partyId) conditions.push(eq(salesReturns.partyId, query.partyId));
    const where = activeWhere(salesReturns, ...conditions);

    const [{ total }] = await db.select({ total: countFn() }).from(salesReturns).where(where);
    const data = await db
        .select()
        .from(salesReturns)
        .where(where)
        .orderBy(desc(salesReturns.date), desc(salesReturns.sequence))
        .limit(limit)
        .offset(offset);

    return {
        data,
        meta: { total, page, limit, totalPages: Math.ceil(total / limit) },
    };
}
