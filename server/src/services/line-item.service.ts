/**
 * Line Item Service
 *
 * Every change re-prices the item, then refreshes its document and party
 * inside the same transaction.
 */

import { and, eq, ne } from 'drizzle-orm';
import type { Database } from '../db/types';
import { lineItems, salesReturns, type Document, type LineItem } from '../db/schema';
import { SERVER_CONFIG } from '../config/app.config';
import { activeWhere, softDeleteValues } from '../utils/soft-delete';
import { computeLineTotal, parseMeasure } from '../utils/calculations';
import { dec, Decimal, sumMoney, toMoney } from '../utils/money';
import { InactiveRecordError, NotFoundError, ValidationError } from '../utils/errors';
import { assertHasActiveItems, lockActiveDocument } from './locks';
import { refreshLedger } from './ledger.service';
import { checkDocumentTotals } from './document-checks';
import { applyStockChanges, assertItemsActive } from './inventory.service';
import { logger } from '../middleware/logger';

export interface LineItemInput {
    /** Catalogue item; invoice lines that carry one move its stock */
    itemId?: string | null;
    description: string;
    quantity: Decimal.Value;
    rate: Decimal.Value;
    taxPercent?: Decimal.Value | null;
    discountPercent?: Decimal.Value | null;
}

export interface LineItemChange {
    lineItem: LineItem;
    document: Document;
}

/**
 * Validated, priced column values for a line item, without its document.
 */
export function priceLineItem(input: LineItemInput) {
    const description = input.description.trim();
    if (!description) {
        throw new ValidationError('description is required', { field: 'description' });
    }

    const { measures } = SERVER_CONFIG;
    const quantity = parseMeasure(input.quantity, 'quantity', { places: 3, positive: true, max: measures.maxQuantity });
    const rate = parseMeasure(input.rate, 'rate', { places: 4, max: measures.maxRate });
    const taxPercent = parseMeasure(input.taxPercent ?? 0, 'taxPercent', { places: 2, max: measures.maxTaxPercent });
    const discountPercent = parseMeasure(input.discountPercent ?? 0, 'discountPercent', {
        places: 2,
        max: measures.maxDiscountPercent,
    });
    const amounts = computeLineTotal({ quantity, rate, taxPercent, discountPercent });
    if (amounts.baseAmount.gt(SERVER_CONFIG.money.maxAmount) || amounts.lineTotal.gt(SERVER_CONFIG.money.maxAmount)) {
        throw new ValidationError(`A line total cannot exceed ${SERVER_CONFIG.money.maxAmount}`, {
            field: 'rate',
            quantity: quantity.toFixed(),
            rate: rate.toFixed(),
        });
    }

    return {
        itemId: input.itemId ?? null,
        description,
        quantity: quantity.toFixed(),
        rate: rate.toFixed(),
        taxPercent: taxPercent.toFixed(),
        discountPercent: discountPercent.toFixed(),
        baseAmount: toMoney(amounts.baseAmount),
        taxAmount: toMoney(amounts.taxAmount),
        discountAmount: toMoney(amounts.discountAmount),
        lineTotal: toMoney(amounts.lineTotal),
    };
}

/** Quantity already handed back through active returns linked to the item */
export async function returnedQuantity(client: Database, lineItemId: string, excludeReturnId?: string): Promise<Decimal> {
    const rows = await client
        .select({ quantity: salesReturns.quantity })
        .from(salesReturns)
        .where(
            activeWhere(
                salesReturns,
                eq(salesReturns.lineItemId, lineItemId),
                excludeReturnId ? ne(salesReturns.id, excludeReturnId) : undefined
            )
        );
    return sumMoney(rows.map((row) => row.quantity));
}

/**
 * Lock the document, then read one of its items under that lock.
 */
async function lockLineItem(tx: Database, documentId: string, lineItemId: string): Promise<{ document: Document; item: LineItem }> {
    const document = await lockActiveDocument(tx, documentId);

    const [item] = await tx
        .select()
        .from(lineItems)
        .where(and(eq(lineItems.id, lineItemId), eq(lineItems.documentId, documentId)));
    if (!item) throw new NotFoundError('Line item', lineItemId);
    if (!item.isActive) throw new InactiveRecordError('Line item', lineItemId);
    return { document, item };
}

/**
 * Move stock for an invoice line. `quantity` is signed: negative sells,
 * positive hands units back.
 */
export async function moveLineStock(tx: Database, document: Document, line: LineItem, quantity: Decimal, reason: string) {
    if (document.kind !== 'INVOICE' || !line.itemId || quantity.isZero()) return;
    await applyStockChanges(
        tx,
        [{ itemId: line.itemId, quantity }],
        'SALE',
        { type: 'line_item', id: line.id, code: document.number },
        reason
    );
}

export async function addLineItem(db: Database, documentId: string, input: LineItemInput): Promise<LineItemChange> {
    const values = priceLineItem(input);

    return db.transaction(async (tx) => {
        const locked = await lockActiveDocument(tx, documentId);
        await assertItemsActive(tx, [values.itemId]);

        const [lineItem] = await tx.insert(lineItems).values({ ...values, documentId }).returning();
        await moveLineStock(tx, locked, lineItem, dec(lineItem.quantity).negated(), `Sold on ${locked.number}`);

        const { document } = await refreshLedger(tx, documentId, { entity: 'line_item', id: lineItem.id, action: 'created' });
        return { lineItem, document: checkDocumentTotals(document) };
    });
}

export async function updateLineItem(
    db: Database,
    documentId: string,
    lineItemId: string,
    patch: Partial<Omit<LineItemInput, 'itemId'>>
): Promise<LineItemChange> {
    return db.transaction(async (tx) => {
        const { document: locked, item: current } = await lockLineItem(tx, documentId, lineItemId);
        const values = priceLineItem({
            itemId: current.itemId,
            description: patch.description ?? current.description,
            quantity: patch.quantity ?? current.quantity,
            rate: patch.rate ?? current.rate,
            taxPercent: patch.taxPercent ?? current.taxPercent,
            discountPercent: patch.discountPercent ?? current.discountPercent,
        });

        const returned = await returnedQuantity(tx, lineItemId);
        if (returned.gt(values.quantity)) {
            throw new ValidationError('Quantity cannot drop below the quantity already returned', {
                lineItemId,
                quantity: values.quantity,
                returned: returned.toFixed(),
            });
        }

        const [lineItem] = await tx
            .update(lineItems)
            .set({ ...values, updatedAt: new Date() })
            .where(eq(lineItems.id, lineItemId))
            .returning();
        await moveLineStock(
            tx,
            locked,
            lineItem,
            dec(current.quantity).minus(lineItem.quantity),
            `Quantity changed on ${locked.number}`
        );

        // Linked return amounts are re-derived from the new price by the ledger
        const { document } = await refreshLedger(tx, documentId, { entity: 'line_item', id: lineItemId, action: 'updated' });
        return { lineItem, document: checkDocumentTotals(document) };
    });
}

/**
 * Retire an item together with the returns linked to it. A document keeps at
 * least one active item; retire the document instead.
 */
export async function softDeleteLineItem(db: Database, documentId: string, lineItemId: string): Promise<LineItemChange> {
    return db.transaction(async (tx) => {
        const { document: locked, item: current } = await lockLineItem(tx, documentId, lineItemId);
        // Units already handed back came in through their returns
        const unreturned = dec(current.quantity).minus(await returnedQuantity(tx, lineItemId));
        const at = new Date();

        const [lineItem] = await tx.update(lineItems).set(softDeleteValues(at)).where(eq(lineItems.id, lineItemId)).returning();
        const cascaded = await tx
            .update(salesReturns)
            .set(softDeleteValues(at))
            .where(and(eq(salesReturns.lineItemId, lineItemId), eq(salesReturns.isActive, true)))
            .returning({ id: salesReturns.id });

        await assertHasActiveItems(tx, documentId);
        await moveLineStock(tx, locked, current, unreturned, `Line removed from ${locked.number}`);

        const { document } = await refreshLedger(tx, documentId, { entity: 'line_item', id: lineItemId, action: 'deleted' });
        checkDocumentTotals(document);
        if (cascaded.length > 0) {
            logger.info(`Retired ${cascaded.length} return(s) linked to line item ${lineItemId}`, {
                documentId,
                returnIds: cascaded.map((r) => r.id),
            });
        }
        return { lineItem, document };
    });
}
