/**
 * Document Service
 *
 * Invoices and delivery challans. A document is numbered, written with its
 * items and priced in one transaction; the number is never reused, even after
 * the document is deleted.
 */

import { and, count as countFn, desc, eq, gt, lte, type SQL } from 'drizzle-orm';
import type { Database } from '../db/types';
import { documents, lineItems, payments, salesReturns, type Document } from '../db/schema';
import { getPaginationParams, getSeries, type DocumentKind } from '../config/app.config';
import { activeWhere, softDeleteValues } from '../utils/soft-delete';
import { EmptyDocumentError, NotFoundError, ValidationError } from '../utils/errors';
import type { Paginated } from '../types/api';
import { allocateNumbered, documentSequence } from './numbering.service';
import { recomputePartyBalance, refreshLedger, type DocumentStatus } from './ledger.service';
import { moveLineStock, priceLineItem, returnedQuantity, type LineItemInput } from './line-item.service';
import { checkDocumentTotals, resolveLimit } from './document-checks';
import { assertItemsActive } from './inventory.service';
import { dec } from '../utils/money';
import { assertHasActiveItems, lockActiveDocument } from './locks';
import { requireActiveParty } from './party.service';
import { logger } from '../middleware/logger';

export interface CreateDocumentInput {
    kind: DocumentKind;
    partyId: string;
    date: Date;
    /** Overrides the configured series for the kind */
    series?: string;
    /** Challans only: the invoice the delivery belongs to */
    invoiceId?: string | null;
    notes?: string | null;
    transportDetails?: string | null;
    /** Invoices only: refuse items totalling more than `limitAmount` */
    limitEnabled?: boolean;
    limitAmount?: unknown;
    items: LineItemInput[];
}

export interface UpdateDocumentInput {
    partyId?: string;
    date?: Date;
    invoiceId?: string | null;
    notes?: string | null;
    transportDetails?: string | null;
    limitEnabled?: boolean;
    limitAmount?: unknown;
}

export interface DocumentListQuery {
    kind?: DocumentKind;
    partyId?: string;
    status?: Exclude<DocumentStatus, 'SOFT_DELETED'>;
    page?: number;
    limit?: number;
}

async function checkInvoiceLink(client: Database, kind: DocumentKind, partyId: string, invoiceId: string | null | undefined) {
    if (!invoiceId) return;
    if (kind !== 'CHALLAN') {
        throw new ValidationError('Only a challan can be linked to an invoice', { invoiceId });
    }

    const [invoice] = await client
        .select({ partyId: documents.partyId, kind: documents.kind })
        .from(documents)
        .where(activeWhere(documents, eq(documents.id, invoiceId)));

    if (!invoice || invoice.kind !== 'INVOICE') {
        throw new NotFoundError('Invoice', invoiceId);
    }
    if (invoice.partyId !== partyId) {
        throw new ValidationError('Linked invoice belongs to another party', { invoiceId, partyId });
    }
}

export async function createDocument(db: Database, input: CreateDocumentInput): Promise<Document> {
    if (input.items.length === 0) {
        throw new EmptyDocumentError();
    }
    const priced = input.items.map(priceLineItem);
    const limit = resolveLimit(input.kind, input.limitEnabled, input.limitAmount);
    const series = input.series ?? getSeries(input.kind, input.date);

    const document = await allocateNumbered(db, documentSequence, series, async (tx, slot) => {
        await requireActiveParty(tx, input.partyId);
        await checkInvoiceLink(tx, input.kind, input.partyId, input.invoiceId);
        await assertItemsActive(tx, priced.map((values) => values.itemId));

        const [created] = await tx
            .insert(documents)
            .values({
                kind: input.kind,
                series: slot.series,
                sequence: slot.sequence,
                number: slot.number,
                date: input.date,
                partyId: input.partyId,
                invoiceId: input.invoiceId ?? null,
                notes: input.notes ?? null,
                transportDetails: input.transportDetails ?? null,
                ...limit,
            })
            .returning();

        const lines = await tx
            .insert(lineItems)
            .values(priced.map((values) => ({ ...values, documentId: created.id })))
            .returning();
        await assertHasActiveItems(tx, created.id);
        for (const line of lines) {
            await moveLineStock(tx, created, line, dec(line.quantity).negated(), `Sold on ${created.number}`);
        }

        const { document } = await refreshLedger(tx, created.id, { entity: 'document', id: created.id, action: 'created' });
        return checkDocumentTotals(document);
    });

    logger.success(`${document.kind} ${document.number} created`, {
        documentId: document.id,
        partyId: document.partyId,
        finalAmount: document.finalAmount,
    });
    return document;
}

/**
 * Header changes only. Number, series and kind are fixed once issued. Moving
 * a document to another party moves its payments and returns with it.
 */
export async function updateDocument(db: Database, documentId: string, patch: UpdateDocumentInput): Promise<Document> {
    return db.transaction(async (tx) => {
        const current = await lockActiveDocument(tx, documentId);
        const partyId = patch.partyId ?? current.partyId;

        if (partyId !== current.partyId) {
            await requireActiveParty(tx, partyId);
        }
        if (patch.invoiceId !== undefined || partyId !== current.partyId) {
            await checkInvoiceLink(tx, current.kind, partyId, patch.invoiceId === undefined ? current.invoiceId : patch.invoiceId);
        }
        const limit =
            patch.limitEnabled === undefined && patch.limitAmount === undefined
                ? { limitEnabled: current.limitEnabled, limitAmount: current.limitAmount }
                : resolveLimit(current.kind, patch.limitEnabled ?? current.limitEnabled, patch.limitAmount ?? current.limitAmount);

        await tx
            .update(documents)
            .set({
                partyId,
                date: patch.date ?? current.date,
                invoiceId: patch.invoiceId === undefined ? current.invoiceId : patch.invoiceId,
                notes: patch.notes === undefined ? current.notes : patch.notes,
                transportDetails: patch.transportDetails === undefined ? current.transportDetails : patch.transportDetails,
                ...limit,
                updatedAt: new Date(),
            })
            .where(eq(documents.id, documentId));

        if (partyId !== current.partyId) {
            const moved = { partyId, updatedAt: new Date() };
            await tx.update(payments).set(moved).where(eq(payments.documentId, documentId));
            await tx.update(salesReturns).set(moved).where(eq(salesReturns.documentId, documentId));
        }

        const trigger = { entity: 'document', id: documentId, action: 'updated' } as const;
        const { document } = await refreshLedger(tx, documentId, trigger);
        if (partyId !== current.partyId) {
            await recomputePartyBalance(tx, current.partyId, trigger);
        }
        return checkDocumentTotals(document);
    });
}

/**
 * Retire a document. Its items, payments and returns keep their state but no
 * longer count toward the party balance. Units an invoice sold and that were
 * not returned go back to stock.
 */
export async function softDeleteDocument(db: Database, documentId: string): Promise<Document> {
    const document = await db.transaction(async (tx) => {
        const locked = await lockActiveDocument(tx, documentId);

        const lines = await tx.select().from(lineItems).where(activeWhere(lineItems, eq(lineItems.documentId, documentId)));
        for (const line of lines) {
            const unreturned = dec(line.quantity).minus(await returnedQuantity(tx, line.id));
            await moveLineStock(tx, locked, line, unreturned, `${locked.number} deleted`);
        }

        const [retired] = await tx.update(documents).set(softDeleteValues()).where(eq(documents.id, documentId)).returning();
        await recomputePartyBalance(tx, retired.partyId, { entity: 'document', id: documentId, action: 'deleted' });
        return retired;
    });

    logger.info(`${document.kind} ${document.number} deleted`, { documentId });
    return document;
}

export async function getDocument(db: Database, documentId: string, options: { includeInactive?: boolean } = {}): Promise<Document> {
    const [document] = await db.select().from(documents).where(eq(documents.id, documentId));
    if (!document || (!document.isActive && !options.includeInactive)) {
        throw new NotFoundError('Document', documentId);
    }
    return document;
}

export async function listDocuments(db: Database, query: DocumentListQuery = {}): Promise<Paginated<Document>> {
    const { page, limit, offset } = getPaginationParams(query.page, query.limit);

    const conditions: SQL[] = [];
    if (query.kind) conditions.push(eq(documents.kind, query.kind));
    if (query.partyId) conditions.push(eq(documents.partyId, query.partyId));
    if (query.status === 'PAID') conditions.push(lte(documents.balanceDue, '0'));
    if (query.status === 'UNPAID') conditions.push(gt(documents.balanceDue, '0'));
    const where = activeWhere(documents, and(...conditions));

    const [{ total }] = await db.select({ total: countFn() }).from(documents).where(where);
    const data = await db
        .select()
        .from(documents)
        .where(where)
        .orderBy(desc(documents.date), desc(documents.sequence))
        .limit(limit)
        .offset(offset);

    return {
        data,
        meta: { total, page, limit, totalPages: Math.ceil(total / limit) },
    };
}
