/**
 * Ledger Service
 *
 * Owns every derived monetary figure: document totals, balance due, paid flag
 * and party outstanding. Callers run these inside the transaction of the
 * change that triggered them, so totals and children commit together.
 *
 * finalAmount = Σ active line totals − Σ active returns
 * balanceDue  = finalAmount − Σ active payments, isPaid when balanceDue <= 0
 * outstanding = Σ balanceDue of active invoices − Σ active general payments
 */

import { and, eq, isNull } from 'drizzle-orm';
import type { Database } from '../db/types';
import { documents, lineItems, parties, payments, salesReturns, type Document, type LineItem } from '../db/schema';
import { activeWhere } from '../utils/soft-delete';
import { dec, sumMoney, toMoney, ZERO } from '../utils/money';
import { computeLinkedReturnAmount } from '../utils/calculations';
import { AggregationFailure, AppError, InvalidAmountError, NotFoundError } from '../utils/errors';
import { SERVER_CONFIG } from '../config/app.config';
import { logger } from '../middleware/logger';

export type LedgerEntity = 'document' | 'line_item' | 'payment' | 'return' | 'party' | 'maintenance';
export type LedgerAction = 'created' | 'updated' | 'deleted' | 'recalculated';

/** Which change asked for the recompute; logged with any failure */
export interface LedgerTrigger {
    entity: LedgerEntity;
    id: string;
    action: LedgerAction;
}

export type DocumentStatus = 'PAID' | 'UNPAID' | 'SOFT_DELETED';

export interface DocumentTotals {
    baseAmount: string;
    taxAmount: string;
    discountAmount: string;
    itemsTotal: string;
    returnAmount: string;
    finalAmount: string;
    paidAmount: string;
    balanceDue: string;
    isPaid: boolean;
}

export function documentStatus(document: Pick<Document, 'isActive' | 'isPaid'>): DocumentStatus {
    if (!document.isActive) return 'SOFT_DELETED';
    return document.isPaid ? 'PAID' : 'UNPAID';
}

export function pickTotals(document: Document): DocumentTotals {
    return {
        baseAmount: document.baseAmount,
        taxAmount: document.taxAmount,
        discountAmount: document.discountAmount,
        itemsTotal: document.itemsTotal,
        returnAmount: document.returnAmount,
        finalAmount: document.finalAmount,
        paidAmount: document.paidAmount,
        balanceDue: document.balanceDue,
        isPaid: document.isPaid,
    };
}

/**
 * Row lock on a party for a balance write. NO KEY UPDATE leaves the KEY SHARE
 * locks that child inserts take through their foreign keys unblocked.
 */
export function lockPartyRow(client: Database, partyId: string) {
    return client.select({ id: parties.id }).from(parties).where(eq(parties.id, partyId)).for('no key update');
}

function failure(message: string, error: unknown, details: Record<string, unknown>): AppError {
    logger.error(message, { ...details, error });
    if (error instanceof AppError) return error;
    return new AggregationFailure(message, details, { cause: error });
}

/**
 * Re-derive amounts of active returns that point at a line item, persisting
 * any that drifted after the item was edited. Returns their sum plus the
 * manual returns.
 */
async function settleReturns(client: Database, documentId: string, itemsById: Map<string, LineItem>) {
    const returns = await client
        .select()
        .from(salesReturns)
        .where(activeWhere(salesReturns, eq(salesReturns.documentId, documentId)));

    let total = ZERO;
    for (const ret of returns) {
        let amount = dec(ret.amount);
        const item = ret.lineItemId ? itemsById.get(ret.lineItemId) : undefined;

        if (item) {
            const derived = computeLinkedReturnAmount(item, ret.quantity);
            if (!derived.eq(amount)) {
                await client
                    .update(salesReturns)
                    .set({ amount: toMoney(derived), updatedAt: new Date() })
                    .where(eq(salesReturns.id, ret.id));
                amount = derived;
            }
        }
        total = total.plus(amount);
    }
    return total;
}

/**
 * Recompute and store a document's totals from its active children.
 * Idempotent: a second call with no change in between writes the same figures.
 *
 * @throws AggregationFailure on any unexpected error, after logging it
 */
export async function recomputeDocumentTotals(client: Database, documentId: string, trigger: LedgerTrigger): Promise<Document> {
    try {
        const items = await client
            .select()
            .from(lineItems)
            .where(activeWhere(lineItems, eq(lineItems.documentId, documentId)));

        const itemsTotal = sumMoney(items.map((item) => item.lineTotal));
        if (itemsTotal.gt(SERVER_CONFIG.money.maxAmount)) {
            throw new InvalidAmountError(`Items total cannot exceed ${SERVER_CONFIG.money.maxAmount}`, {
                documentId,
                itemsTotal: toMoney(itemsTotal),
            });
        }
        const returnAmount = await settleReturns(client, documentId, new Map(items.map((item) => [item.id, item])));

        const paid = await client
            .select({ amount: payments.amount })
            .from(payments)
            .where(activeWhere(payments, eq(payments.documentId, documentId)));
        const paidAmount = sumMoney(paid.map((p) => p.amount));

        const finalAmount = itemsTotal.minus(returnAmount);
        const balanceDue = finalAmount.minus(paidAmount);

        const [updated] = await client
            .update(documents)
            .set({
                baseAmount: toMoney(sumMoney(items.map((item) => item.baseAmount))),
                taxAmount: toMoney(sumMoney(items.map((item) => item.taxAmount))),
                discountAmount: toMoney(sumMoney(items.map((item) => item.discountAmount))),
                itemsTotal: toMoney(itemsTotal),
                returnAmount: toMoney(returnAmount),
                finalAmount: toMoney(finalAmount),
                paidAmount: toMoney(paidAmount),
                balanceDue: toMoney(balanceDue),
                isPaid: balanceDue.lte(0),
                updatedAt: new Date(),
            })
            .where(eq(documents.id, documentId))
            .returning();

        if (!updated) {
            throw new NotFoundError('Document', documentId);
        }

        logger.debug(`[Ledger] Document ${updated.number} totals`, {
            documentId,
            trigger,
            finalAmount: updated.finalAmount,
            balanceDue: updated.balanceDue,
        });
        return updated;
    } catch (error) {
        throw failure(`[Ledger] Recompute failed for document ${documentId}`, error, { documentId, trigger });
    }
}

/**
 * Recompute and store a party's running balance.
 *
 * @throws AggregationFailure on any unexpected error, after logging it
 */
export async function recomputePartyBalance(client: Database, partyId: string, trigger: LedgerTrigger): Promise<string> {
    try {
        // Lock first so concurrent recomputes for the party read each other's commits
        const [party] = await lockPartyRow(client, partyId);
        if (!party) {
            throw new NotFoundError('Party', partyId);
        }

        const invoices = await client
            .select({ balanceDue: documents.balanceDue })
            .from(documents)
            .where(activeWhere(documents, eq(documents.partyId, partyId), eq(documents.kind, 'INVOICE')));

        const generalPayments = await client
            .select({ amount: payments.amount })
            .from(payments)
            .where(activeWhere(payments, and(eq(payments.partyId, partyId), isNull(payments.documentId))));

        const outstanding = sumMoney(invoices.map((inv) => inv.balanceDue)).minus(
            sumMoney(generalPayments.map((p) => p.amount))
        );

        const [updated] = await client
            .update(parties)
            .set({ outstanding: toMoney(outstanding), updatedAt: new Date() })
            .where(eq(parties.id, partyId))
            .returning({ outstanding: parties.outstanding });

        logger.debug(`[Ledger] Party ${partyId} outstanding ${updated.outstanding}`, { partyId, trigger });
        return updated.outstanding;
    } catch (error) {
        throw failure(`[Ledger] Balance recompute failed for party ${partyId}`, error, { partyId, trigger });
    }
}

/**
 * Document totals, then the owning party's balance.
 */
export async function refreshLedger(client: Database, documentId: string, trigger: LedgerTrigger) {
    const document = await recomputeDocumentTotals(client, documentId, trigger);
    const outstanding = await recomputePartyBalance(client, document.partyId, trigger);
    return { document, outstanding };
}

/**
 * Rebuild every derived figure from the child records. Repairs drift left by
 * writes that bypassed the services.
 */
export async function recalculateAllLedgers(db: Database): Promise<{ documents: number; parties: number }> {
    return db.transaction(async (tx) => {
        const activeDocuments = await tx.select({ id: documents.id }).from(documents).where(activeWhere(documents));
        for (const doc of activeDocuments) {
            await recomputeDocumentTotals(tx, doc.id, { entity: 'maintenance', id: doc.id, action: 'recalculated' });
        }

        const allParties = await tx.select({ id: parties.id }).from(parties);
        for (const party of allParties) {
            await recomputePartyBalance(tx, party.id, { entity: 'maintenance', id: party.id, action: 'recalculated' });
        }

        logger.success(`[Ledger] Recalculated ${activeDocuments.length} documents and ${allParties.length} parties`);
        return { documents: activeDocuments.length, parties: allParties.length };
    });
}
