/**
 * Payment Service
 *
 * A payment settles one invoice, or with no document it is a general payment
 * that reduces the party's outstanding directly. A payment against an
 * invoice may not exceed what is still due on it.
 */

import { count as countFn, desc, eq, type SQL } from 'drizzle-orm';
import type { Database } from '../db/types';
import { payments, type Document, type Payment } from '../db/schema';
import { getPaginationParams, getSeries, SERVER_CONFIG, type PaymentMode } from '../config/app.config';
import { activeWhere, softDeleteValues } from '../utils/soft-delete';
import { dec, Decimal, parsePositiveAmount, toMoney } from '../utils/money';
import { InactiveRecordError, InvalidAmountError, NotFoundError, ValidationError } from '../utils/errors';
import type { Paginated } from '../types/api';
import { allocateNumbered, paymentSequence } from './numbering.service';
import { recomputePartyBalance, refreshLedger, type LedgerTrigger } from './ledger.service';
import { lockActiveDocument } from './locks';
import { requireActiveParty } from './party.service';
import { logger } from '../middleware/logger';

export interface CreatePaymentInput {
    /** Required for a general payment; inferred from the document otherwise */
    partyId?: string;
    documentId?: string | null;
    amount?: unknown;
    date: Date;
    mode?: PaymentMode;
    notes?: string | null;
}

export interface UpdatePaymentInput {
    amount?: unknown;
    date?: Date;
    mode?: PaymentMode;
    notes?: string | null;
}

export interface PaymentListQuery {
    partyId?: string;
    documentId?: string;
    page?: number;
    limit?: number;
}

export interface PaymentChange {
    payment: Payment;
    /** Document the payment settles, after its totals were refreshed */
    document: Document | null;
    outstanding: string;
}

async function lockInvoice(tx: Database, documentId: string): Promise<Document> {
    const document = await lockActiveDocument(tx, documentId);
    if (document.kind !== 'INVOICE') {
        throw new ValidationError('Payments can only be recorded against an invoice', { documentId, kind: document.kind });
    }
    return document;
}

function checkAgainstBalance(amount: Decimal, available: Decimal, document: Document) {
    if (amount.gt(available)) {
        throw new InvalidAmountError(
            `Payment of ${toMoney(amount)} exceeds the balance due of ${toMoney(available)} on ${document.number}`,
            { documentId: document.id, amount: toMoney(amount), balanceDue: toMoney(available) }
        );
    }
}

async function settle(tx: Database, payment: Payment, trigger: LedgerTrigger): Promise<PaymentChange> {
    if (payment.documentId) {
        const { document, outstanding } = await refreshLedger(tx, payment.documentId, trigger);
        return { payment, document, outstanding };
    }
    const outstanding = await recomputePartyBalance(tx, payment.partyId, trigger);
    return { payment, document: null, outstanding };
}

export async function createPayment(db: Database, input: CreatePaymentInput): Promise<PaymentChange> {
    const amount = parsePositiveAmount(input.amount);
    if (!input.documentId && !input.partyId) {
        throw new ValidationError('A payment needs a party or an invoice', { field: 'partyId' });
    }
    const series = getSeries('PAYMENT', input.date);

    const change = await allocateNumbered(db, paymentSequence, series, async (tx, slot) => {
        let partyId = input.partyId;

        if (input.documentId) {
            const document = await lockInvoice(tx, input.documentId);
            if (partyId && partyId !== document.partyId) {
                throw new ValidationError('Invoice belongs to another party', { documentId: document.id, partyId });
            }
            partyId = document.partyId;
            checkAgainstBalance(amount, dec(document.balanceDue), document);
        }
        if (!partyId) {
            throw new ValidationError('A payment needs a party or an invoice', { field: 'partyId' });
        }
        await requireActiveParty(tx, partyId);

        const [payment] = await tx
            .insert(payments)
            .values({
                series: slot.series,
                sequence: slot.sequence,
                number: slot.number,
                partyId,
                documentId: input.documentId ?? null,
                date: input.date,
                amount: toMoney(amount),
                mode: input.mode ?? SERVER_CONFIG.payment.defaultMode,
                notes: input.notes ?? null,
            })
            .returning();

        return settle(tx, payment, { entity: 'payment', id: payment.id, action: 'created' });
    });

    logger.success(`Payment ${change.payment.number} recorded`, {
        paymentId: change.payment.id,
        documentId: change.payment.documentId,
        amount: change.payment.amount,
    });
    return change;
}

/**
 * Find a payment, lock its document when it has one, then read it again under the lock.
 */
async function lockPayment(tx: Database, paymentId: string): Promise<{ payment: Payment; document: Document | null }> {
    const [found] = await tx.select({ documentId: payments.documentId }).from(payments).where(eq(payments.id, paymentId));
    if (!found) throw new NotFoundError('Payment', paymentId);

    const document = found.documentId ? await lockActiveDocument(tx, found.documentId) : null;

    const [payment] = await tx.select().from(payments).where(eq(payments.id, paymentId));
    if (!payment.isActive) throw new InactiveRecordError('Payment', paymentId);
    return { payment, document };
}

export async function updatePayment(db: Database, paymentId: string, patch: UpdatePaymentInput): Promise<PaymentChange> {
    return db.transaction(async (tx) => {
        const { payment: current, document } = await lockPayment(tx, paymentId);
        const amount = patch.amount === undefined ? dec(current.amount) : parsePositiveAmount(patch.amount);

        if (document) {
            // The payment's own amount is already counted in balanceDue
            checkAgainstBalance(amount, dec(document.balanceDue).plus(current.amount), document);
        }

        const [payment] = await tx
            .update(payments)
            .set({
                amount: toMoney(amount),
                date: patch.date ?? current.date,
                mode: patch.mode ?? current.mode,
                notes: patch.notes === undefined ? current.notes : patch.notes,
                updatedAt: new Date(),
            })
            .where(eq(payments.id, paymentId))
            .returning();

        return settle(tx, payment, { entity: 'payment', id: paymentId, action: 'updated' });
    });
}

export async function softDeletePayment(db: Database, paymentId: string): Promise<PaymentChange> {
    const change = await db.transaction(async (tx) => {
        await lockPayment(tx, paymentId);
        const [payment] = await tx.update(payments).set(softDeleteValues()).where(eq(payments.id, paymentId)).returning();
        return settle(tx, payment, { entity: 'payment', id: paymentId, action: 'deleted' });
    });

    logger.info(`Payment ${change.payment.number} deleted`, { paymentId });
    return change;
}

export async function getPayment(db: Database, paymentId: string): Promise<Payment> {
    const [payment] = await db.select().from(payments).where(eq(payments.id, paymentId));
    if (!payment) throw new NotFoundError('Payment', paymentId);
    return payment;
}

export async function listPayments(db: Database, query: PaymentListQuery = {}): Promise<Paginated<Payment>> {
    const { page, limit, offset } = getPaginationParams(query.page, query.limit);

    const conditions: SQL[] = [];
    if (query.partyId) conditions.push(eq(payments.partyId, query.partyId));
    if (query.documentId) conditions.push(eq(payments.documentId, query.documentId));
    const where = activeWhere(payments, ...conditions);

    const [{ total }] = await db.select({ total: countFn() }).from(payments).where(where);
    const data = await db
        .select()
        .from(payments)
        .where(where)
        .orderBy(desc(payments.date), desc(payments.sequence))
        .limit(limit)
        .offset(offset);

    return {
        data,
        meta: { total, page, limit, totalPages: Math.ceil(total / limit) },
    };
}
