/**
 * Presentation Service
 *
 * Read model for printing a document. Rendering itself (HTML, PDF) sits behind
 * `DocumentRenderer`; this module only decides what goes on the page.
 */

import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '../db/types';
import { lineItems, parties, payments, salesReturns, type Document, type LineItem, type Party, type Payment } from '../db/schema';
import { activeWhere } from '../utils/soft-delete';
import { formatCurrency } from '../utils/money';
import { documentStatus, pickTotals, type DocumentStatus, type DocumentTotals } from './ledger.service';
import { getDocument } from './document.service';

const NOT_AVAILABLE = 'N/A';

export interface ReturnRecord {
    id: string;
    number: string;
    date: Date;
    quantity: string;
    amount: string;
    reason: string | null;
    /** Description of the returned line item; null for a manual return */
    lineItemDescription: string | null;
}

export interface DocumentRecord {
    id: string;
    number: string;
    kind: Document['kind'];
    date: Date;
    /** Null when the party is missing or soft-deleted */
    party: Party | null;
    notes: string | null;
    transportDetails: string | null;
    lineItems: LineItem[];
    payments: Payment[];
    returns: ReturnRecord[];
    totals: DocumentTotals;
    status: DocumentStatus;
}

export interface PrintableDocument {
    title: string;
    number: string;
    date: string;
    status: DocumentStatus;
    party: {
        name: string;
        contactPerson: string;
        phone: string;
        email: string;
        address: string;
    };
    lines: Array<{
        index: number;
        description: string;
        quantity: string;
        rate: string;
        taxPercent: string;
        discountPercent: string;
        amount: string;
    }>;
    returns: Array<{ number: string; item: string; quantity: string; amount: string }>;
    payments: Array<{ number: string; date: string; mode: string; amount: string }>;
    totals: {
        subtotal: string;
        tax: string;
        discount: string;
        itemsTotal: string;
        returns: string;
        total: string;
        paid: string;
        balanceDue: string;
    };
    notes: string;
    transportDetails: string;
}

/** Turns a printable document into a file, e.g. a PDF */
export interface DocumentRenderer {
    readonly contentType: string;
    render(document: PrintableDocument): Promise<Uint8Array>;
}

export async function getDocumentRecord(db: Database, documentId: string): Promise<DocumentRecord> {
    const document = await getDocument(db, documentId, { includeInactive: true });

    const [party] = await db.select().from(parties).where(eq(parties.id, document.partyId));
    const items = await db
        .select()
        .from(lineItems)
        .where(activeWhere(lineItems, eq(lineItems.documentId, documentId)))
        .orderBy(asc(lineItems.createdAt));
    const paid = await db
        .select()
        .from(payments)
        .where(activeWhere(payments, eq(payments.documentId, documentId)))
        .orderBy(asc(payments.date), asc(payments.sequence));
    const returned = await db
        .select({ salesReturn: salesReturns, description: lineItems.description })
        .from(salesReturns)
        .leftJoin(lineItems, and(eq(lineItems.id, salesReturns.lineItemId), eq(lineItems.isActive, true)))
        .where(activeWhere(salesReturns, eq(salesReturns.documentId, documentId)))
        .orderBy(asc(salesReturns.date), asc(salesReturns.sequence));

    return {
        id: document.id,
        number: document.number,
        kind: document.kind,
        date: document.date,
        party: party && party.isActive ? party : null,
        notes: document.notes,
        transportDetails: document.transportDetails,
        lineItems: items,
        payments: paid,
        returns: returned.map(({ salesReturn, description }) => ({
            id: salesReturn.id,
            number: salesReturn.number,
            date: salesReturn.date,
            quantity: salesReturn.quantity,
            amount: salesReturn.amount,
            reason: salesReturn.reason,
            lineItemDescription: description,
        })),
        totals: pickTotals(document),
        status: documentStatus(document),
    };
}

function printDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

function orNA(value: string | null | undefined): string {
    return value && value.trim() ? value : NOT_AVAILABLE;
}

export function toPrintableDocument(record: DocumentRecord): PrintableDocument {
    const { totals } = record;

    return {
        title: record.kind === 'INVOICE' ? 'TAX INVOICE' : 'DELIVERY CHALLAN',
        number: record.number,
        date: printDate(record.date),
        status: record.status,
        party: {
            name: orNA(record.party?.name),
            contactPerson: orNA(record.party?.contactPerson),
            phone: orNA(record.party?.phone),
            email: orNA(record.party?.email),
            address: orNA(record.party?.address),
        },
        lines: record.lineItems.map((item, i) => ({
            index: i + 1,
            description: orNA(item.description),
            quantity: item.quantity,
            rate: formatCurrency(item.rate),
            taxPercent: `${item.taxPercent}%`,
            discountPercent: `${item.discountPercent}%`,
            amount: formatCurrency(item.lineTotal),
        })),
        returns: record.returns.map((ret) => ({
            number: ret.number,
            item: ret.lineItemDescription ?? NOT_AVAILABLE,
            quantity: ret.lineItemDescription === null ? NOT_AVAILABLE : ret.quantity,
            amount: formatCurrency(ret.amount),
        })),
        payments: record.payments.map((payment) => ({
            number: payment.number,
            date: printDate(payment.date),
            mode: payment.mode,
            amount: formatCurrency(payment.amount),
        })),
        totals: {
            subtotal: formatCurrency(totals.baseAmount),
            tax: formatCurrency(totals.taxAmount),
            discount: formatCurrency(totals.discountAmount),
            itemsTotal: formatCurrency(totals.itemsTotal),
            returns: formatCurrency(totals.returnAmount),
            total: formatCurrency(totals.finalAmount),
            paid: formatCurrency(totals.paidAmount),
            balanceDue: formatCurrency(totals.balanceDue),
        },
        notes: orNA(record.notes),
        transportDetails: orNA(record.transportDetails),
    };
}
