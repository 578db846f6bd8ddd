import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { eq } from 'drizzle-orm';
import { setupTestDatabase, cleanAllData, teardownTestDatabase } from './setup';
import { createTestChallan, createTestInvoice, createTestParty, item, resetCounters, TEST_DATE } from './helpers/factory';
import type { Database } from '../src/db/types';
import { lineItems, type Party } from '../src/db/schema';
import { getDocumentRecord, toPrintableDocument } from '../src/services/presentation.service';
import { softDeleteDocument } from '../src/services/document.service';
import { softDeleteParty } from '../src/services/party.service';
import { createPayment } from '../src/services/payment.service';
import { createReturn } from '../src/services/return.service';

let db: Database;
let party: Party;

beforeAll(async () => {
    db = await setupTestDatabase();
});

beforeEach(async () => {
    await cleanAllData();
    resetCounters();
    party = await createTestParty(db, { phone: '98200 00000' });
});

afterAll(async () => {
    await teardownTestDatabase();
});

describe('document record', () => {
    it('collects the party, active children and totals', async () => {
        const invoice = await createTestInvoice(db, party.id, [item(1, 100, { taxPercent: 10 })]);
        await createPayment(db, { documentId: invoice.id, amount: 50, date: TEST_DATE });
        await createReturn(db, { documentId: invoice.id, amount: 10, date: TEST_DATE });

        const record = await getDocumentRecord(db, invoice.id);

        expect(record.number).toBe('INV-000001');
        expect(record.party?.id).toBe(party.id);
        expect(record.lineItems).toHaveLength(1);
        expect(record.payments).toHaveLength(1);
        expect(record.returns).toEqual([
            expect.objectContaining({ amount: '10.00', quantity: '1.000', lineItemDescription: null }),
        ]);
        expect(record.totals).toEqual({
            baseAmount: '100.00',
            taxAmount: '10.00',
            discountAmount: '0.00',
            itemsTotal: '110.00',
            returnAmount: '10.00',
            finalAmount: '100.00',
            paidAmount: '50.00',
            balanceDue: '50.00',
            isPaid: false,
        });
        expect(record.status).toBe('UNPAID');
    });

    it('names the returned item of a linked return', async () => {
        const invoice = await createTestInvoice(db, party.id, [item(2, 100)]);
        const [line] = await db.select().from(lineItems).where(eq(lineItems.documentId, invoice.id));
        await createReturn(db, { documentId: invoice.id, lineItemId: line.id, quantity: 1, date: TEST_DATE });

        const printable = toPrintableDocument(await getDocumentRecord(db, invoice.id));
        expect(printable.returns).toEqual([
            { number: 'RET-202603-000001', item: 'Item 2 x 100', quantity: '1.000', amount: '₹100.00' },
        ]);
    });

    it('still reads a soft-deleted document', async () => {
        const invoice = await createTestInvoice(db, party.id);
        await softDeleteDocument(db, invoice.id);

        const record = await getDocumentRecord(db, invoice.id);
        expect(record.status).toBe('SOFT_DELETED');
    });
});

describe('toPrintableDocument', () => {
    it('formats every figure for the template', async () => {
        const invoice = await createTestInvoice(db, party.id, [item(1, 100, { taxPercent: 10 })]);
        await createPayment(db, { documentId: invoice.id, amount: 50, date: TEST_DATE });
        await createReturn(db, { documentId: invoice.id, amount: 10, date: TEST_DATE });

        const printable = toPrintableDocument(await getDocumentRecord(db, invoice.id));

        expect(printable.title).toBe('TAX INVOICE');
        expect(printable.date).toBe('2026-03-15');
        expect(printable.party).toEqual({
            name: 'Test Party 1',
            contactPerson: 'N/A',
            phone: '98200 00000',
            email: 'N/A',
            address: 'N/A',
        });
        expect(printable.lines).toEqual([
            {
                index: 1,
                description: 'Item 1 x 100',
                quantity: '1.000',
                rate: '₹100.00',
                taxPercent: '10.00%',
                discountPercent: '0.00%',
                amount: '₹110.00',
            },
        ]);
        expect(printable.returns).toEqual([{ number: 'RET-202603-000001', item: 'N/A', quantity: 'N/A', amount: '₹10.00' }]);
        expect(printable.payments).toEqual([{ number: 'PAY-202603-000001', date: '2026-03-15', mode: 'Cash', amount: '₹50.00' }]);
        expect(printable.totals).toEqual({
            subtotal: '₹100.00',
            tax: '₹10.00',
            discount: '₹0.00',
            itemsTotal: '₹110.00',
            returns: '₹10.00',
            total: '₹100.00',
            paid: '₹50.00',
            balanceDue: '₹50.00',
        });
        expect(printable.notes).toBe('N/A');
        expect(printable.transportDetails).toBe('N/A');
    });

    it('prints N/A for a party that was deleted', async () => {
        const challan = await createTestChallan(db, party.id, undefined, { transportDetails: 'Tempo MH-04' });
        await softDeleteParty(db, party.id);

        const record = await getDocumentRecord(db, challan.id);
        const printable = toPrintableDocument(record);

        expect(record.party).toBeNull();
        expect(printable.title).toBe('DELIVERY CHALLAN');
        expect(printable.party.name).toBe('N/A');
        expect(printable.party.phone).toBe('N/A');
        expect(printable.transportDetails).toBe('Tempo MH-04');
    });
});
