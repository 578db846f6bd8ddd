import { describe, it, expect, beforeAll, beforeEach, afterAll, afterEach, vi } from 'vitest';
import { setupTestDatabase, cleanAllData, teardownTestDatabase } from './setup';
import { createTestChallan, createTestInvoice, createTestParty, item, resetCounters, TEST_DATE } from './helpers/factory';
import type { Database } from '../src/db/types';
import { documents, type Party } from '../src/db/schema';
import {
    allocateNumbered,
    documentSequence,
    paymentSequence,
    type NumberSlot,
    type SequenceSource,
} from '../src/services/numbering.service';
import { softDeleteDocument } from '../src/services/document.service';
import { createPayment } from '../src/services/payment.service';
import { EmptyDocumentError, NotFoundError, NumberGenerationExhausted, ValidationError } from '../src/utils/errors';
import { logger } from '../src/middleware/logger';

let db: Database;
let party: Party;

const insertInvoice = (partyId: string) => async (tx: Database, slot: NumberSlot) => {
    const [doc] = await tx
        .insert(documents)
        .values({
            kind: 'INVOICE',
            series: slot.series,
            sequence: slot.sequence,
            number: slot.number,
            date: TEST_DATE,
            partyId,
        })
        .returning();
    return { doc, attempt: slot.attempt };
};

beforeAll(async () => {
    db = await setupTestDatabase();
});

beforeEach(async () => {
    await cleanAllData();
    resetCounters();
    party = await createTestParty(db);
});

afterEach(() => {
    vi.restoreAllMocks();
});

afterAll(async () => {
    await teardownTestDatabase();
});

describe('sequential numbering', () => {
    it('numbers invoices one after another', async () => {
        const first = await createTestInvoice(db, party.id);
        const second = await createTestInvoice(db, party.id);

        expect(first.number).toBe('INV-000001');
        expect(second.number).toBe('INV-000002');
        expect(second.series).toBe('INV');
        expect(second.sequence).toBe(2);
    });

    it('keeps separate counters per series', async () => {
        const invoice = await createTestInvoice(db, party.id);
        const challan = await createTestChallan(db, party.id);
        const override = await createTestInvoice(db, party.id, undefined, { series: 'EXP' });

        expect(invoice.number).toBe('INV-000001');
        expect(challan.number).toBe('CHN-202603-000001');
        expect(override.number).toBe('EXP-000001');
    });

    it('never reuses the number of a soft-deleted document', async () => {
        await createTestInvoice(db, party.id);
        const second = await createTestInvoice(db, party.id);
        await softDeleteDocument(db, second.id);

        const third = await createTestInvoice(db, party.id);
        expect(third.number).toBe('INV-000003');
    });

    it('does not consume a number when creation fails', async () => {
        await expect(createTestInvoice(db, party.id, [])).rejects.toBeInstanceOf(EmptyDocumentError);
        await expect(
            createTestChallan(db, party.id, [item(1, 10)], { invoiceId: 'missing-invoice' })
        ).rejects.toBeInstanceOf(NotFoundError);

        const invoice = await createTestInvoice(db, party.id);
        const challan = await createTestChallan(db, party.id);
        expect(invoice.number).toBe('INV-000001');
        expect(challan.number).toBe('CHN-202603-000001');
    });

    // The test database runs transactions one at a time; collisions are covered with stale sources below
    it('keeps numbers distinct and gapless when many creations are issued together', async () => {
        const created = await Promise.all(Array.from({ length: 10 }, () => createTestInvoice(db, party.id)));

        const numbers = created.map((doc) => doc.number).sort();
        expect(new Set(numbers).size).toBe(10);
        expect(numbers).toEqual(Array.from({ length: 10 }, (_, i) => `INV-${String(i + 1).padStart(6, '0')}`));
    });

    it('numbers payments by month of the payment date', async () => {
        const invoice = await createTestInvoice(db, party.id);
        const march = await createPayment(db, { documentId: invoice.id, amount: 100, date: TEST_DATE });
        const april = await createPayment(db, { documentId: invoice.id, amount: 100, date: new Date('2026-04-02T00:00:00Z') });

        expect(march.payment.number).toBe('PAY-202603-000001');
        expect(april.payment.number).toBe('PAY-202604-000001');
    });
});

describe('allocateNumbered', () => {
    it('retries with a fresh read after losing the number to another writer', async () => {
        await createTestInvoice(db, party.id);
        const warn = vi.spyOn(logger, 'warn');

        let reads = 0;
        const stale: SequenceSource = {
            ...documentSequence,
            async maxSequence(client, series) {
                reads++;
                return reads === 1 ? 0 : documentSequence.maxSequence(client, series);
            },
        };

        const result = await allocateNumbered(db, stale, 'INV', insertInvoice(party.id));

        expect(result.doc.number).toBe('INV-000002');
        expect(result.attempt).toBe(2);
        expect(reads).toBe(2);
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('gives up after five collisions', async () => {
        await createTestInvoice(db, party.id);
        const error = vi.spyOn(logger, 'error');

        const stuck: SequenceSource = { ...documentSequence, maxSequence: async () => 0 };
        const attempt = allocateNumbered(db, stuck, 'INV', insertInvoice(party.id));

        await expect(attempt).rejects.toBeInstanceOf(NumberGenerationExhausted);
        await expect(attempt).rejects.toMatchObject({ series: 'INV', attempts: 5, statusCode: 409 });
        expect(error).toHaveBeenCalledTimes(1);
    });

    it('honours a smaller attempt budget', async () => {
        await createTestInvoice(db, party.id);
        const stuck: SequenceSource = { ...documentSequence, maxSequence: async () => 0 };

        await expect(
            allocateNumbered(db, stuck, 'INV', insertInvoice(party.id), { maxAttempts: 2 })
        ).rejects.toMatchObject({ attempts: 2 });
    });

    it('propagates errors other than number collisions at once', async () => {
        let reads = 0;
        const counting: SequenceSource = {
            ...documentSequence,
            async maxSequence(client, series) {
                reads++;
                return documentSequence.maxSequence(client, series);
            },
        };

        await expect(
            allocateNumbered(db, counting, 'INV', async () => {
                throw new ValidationError('bad input');
            })
        ).rejects.toBeInstanceOf(ValidationError);
        expect(reads).toBe(1);
    });

    it('does not retry unique violations on constraints it does not own', async () => {
        await createTestInvoice(db, party.id);
        const foreign: SequenceSource = { ...documentSequence, constraints: [], maxSequence: async () => 0 };

        await expect(allocateNumbered(db, foreign, 'INV', insertInvoice(party.id))).rejects.toMatchObject({ code: '23505' });
    });

    it('reads the highest sequence, soft-deleted rows included', async () => {
        const invoice = await createTestInvoice(db, party.id);
        await createPayment(db, { documentId: invoice.id, amount: 10, date: TEST_DATE });
        await softDeleteDocument(db, invoice.id);

        expect(await documentSequence.maxSequence(db, 'INV')).toBe(1);
        expect(await paymentSequence.maxSequence(db, 'PAY-202603')).toBe(1);
        expect(await paymentSequence.maxSequence(db, 'PAY-209912')).toBe(0);
    });
});
