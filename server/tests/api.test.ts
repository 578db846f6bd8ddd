import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { setupTestDatabase, cleanAllData, teardownTestDatabase } from './setup';
import { createApp } from '../src/app';
import type { Database } from '../src/db/types';
import type { DocumentRenderer, PrintableDocument } from '../src/services/presentation.service';

let db: Database;
let app: Express;

beforeAll(async () => {
    db = await setupTestDatabase();
    app = createApp(db);
});

beforeEach(async () => {
    await cleanAllData();
});

afterAll(async () => {
    await teardownTestDatabase();
});

const createParty = async (name = 'Acme Traders') => {
    const res = await request(app).post('/api/parties').send({ name });
    expect(res.status).toBe(201);
    const party: { id: string; name: string } = res.body.data;
    return party;
};

describe('HTTP API', () => {
    it('answers the health check', async () => {
        const res = await request(app).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
    });

    it('rejects a duplicate party name', async () => {
        await createParty();
        const res = await request(app).post('/api/parties').send({ name: '  Acme Traders ' });

        expect(res.status).toBe(409);
        expect(res.body).toEqual({
            success: false,
            error: { code: 'DUPLICATE_PARTY', message: 'A party named "Acme Traders" already exists', details: { name: 'Acme Traders' } },
        });
    });

    it('creates, pays and prints an invoice', async () => {
        const party = await createParty();

        const created = await request(app)
            .post('/api/documents')
            .send({
                kind: 'INVOICE',
                partyId: party.id,
                date: '2026-03-15',
                items: [{ description: 'PVC pipe', quantity: 1, rate: '100', taxPercent: 10 }],
            });
        expect(created.status).toBe(201);
        expect(created.body.data.number).toBe('INV-000001');
        expect(created.body.data.finalAmount).toBe('110.00');

        const invoiceId: string = created.body.data.id;
        const paid = await request(app)
            .post('/api/payments')
            .send({ documentId: invoiceId, amount: '50', date: '2026-03-16', mode: 'Bank' });
        expect(paid.status).toBe(201);
        expect(paid.body.data.payment.number).toBe('PAY-202603-000001');
        expect(paid.body.data.document.balanceDue).toBe('60.00');
        expect(paid.body.data.outstanding).toBe('60.00');

        const printed = await request(app).get(`/api/documents/${invoiceId}/print`);
        expect(printed.status).toBe(200);
        expect(printed.body.data.party.name).toBe('Acme Traders');
        expect(printed.body.data.totals.balanceDue).toBe('₹60.00');

        const unpaid = await request(app).get(`/api/parties/${party.id}/unpaid-invoices`);
        expect(unpaid.body.data).toHaveLength(1);
    });

    it('answers domain errors with their status and code', async () => {
        const party = await createParty();

        const empty = await request(app)
            .post('/api/documents')
            .send({ kind: 'INVOICE', partyId: party.id, date: '2026-03-15', items: [] });
        expect(empty.status).toBe(422);
        expect(empty.body.error.code).toBe('EMPTY_DOCUMENT');

        const created = await request(app)
            .post('/api/documents')
            .send({ kind: 'INVOICE', partyId: party.id, date: '2026-03-15', items: [{ description: 'Tank', quantity: 1, rate: 10 }] });
        const zero = await request(app)
            .post('/api/payments')
            .send({ documentId: created.body.data.id, amount: 0, date: '2026-03-15' });
        expect(zero.status).toBe(422);
        expect(zero.body.error.code).toBe('INVALID_AMOUNT');

        const missing = await request(app).get('/api/documents/does-not-exist');
        expect(missing.status).toBe(404);
        expect(missing.body.error).toEqual({
            code: 'NOT_FOUND',
            message: 'Document not found',
            details: { entity: 'Document', id: 'does-not-exist' },
        });
    });

    it('reports invalid bodies and unknown routes', async () => {
        const invalid = await request(app).post('/api/documents').send({ kind: 'QUOTE', date: 'not a date', items: [] });
        expect(invalid.status).toBe(400);
        expect(invalid.body.error.code).toBe('VALIDATION_ERROR');

        const badQuery = await request(app).get('/api/documents?page=zero');
        expect(badQuery.status).toBe(400);

        const unknown = await request(app).get('/api/nothing-here');
        expect(unknown.status).toBe(404);
        expect(unknown.body.error.code).toBe('ROUTE_NOT_FOUND');
    });

    it('manages line items under their document', async () => {
        const party = await createParty();
        const created = await request(app)
            .post('/api/documents')
            .send({ kind: 'INVOICE', partyId: party.id, date: '2026-03-15', items: [{ description: 'Tank', quantity: 1, rate: 10 }] });
        const id: string = created.body.data.id;

        const added = await request(app).post(`/api/documents/${id}/items`).send({ description: 'Lid', quantity: 2, rate: 5 });
        expect(added.status).toBe(201);
        expect(added.body.data.document.finalAmount).toBe('20.00');

        const itemId: string = added.body.data.lineItem.id;
        const updated = await request(app).put(`/api/documents/${id}/items/${itemId}`).send({ rate: 7.5 });
        expect(updated.body.data.document.finalAmount).toBe('25.00');

        const removed = await request(app).delete(`/api/documents/${id}/items/${itemId}`);
        expect(removed.body.data.document.finalAmount).toBe('10.00');

        const record = await request(app).get(`/api/documents/${id}`);
        expect(record.body.data.lineItems).toHaveLength(1);
    });

    it('keeps catalogue stock in step with invoices', async () => {
        const party = await createParty();
        const created = await request(app).post('/api/items').send({ name: 'Drip Lateral', rate: '12.5', openingStock: 100 });
        expect(created.status).toBe(201);
        expect(created.body.data.stock).toBe('100.000');
        const itemId: string = created.body.data.id;

        const invoice = await request(app)
            .post('/api/documents')
            .send({
                kind: 'INVOICE',
                partyId: party.id,
                date: '2026-03-15',
                items: [{ itemId, description: 'Drip Lateral', quantity: 40, rate: '12.5' }],
            });
        expect(invoice.status).toBe(201);

        const adjusted = await request(app).post(`/api/items/${itemId}/adjust-stock`).send({ quantity: -70 });
        expect(adjusted.status).toBe(409);
        expect(adjusted.body.error.code).toBe('INSUFFICIENT_STOCK');

        const movements = await request(app).get(`/api/items/${itemId}/movements`);
        expect(movements.body.data.meta.total).toBe(2);

        const fetched = await request(app).get(`/api/items/${itemId}`);
        expect(fetched.body.data.stock).toBe('60.000');
    });

    it('answers out-of-range values and passed limits as client errors', async () => {
        const party = await createParty();

        const tax = await request(app)
            .post('/api/documents')
            .send({ kind: 'INVOICE', partyId: party.id, date: '2026-03-15', items: [{ description: 'Tank', quantity: 1, rate: 10, taxPercent: 10000 }] });
        expect(tax.status).toBe(400);
        expect(tax.body.error.message).toBe('taxPercent cannot exceed 100');

        const limited = await request(app)
            .post('/api/documents')
            .send({
                kind: 'INVOICE',
                partyId: party.id,
                date: '2026-03-15',
                limitEnabled: true,
                limitAmount: '5',
                items: [{ description: 'Tank', quantity: 1, rate: 10 }],
            });
        expect(limited.status).toBe(422);
        expect(limited.body.error.code).toBe('LIMIT_EXCEEDED');
    });

    it('recalculates every ledger on demand', async () => {
        await createParty();
        const res = await request(app).post('/api/maintenance/recalculate-ledgers');

        expect(res.status).toBe(200);
        expect(res.body.data).toEqual({ documents: 0, parties: 1 });
    });

    it('hands printable documents to the configured renderer', async () => {
        const rendered: PrintableDocument[] = [];
        const renderer: DocumentRenderer = {
            contentType: 'application/pdf',
            render: async (document) => {
                rendered.push(document);
                return new Uint8Array([37, 80, 68, 70]);
            },
        };
        const withRenderer = createApp(db, { renderer });

        const party = await createParty();
        const created = await request(withRenderer)
            .post('/api/documents')
            .send({ kind: 'CHALLAN', partyId: party.id, date: '2026-03-15', items: [{ description: 'Tank', quantity: 1, rate: 10 }] });
        const id: string = created.body.data.id;

        const file = await request(withRenderer).get(`/api/documents/${id}/file`);
        expect(file.status).toBe(200);
        expect(file.headers['content-type']).toBe('application/pdf');
        expect(rendered).toHaveLength(1);
        expect(rendered[0].title).toBe('DELIVERY CHALLAN');
        expect(rendered[0].number).toBe('CHN-202603-000001');

        const unavailable = await request(app).get(`/api/documents/${id}/file`);
        expect(unavailable.status).toBe(501);
        expect(unavailable.body.error.code).toBe('RENDERER_UNAVAILABLE');
    });
});
