import type { Database } from '../../src/db/types';
import { createParty, type PartyInput } from '../../src/services/party.service';
import { createDocument, type CreateDocumentInput } from '../../src/services/document.service';
import type { LineItemInput } from '../../src/services/line-item.service';
import { createItem, type ItemInput } from '../../src/services/inventory.service';

export const TEST_DATE = new Date('2026-03-15T10:00:00.000Z');

let partyCounter = 0;
let itemCounter = 0;

export function resetCounters() {
    partyCounter = 0;
    itemCounter = 0;
}

export async function createTestParty(db: Database, overrides: Partial<PartyInput> = {}) {
    partyCounter++;
    return createParty(db, { name: `Test Party ${partyCounter}`, ...overrides });
}

export const item = (quantity: number | string, rate: number | string, extra: Partial<LineItemInput> = {}): LineItemInput => ({
    description: `Item ${quantity} x ${rate}`,
    quantity,
    rate,
    ...extra,
});

export async function createTestInvoice(
    db: Database,
    partyId: string,
    items: LineItemInput[] = [item(1, 1000)],
    overrides: Partial<CreateDocumentInput> = {}
) {
    return createDocument(db, { kind: 'INVOICE', partyId, date: TEST_DATE, items, ...overrides });
}

export async function createTestChallan(
    db: Database,
    partyId: string,
    items: LineItemInput[] = [item(1, 500)],
    overrides: Partial<CreateDocumentInput> = {}
) {
    return createDocument(db, { kind: 'CHALLAN', partyId, date: TEST_DATE, items, ...overrides });
}

/** Catalogue item with 10 units in stock */
export async function createTestItem(db: Database, overrides: Partial<ItemInput> = {}) {
    itemCounter++;
    return createItem(db, { name: `Test Item ${itemCounter}`, rate: 100, openingStock: 10, ...overrides });
}
