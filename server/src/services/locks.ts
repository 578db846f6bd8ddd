/**
 * Row locks taken before a document or one of its children changes.
 * Writers on the same document queue behind the document row, so totals are
 * always derived from a settled set of children.
 */

import { count as countFn, eq } from 'drizzle-orm';
import type { Database } from '../db/types';
import { documents, lineItems, type Document } from '../db/schema';
import { activeWhere } from '../utils/soft-delete';
import { EmptyDocumentError, InactiveRecordError, NotFoundError } from '../utils/errors';

export async function lockActiveDocument(client: Database, documentId: string): Promise<Document> {
    const [document] = await client.select().from(documents).where(eq(documents.id, documentId)).for('update');
    if (!document) throw new NotFoundError('Document', documentId);
    if (!document.isActive) throw new InactiveRecordError('Document', documentId);
    return document;
}

export async function assertHasActiveItems(client: Database, documentId: string): Promise<void> {
    const [{ total }] = await client
        .select({ total: countFn() })
        .from(lineItems)
        .where(activeWhere(lineItems, eq(lineItems.documentId, documentId)));

    if (total === 0) {
        throw new EmptyDocumentError(undefined, { documentId });
    }
}
