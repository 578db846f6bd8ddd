/**
 * Party Service
 *
 * Customers the business bills. `outstanding` is never written here; the
 * ledger service keeps it in step with invoices and payments.
 */

import { and, asc, count as countFn, eq, gt, ilike } from 'drizzle-orm';
import type { Database } from '../db/types';
import { documents, parties, type Document, type Party } from '../db/schema';
import { activeWhere, softDeleteValues } from '../utils/soft-delete';
import { AppError, InactiveRecordError, isUniqueViolation, NotFoundError } from '../utils/errors';
import { getPaginationParams } from '../config/app.config';
import type { Paginated } from '../types/api';
import { logger } from '../middleware/logger';

export interface PartyInput {
    name: string;
    contactPerson?: string | null;
    phone?: string | null;
    email?: string | null;
    address?: string | null;
}

export interface PartyListQuery {
    search?: string;
    page?: number;
    limit?: number;
}

const PARTY_NAME_CONSTRAINTS = ['parties_name_unique'] as const;

class DuplicatePartyError extends AppError {
    constructor(name: string) {
        super(`A party named "${name}" already exists`, 409, 'DUPLICATE_PARTY', { name });
    }
}

/**
 * Load a party for a write. Soft-deleted parties take no new documents or payments.
 */
export async function requireActiveParty(client: Database, partyId: string): Promise<Party> {
    const [party] = await client.select().from(parties).where(eq(parties.id, partyId));
    if (!party) throw new NotFoundError('Party', partyId);
    if (!party.isActive) throw new InactiveRecordError('Party', partyId);
    return party;
}

export async function createParty(db: Database, input: PartyInput): Promise<Party> {
    try {
        const [party] = await db.insert(parties).values({ ...input, name: input.name.trim() }).returning();
        logger.success(`Party created: ${party.name}`, { partyId: party.id });
        return party;
    } catch (error) {
        if (isUniqueViolation(error, PARTY_NAME_CONSTRAINTS)) {
            throw new DuplicatePartyError(input.name.trim());
        }
        throw error;
    }
}

export async function updateParty(db: Database, partyId: string, patch: Partial<PartyInput>): Promise<Party> {
    await requireActiveParty(db, partyId);

    const values = patch.name === undefined ? patch : { ...patch, name: patch.name.trim() };
    try {
        const [party] = await db
            .update(parties)
            .set({ ...values, updatedAt: new Date() })
            .where(eq(parties.id, partyId))
            .returning();
        return party;
    } catch (error) {
        if (patch.name !== undefined && isUniqueViolation(error, PARTY_NAME_CONSTRAINTS)) {
            throw new DuplicatePartyError(patch.name.trim());
        }
        throw error;
    }
}

/**
 * Retire a party. Its documents and payments stay as they are.
 */
export async function softDeleteParty(db: Database, partyId: string): Promise<Party> {
    await requireActiveParty(db, partyId);
    const [party] = await db.update(parties).set(softDeleteValues()).where(eq(parties.id, partyId)).returning();
    logger.info(`Party deleted: ${party.name}`, { partyId });
    return party;
}

export async function getParty(db: Database, partyId: string): Promise<Party> {
    const [party] = await db.select().from(parties).where(eq(parties.id, partyId));
    if (!party) throw new NotFoundError('Party', partyId);
    return party;
}

export async function listParties(db: Database, query: PartyListQuery = {}): Promise<Paginated<Party>> {
    const { page, limit, offset } = getPaginationParams(query.page, query.limit);
    const where = activeWhere(parties, query.search ? ilike(parties.name, `%${query.search}%`) : undefined);

    const [{ total }] = await db.select({ total: countFn() }).from(parties).where(where);
    const data = await db.select().from(parties).where(where).orderBy(asc(parties.name)).limit(limit).offset(offset);

    return {
        data,
        meta: { total, page, limit, totalPages: Math.ceil(total / limit) },
    };
}

/**
 * Active invoices of a party with money still due, oldest first.
 */
export async function listUnpaidInvoices(db: Database, partyId: string): Promise<Document[]> {
    await getParty(db, partyId);
    return db
        .select()
        .from(documents)
        .where(
            activeWhere(
                documents,
                and(eq(documents.partyId, partyId), eq(documents.kind, 'INVOICE'), gt(documents.balanceDue, '0'))
            )
        )
        .orderBy(asc(documents.date), asc(documents.sequence));
}
