/**
 * Party Routes
 *
 * Customers, their running balance and their unpaid invoices.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { Database } from '../db/types';
import { successResponse } from '../types/api';
import { parseWith } from '../middleware';
import { partyQuerySchema, partySchema, updatePartySchema } from '../schemas/billing';
import {
    createParty,
    getParty,
    listParties,
    listUnpaidInvoices,
    softDeleteParty,
    updateParty,
} from '../services/party.service';

export function createPartiesRouter(db: Database): Router {
    const router = Router();

    /**
     * GET /parties
     * Query Params: page, limit, search
     */
    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await listParties(db, parseWith(partyQuerySchema, req.query));
            res.json(successResponse(result));
        } catch (error) {
            next(error);
        }
    });

    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const party = await createParty(db, parseWith(partySchema, req.body));
            res.status(201).json(successResponse(party));
        } catch (error) {
            next(error);
        }
    });

    router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await getParty(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /parties/:id/unpaid-invoices
     * Active invoices with a balance due, oldest first
     */
    router.get('/:id/unpaid-invoices', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await listUnpaidInvoices(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const party = await updateParty(db, req.params.id, parseWith(updatePartySchema, req.body));
            res.json(successResponse(party));
        } catch (error) {
            next(error);
        }
    });

    router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await softDeleteParty(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
