/**
 * Sales Return Routes
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { Database } from '../db/types';
import { successResponse } from '../types/api';
import { parseWith } from '../middleware';
import { createReturnSchema, returnQuerySchema, updateReturnSchema } from '../schemas/billing';
import { createReturn, listReturns, softDeleteReturn, updateReturn } from '../services/return.service';

export function createReturnsRouter(db: Database): Router {
    const router = Router();

    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await listReturns(db, parseWith(returnQuerySchema, req.query));
            res.json(successResponse(result));
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /returns
     * With lineItemId the amount is derived from the item; without it, `amount` is required
     */
    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await createReturn(db, parseWith(createReturnSchema, req.body));
            res.status(201).json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await updateReturn(db, req.params.id, parseWith(updateReturnSchema, req.body));
            res.json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await softDeleteReturn(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
