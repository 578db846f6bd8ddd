/**
 * Payment Routes
 *
 * Receipts against an invoice, or general receipts against a party.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { Database } from '../db/types';
import { successResponse } from '../types/api';
import { parseWith } from '../middleware';
import { createPaymentSchema, paymentQuerySchema, updatePaymentSchema } from '../schemas/billing';
import { createPayment, getPayment, listPayments, softDeletePayment, updatePayment } from '../services/payment.service';

export function createPaymentsRouter(db: Database): Router {
    const router = Router();

    /**
     * GET /payments
     * Query Params: page, limit, partyId, documentId
     */
    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await listPayments(db, parseWith(paymentQuerySchema, req.query));
            res.json(successResponse(result));
        } catch (error) {
            next(error);
        }
    });

    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await createPayment(db, parseWith(createPaymentSchema, req.body));
            res.status(201).json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await getPayment(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await updatePayment(db, req.params.id, parseWith(updatePaymentSchema, req.body));
            res.json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await softDeletePayment(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
