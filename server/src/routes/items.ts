/**
 * Item Routes
 *
 * Catalogue items, their stock and its movement history.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { Database } from '../db/types';
import { successResponse } from '../types/api';
import { parseWith } from '../middleware';
import { itemQuerySchema, itemSchema, movementQuerySchema, stockAdjustmentSchema, updateItemSchema } from '../schemas/billing';
import {
    adjustStock,
    createItem,
    getItem,
    listItems,
    listStockMovements,
    softDeleteItem,
    updateItem,
} from '../services/inventory.service';

export function createItemsRouter(db: Database): Router {
    const router = Router();

    /**
     * GET /items
     * Query Params: page, limit, search
     */
    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await listItems(db, parseWith(itemQuerySchema, req.query))));
        } catch (error) {
            next(error);
        }
    });

    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const item = await createItem(db, parseWith(itemSchema, req.body));
            res.status(201).json(successResponse(item));
        } catch (error) {
            next(error);
        }
    });

    router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await getItem(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await updateItem(db, req.params.id, parseWith(updateItemSchema, req.body))));
        } catch (error) {
            next(error);
        }
    });

    router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await softDeleteItem(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    // ============================================================
    // STOCK
    // ============================================================

    /**
     * POST /items/:id/adjust-stock
     * Body: { quantity (signed), reason? }
     */
    router.post('/:id/adjust-stock', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await adjustStock(db, req.params.id, parseWith(stockAdjustmentSchema, req.body));
            res.status(201).json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    router.get('/:id/movements', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await listStockMovements(db, req.params.id, parseWith(movementQuerySchema, req.query));
            res.json(successResponse(result));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
