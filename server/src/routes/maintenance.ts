import { Router, Request, Response, NextFunction } from 'express';
import type { Database } from '../db/types';
import { successResponse } from '../types/api';
import { recalculateAllLedgers } from '../services/ledger.service';
import { logger } from '../middleware/logger';

export function createMaintenanceRouter(db: Database): Router {
    const router = Router();

    /**
     * POST /maintenance/recalculate-ledgers
     * Rebuilds every document total and party balance from the child records.
     */
    router.post('/recalculate-ledgers', async (req: Request, res: Response, next: NextFunction) => {
        try {
            logger.info('--- Starting Ledger Reconciliation ---');
            const counts = await recalculateAllLedgers(db);
            res.json(successResponse(counts));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
