import { Router } from 'express';
import type { Database } from '../db/types';
import type { DocumentRenderer } from '../services/presentation.service';
import { createPartiesRouter } from './parties';
import { createItemsRouter } from './items';
import { createDocumentsRouter } from './documents';
import { createPaymentsRouter } from './payments';
import { createReturnsRouter } from './returns';
import { createMaintenanceRouter } from './maintenance';

export function createRoutes(db: Database, renderer?: DocumentRenderer): Router {
    const router = Router();

    router.use('/parties', createPartiesRouter(db));
    router.use('/items', createItemsRouter(db));
    router.use('/documents', createDocumentsRouter(db, renderer));
    router.use('/payments', createPaymentsRouter(db));
    router.use('/returns', createReturnsRouter(db));
    router.use('/maintenance', createMaintenanceRouter(db));

    return router;
}
