/**
 * Document Routes
 *
 * Invoices and delivery challans with their line items.
 *
 * Every write answers with the document's refreshed totals; numbering and
 * pricing happen in the services.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { Database } from '../db/types';
import { successResponse } from '../types/api';
import { parseWith } from '../middleware';
import {
    createDocumentSchema,
    documentQuerySchema,
    lineItemSchema,
    updateDocumentSchema,
    updateLineItemSchema,
} from '../schemas/billing';
import { createDocument, listDocuments, softDeleteDocument, updateDocument } from '../services/document.service';
import { addLineItem, softDeleteLineItem, updateLineItem } from '../services/line-item.service';
import { getDocumentRecord, toPrintableDocument, type DocumentRenderer } from '../services/presentation.service';
import { createError } from '../middleware/errorHandler';

export function createDocumentsRouter(db: Database, renderer?: DocumentRenderer): Router {
    const router = Router();

    // ============================================================
    // DOCUMENTS
    // ============================================================

    /**
     * GET /documents
     * Query Params: page, limit, kind, partyId, status (PAID | UNPAID)
     */
    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await listDocuments(db, parseWith(documentQuerySchema, req.query));
            res.json(successResponse(result));
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /documents
     * Numbers the document and prices its items in one transaction
     */
    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const document = await createDocument(db, parseWith(createDocumentSchema, req.body));
            res.status(201).json(successResponse(document));
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /documents/:id
     * Full record: party, active items, payments and returns
     */
    router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await getDocumentRecord(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /documents/:id/print
     * Display strings for the print template
     */
    router.get('/:id/print', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const record = await getDocumentRecord(db, req.params.id);
            res.json(successResponse(toPrintableDocument(record)));
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /documents/:id/file
     * The printable document run through the configured renderer
     */
    router.get('/:id/file', async (req: Request, res: Response, next: NextFunction) => {
        try {
            if (!renderer) {
                throw createError('No document renderer is configured', 501, 'RENDERER_UNAVAILABLE');
            }
            const record = await getDocumentRecord(db, req.params.id);
            const file = await renderer.render(toPrintableDocument(record));
            res.type(renderer.contentType).send(Buffer.from(file));
        } catch (error) {
            next(error);
        }
    });

    router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const document = await updateDocument(db, req.params.id, parseWith(updateDocumentSchema, req.body));
            res.json(successResponse(document));
        } catch (error) {
            next(error);
        }
    });

    router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(successResponse(await softDeleteDocument(db, req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    // ============================================================
    // LINE ITEMS
    // ============================================================

    router.post('/:id/items', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await addLineItem(db, req.params.id, parseWith(lineItemSchema, req.body));
            res.status(201).json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    router.put('/:id/items/:itemId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await updateLineItem(db, req.params.id, req.params.itemId, parseWith(updateLineItemSchema, req.body));
            res.json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /documents/:id/items/:itemId
     * Also retires returns linked to the item; the last item cannot go
     */
    router.delete('/:id/items/:itemId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const change = await softDeleteLineItem(db, req.params.id, req.params.itemId);
            res.json(successResponse(change));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
