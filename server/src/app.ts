import express, { type Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { SERVER_CONFIG } from './config/app.config';
import type { Database } from './db/types';
import { errorHandler, createError } from './middleware/errorHandler';
import { requestLogger } from './middleware/logger';
import { createRoutes } from './routes/index';
import type { DocumentRenderer } from './services/presentation.service';

export interface AppOptions {
    /** Serves GET /api/documents/:id/file when set */
    renderer?: DocumentRenderer;
}

/**
 * Build the Express application around a database handle. The server passes
 * the Neon pool; tests pass an in-process database.
 */
export function createApp(db: Database, options: AppOptions = {}): Express {
    const app = express();

    // ===========================================
    // CORE MIDDLEWARE
    // ===========================================

    app.use(cors({
        origin: [...SERVER_CONFIG.security.corsOrigins],
        methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
        credentials: true,
    }));

    // Enable GZIP compression
    app.use(compression());

    app.use(express.json({ limit: '1mb' }));

    // Request logging with timing
    app.use(requestLogger);

    // ===========================================
    // API ROUTES
    // ===========================================

    app.use(SERVER_CONFIG.server.apiPrefix, createRoutes(db, options.renderer));

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            environment: SERVER_CONFIG.server.env,
        });
    });

    // ===========================================
    // ERROR HANDLING
    // ===========================================

    app.use((req, res, next) => {
        next(createError(`Route ${req.method} ${req.path} not found`, 404, 'ROUTE_NOT_FOUND'));
    });

    app.use(errorHandler);

    return app;
}
