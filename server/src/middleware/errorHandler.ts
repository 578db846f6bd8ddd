import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { logger } from './logger';
import type { ApiErrorResponse } from '../types/api';

export interface ApiError extends Error {
    statusCode?: number;
    code?: string;
    details?: Record<string, unknown>;
}

export function errorHandler(
    err: ApiError,
    req: Request,
    res: Response,
    _next: NextFunction
) {
    const statusCode = err.statusCode || 500;
    const code = err.code || 'INTERNAL_ERROR';

    if (statusCode >= 500) {
        logger.error(`${req.method} ${req.originalUrl} failed`, { code, error: err, details: err.details });
    } else {
        logger.warn(`${req.method} ${req.originalUrl} rejected`, { code, message: err.message });
    }

    const body: ApiErrorResponse = {
        success: false,
        error: {
            code,
            message: err.message || 'An unexpected error occurred',
        },
    };
    if (err instanceof AppError && err.details) {
        body.error.details = err.details;
    }

    res.status(statusCode).json(body);
}

export function createError(message: string, statusCode: number = 400, code?: string): ApiError {
    const error: ApiError = new Error(message);
    error.statusCode = statusCode;
    error.code = code;
    return error;
}
