/**
 * Typed domain errors. Each carries the HTTP status and machine code the
 * error handler puts on the wire.
 */

export class AppError extends Error {
    readonly statusCode: number;
    readonly code: string;
    readonly details?: Record<string, unknown>;

    constructor(message: string, statusCode: number, code: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
    }
}

/** Every attempt to take the next number in a series lost the race. */
export class NumberGenerationExhausted extends AppError {
    constructor(readonly series: string, readonly attempts: number, options?: { cause?: unknown }) {
        super(
            `Unable to generate a unique number in series ${series} after ${attempts} attempts. Please try again.`,
            409,
            'NUMBER_GENERATION_EXHAUSTED',
            { series, attempts },
            options
        );
    }
}

/** A document would be left without a single active line item. */
export class EmptyDocumentError extends AppError {
    constructor(message = 'A document needs at least one active line item', details?: Record<string, unknown>) {
        super(message, 422, 'EMPTY_DOCUMENT', details);
    }
}

export class InvalidAmountError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 422, 'INVALID_AMOUNT', details);
    }
}

/** An invoice's items total would pass the limit set on it. */
export class LimitExceededError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 422, 'LIMIT_EXCEEDED', details);
    }
}

export class InsufficientStockError extends AppError {
    constructor(item: string, available: string, requested: string) {
        super(`Insufficient stock for "${item}". Available: ${available}, requested: ${requested}`, 409, 'INSUFFICIENT_STOCK', {
            item,
            available,
            requested,
        });
    }
}

/** Recomputing derived totals failed; the enclosing transaction is rolled back. */
export class AggregationFailure extends AppError {
    constructor(message: string, details: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, 500, 'AGGREGATION_FAILURE', details, options);
    }
}

export class NotFoundError extends AppError {
    constructor(entity: string, id: string) {
        super(`${entity} not found`, 404, 'NOT_FOUND', { entity, id });
    }
}

/** Mutation against a soft-deleted record. */
export class InactiveRecordError extends AppError {
    constructor(entity: string, id: string) {
        super(`${entity} has been deleted`, 409, 'RECORD_INACTIVE', { entity, id });
    }
}

export class ValidationError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 400, 'VALIDATION_ERROR', details);
    }
}

interface PgErrorLike {
    code: string;
    message: string;
    constraint?: string;
}

function isPgErrorLike(error: unknown): error is PgErrorLike {
    return (
        typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        typeof error.code === 'string' &&
        'message' in error &&
        typeof error.message === 'string'
    );
}

/**
 * True when `error` (or its cause) is a Postgres unique violation on one of
 * the named constraints.
 */
export function isUniqueViolation(error: unknown, constraints: readonly string[]): boolean {
    if (isPgErrorLike(error) && error.code === '23505') {
        if (error.constraint) return constraints.includes(error.constraint);
        return constraints.some((name) => error.message.includes(`"${name}"`));
    }
    if (error instanceof Error && error.cause !== undefined) {
        return isUniqueViolation(error.cause, constraints);
    }
    return false;
}
