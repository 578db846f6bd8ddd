import { ZodError, ZodTypeAny, z } from 'zod';
import { ValidationError } from '../utils/errors';

function toValidationError(error: ZodError): ValidationError {
    const messages = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    return new ValidationError(messages, {
        issues: error.errors.map((e) => ({ path: e.path.join('.'), message: e.message })),
    });
}

/**
 * Parse a request body or query with the schema, raising ValidationError
 * instead of ZodError so the error handler answers 400.
 */
export function parseWith<T extends ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw toValidationError(result.error);
    }
    return result.data;
}
