import { describe, it, expect } from 'vitest';
import { isUniqueViolation, NumberGenerationExhausted } from '../src/utils/errors';

const CONSTRAINTS = ['documents_number_unique', 'documents_series_sequence_unique'];

describe('isUniqueViolation', () => {
    it('matches on the constraint field', () => {
        const error = Object.assign(new Error('duplicate key'), { code: '23505', constraint: 'documents_number_unique' });
        expect(isUniqueViolation(error, CONSTRAINTS)).toBe(true);
    });

    it('ignores unique violations on other constraints', () => {
        const error = Object.assign(new Error('duplicate key'), { code: '23505', constraint: 'parties_name_unique' });
        expect(isUniqueViolation(error, CONSTRAINTS)).toBe(false);
    });

    it('falls back to the constraint named in the message', () => {
        const error = Object.assign(
            new Error('duplicate key value violates unique constraint "documents_series_sequence_unique"'),
            { code: '23505' }
        );
        expect(isUniqueViolation(error, CONSTRAINTS)).toBe(true);
    });

    it('looks through wrapped causes', () => {
        const cause = Object.assign(new Error('duplicate key'), { code: '23505', constraint: 'documents_number_unique' });
        expect(isUniqueViolation(new Error('query failed', { cause }), CONSTRAINTS)).toBe(true);
    });

    it('rejects other error codes and non-errors', () => {
        const error = Object.assign(new Error('null value'), { code: '23502', constraint: 'documents_number_unique' });

        expect(isUniqueViolation(error, CONSTRAINTS)).toBe(false);
        expect(isUniqueViolation('23505', CONSTRAINTS)).toBe(false);
        expect(isUniqueViolation(null, CONSTRAINTS)).toBe(false);
    });
});

describe('NumberGenerationExhausted', () => {
    it('carries the series and attempt count', () => {
        const error = new NumberGenerationExhausted('INV', 5);

        expect(error.statusCode).toBe(409);
        expect(error.code).toBe('NUMBER_GENERATION_EXHAUSTED');
        expect(error.details).toEqual({ series: 'INV', attempts: 5 });
        expect(error.name).toBe('NumberGenerationExhausted');
    });
});
