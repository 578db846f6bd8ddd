import { describe, it, expect } from 'vitest';
import { formatDocumentNumber } from '../src/utils/generateCode';
import { getSeries, resolveSeries } from '../src/config/app.config';

describe('formatDocumentNumber', () => {
    it('zero-pads the sequence to six digits', () => {
        expect(formatDocumentNumber('INV', 42)).toBe('INV-000042');
        expect(formatDocumentNumber('CHN-202610', 7)).toBe('CHN-202610-000007');
    });

    it('grows past the pad width instead of truncating', () => {
        expect(formatDocumentNumber('INV', 1234567)).toBe('INV-1234567');
    });

    it('rejects sequences below one', () => {
        expect(() => formatDocumentNumber('INV', 0)).toThrow(RangeError);
        expect(() => formatDocumentNumber('INV', 1.5)).toThrow(RangeError);
    });
});

describe('series templates', () => {
    it('fills date tokens in UTC', () => {
        const date = new Date('2026-10-31T23:30:00Z');

        expect(resolveSeries('CHN-{YYYYMM}', date)).toBe('CHN-202610');
        expect(resolveSeries('{YYYY}/{MM}', date)).toBe('2026/10');
    });

    it('uses the UTC month for dates given with an offset', () => {
        expect(getSeries('RETURN', new Date('2026-01-01T00:30:00+05:30'))).toBe('RET-202512');
    });

    it('keeps invoices in a single series', () => {
        expect(getSeries('INVOICE', new Date('2026-10-18T00:00:00Z'))).toBe('INV');
        expect(getSeries('PAYMENT', new Date('2026-10-18T00:00:00Z'))).toBe('PAY-202610');
    });
});
