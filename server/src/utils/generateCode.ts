import { SERVER_CONFIG } from '../config/app.config';

/**
 * `INV` + 42 -> `INV-000042`
 */
export function formatDocumentNumber(
    series: string,
    sequence: number,
    width: number = SERVER_CONFIG.numbering.sequenceWidth
): string {
    if (!Number.isInteger(sequence) || sequence < 1) {
        throw new RangeError(`Sequence must be a positive integer, got ${sequence}`);
    }
    return `${series}-${String(sequence).padStart(width, '0')}`;
}
