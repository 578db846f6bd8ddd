import { Decimal } from 'decimal.js';
import { SERVER_CONFIG } from '../config/app.config';
import { InvalidAmountError } from './errors';

export { Decimal };

export const ZERO = new Decimal(0);

/** Decimal from a stored numeric string; null and undefined read as zero */
export function dec(value: Decimal.Value | null | undefined): Decimal {
    if (value === null || value === undefined || value === '') return ZERO;
    return new Decimal(value);
}

/** Round half-up to the money scale */
export function round2(value: Decimal.Value): Decimal {
    return dec(value).toDecimalPlaces(SERVER_CONFIG.money.scale, Decimal.ROUND_HALF_UP);
}

/** Fixed-scale string for numeric columns and API payloads */
export function toMoney(value: Decimal.Value): string {
    return round2(value).toFixed(SERVER_CONFIG.money.scale);
}

export function sumMoney(values: Iterable<Decimal.Value | null | undefined>): Decimal {
    let total = ZERO;
    for (const value of values) {
        total = total.plus(dec(value));
    }
    return total;
}

export function formatCurrency(value: Decimal.Value): string {
    return `${SERVER_CONFIG.money.currencySymbol}${toMoney(value)}`;
}

/**
 * Parse a user-supplied amount that must be strictly positive.
 * Throws InvalidAmountError when missing, non-numeric, <= 0 or too large to store.
 */
export function parsePositiveAmount(value: unknown, field = 'amount'): Decimal {
    if (value === null || value === undefined || value === '') {
        throw new InvalidAmountError(`${field} is required`, { field });
    }
    if (typeof value !== 'string' && typeof value !== 'number' && !(value instanceof Decimal)) {
        throw new InvalidAmountError(`${field} must be a number`, { field });
    }

    let amount: Decimal;
    try {
        amount = new Decimal(value);
    } catch {
        throw new InvalidAmountError(`${field} must be a number`, { field, value: String(value) });
    }

    if (!amount.isFinite()) {
        throw new InvalidAmountError(`${field} must be a number`, { field, value: String(value) });
    }
    if (amount.lte(0)) {
        throw new InvalidAmountError(`${field} must be greater than zero`, { field, value: amount.toString() });
    }
    if (round2(amount).gt(SERVER_CONFIG.money.maxAmount)) {
        throw new InvalidAmountError(`${field} cannot exceed ${SERVER_CONFIG.money.maxAmount}`, { field, value: amount.toString() });
    }
    return amount;
}
