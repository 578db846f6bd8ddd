import { Decimal, dec, round2 } from './money';
import { ValidationError } from './errors';

export interface LineAmountsInput {
    quantity: Decimal.Value;
    rate: Decimal.Value;
    taxPercent?: Decimal.Value | null;
    discountPercent?: Decimal.Value | null;
}

export interface LineAmounts {
    baseAmount: Decimal;
    taxAmount: Decimal;
    discountAmount: Decimal;
    lineTotal: Decimal;
}

const HUNDRED = new Decimal(100);

/**
 * Calculate line item amounts.
 *
 * base = quantity * rate, tax and discount are percentages of base.
 * The total is taken from the unrounded components and rounded once, half-up,
 * so 3 x 10.005 gives 30.02. The components themselves are reported rounded.
 */
export function computeLineTotal(item: LineAmountsInput): LineAmounts {
    const base = dec(item.quantity).times(dec(item.rate));
    const tax = base.times(dec(item.taxPercent)).dividedBy(HUNDRED);
    const discount = base.times(dec(item.discountPercent)).dividedBy(HUNDRED);

    return {
        baseAmount: round2(base),
        taxAmount: round2(tax),
        discountAmount: round2(discount),
        lineTotal: round2(base.plus(tax).minus(discount)),
    };
}

export interface ReturnableItem {
    quantity: Decimal.Value;
    rate: Decimal.Value;
    taxPercent?: Decimal.Value | null;
    discountPercent?: Decimal.Value | null;
    lineTotal: Decimal.Value;
}

export interface ReturnUnitValue {
    perUnit: Decimal;
    /** `line-total` divides the stored total; `rate` rebuilds it when that would divide by zero */
    basis: 'line-total' | 'rate';
}

/**
 * Refund value of one unit of a line item.
 */
export function computeReturnUnitValue(item: ReturnableItem): ReturnUnitValue {
    const quantity = dec(item.quantity);
    const lineTotal = dec(item.lineTotal);

    if (lineTotal.gt(0) && quantity.gt(0)) {
        return { perUnit: round2(lineTotal.dividedBy(quantity)), basis: 'line-total' };
    }

    // Wholly discounted or degenerate line: rebuild from rate
    const rate = dec(item.rate);
    const perUnit = rate
        .plus(rate.times(dec(item.taxPercent)).dividedBy(HUNDRED))
        .minus(rate.times(dec(item.discountPercent)).dividedBy(HUNDRED));

    return { perUnit: round2(perUnit), basis: 'rate' };
}

/** Amount refunded for returning `quantity` units of a line item */
export function computeLinkedReturnAmount(item: ReturnableItem, quantity: Decimal.Value): Decimal {
    const { perUnit } = computeReturnUnitValue(item);
    return round2(perUnit.times(dec(quantity)));
}

export interface MeasureRules {
    /** Decimal places the column stores */
    places: number;
    /** Reject zero as well as negatives */
    positive?: boolean;
    max?: Decimal.Value;
}

/**
 * Parse a quantity, rate or percentage supplied by a caller and round it to
 * the column's scale. Throws ValidationError naming the field.
 */
export function parseMeasure(value: unknown, field: string, rules: MeasureRules): Decimal {
    if (typeof value !== 'string' && typeof value !== 'number' && !(value instanceof Decimal)) {
        throw new ValidationError(`${field} must be a number`, { field });
    }

    let parsed: Decimal;
    try {
        parsed = new Decimal(value);
    } catch {
        throw new ValidationError(`${field} must be a number`, { field, value: String(value) });
    }
    if (!parsed.isFinite()) {
        throw new ValidationError(`${field} must be a number`, { field, value: String(value) });
    }

    parsed = parsed.toDecimalPlaces(rules.places, Decimal.ROUND_HALF_UP);
    if (rules.positive ? parsed.lte(0) : parsed.lt(0)) {
        throw new ValidationError(`${field} must be ${rules.positive ? 'greater than zero' : 'zero or more'}`, {
            field,
            value: parsed.toFixed(),
        });
    }
    if (rules.max !== undefined && parsed.gt(rules.max)) {
        throw new ValidationError(`${field} cannot exceed ${dec(rules.max).toFixed()}`, { field, value: parsed.toFixed() });
    }
    return parsed;
}
