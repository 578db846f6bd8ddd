/**
 * Checks on a document's refreshed totals. Run after the ledger inside the
 * transaction of the change, so a failing check rolls the change back.
 */

import type { Document } from '../db/schema';
import type { DocumentKind } from '../config/app.config';
import { dec, formatCurrency, parsePositiveAmount, toMoney } from '../utils/money';
import { InvalidAmountError, LimitExceededError, ValidationError } from '../utils/errors';

export interface DocumentLimit {
    limitEnabled: boolean;
    limitAmount: string | null;
}

/**
 * Validate the limit settings of a document. A disabled limit stores no amount.
 */
export function resolveLimit(kind: DocumentKind, enabled: boolean | undefined, amount: unknown): DocumentLimit {
    if (!enabled) {
        return { limitEnabled: false, limitAmount: null };
    }
    if (kind !== 'INVOICE') {
        throw new ValidationError('Only an invoice can carry a limit', { kind });
    }
    return { limitEnabled: true, limitAmount: toMoney(parsePositiveAmount(amount, 'limitAmount')) };
}

export function assertWithinLimit(document: Document): void {
    if (!document.limitEnabled || document.limitAmount === null) return;
    if (dec(document.itemsTotal).gt(document.limitAmount)) {
        throw new LimitExceededError(
            `Invoice limit exceeded on ${document.number}. Limit: ${formatCurrency(document.limitAmount)}, total: ${formatCurrency(document.itemsTotal)}`,
            { documentId: document.id, limitAmount: document.limitAmount, itemsTotal: document.itemsTotal }
        );
    }
}

/** Active returns may never be worth more than the active items they come from */
export function assertReturnsCovered(document: Document): void {
    if (dec(document.returnAmount).gt(document.itemsTotal)) {
        throw new InvalidAmountError(
            `Returns of ${document.returnAmount} exceed the items total of ${document.itemsTotal} on ${document.number}`,
            { documentId: document.id, returnAmount: document.returnAmount, itemsTotal: document.itemsTotal }
        );
    }
}

/** Every check that follows a change to a document's items or header */
export function checkDocumentTotals(document: Document): Document {
    assertReturnsCovered(document);
    assertWithinLimit(document);
    return document;
}
