import { z } from 'zod';
import { SERVER_CONFIG } from '../config/app.config';

// Amounts and measures stay strings or numbers; services parse them with decimal.js
const decimalInput = z.union([z.string().trim().min(1), z.number()]);
const optionalText = z.string().trim().max(1000).nullable().optional();
const dateInput = z.coerce.date({ invalid_type_error: 'Invalid date' });

export const partySchema = z.object({
    name: z.string().trim().min(1, 'Name is required'),
    contactPerson: optionalText,
    phone: optionalText,
    email: z.string().trim().email().nullable().optional().or(z.literal('').transform(() => null)),
    address: optionalText,
});

export const updatePartySchema = partySchema.partial();

export const lineItemSchema = z.object({
    itemId: z.string().min(1).nullable().optional(),
    description: z.string().trim().min(1, 'Description is required'),
    quantity: decimalInput,
    rate: decimalInput,
    taxPercent: decimalInput.optional(),
    discountPercent: decimalInput.optional(),
});

// The catalogue item of a line is fixed once the line exists
export const updateLineItemSchema = lineItemSchema.omit({ itemId: true }).partial();

export const createDocumentSchema = z.object({
    kind: z.enum(SERVER_CONFIG.document.kinds),
    partyId: z.string().min(1, 'Party is required'),
    date: dateInput,
    series: z
        .string()
        .trim()
        .regex(/^[A-Z0-9][A-Z0-9-]*[A-Z0-9]$|^[A-Z0-9]$/i, 'Series may hold letters, digits and inner dashes')
        .optional(),
    invoiceId: z.string().min(1).nullable().optional(),
    notes: optionalText,
    transportDetails: optionalText,
    limitEnabled: z.boolean().optional(),
    limitAmount: z.unknown().optional(),
    // Emptiness is reported by the service as EMPTY_DOCUMENT
    items: z.array(lineItemSchema),
});

export const updateDocumentSchema = z.object({
    partyId: z.string().min(1).optional(),
    date: dateInput.optional(),
    invoiceId: z.string().min(1).nullable().optional(),
    notes: optionalText,
    transportDetails: optionalText,
    limitEnabled: z.boolean().optional(),
    limitAmount: z.unknown().optional(),
});

export const createPaymentSchema = z.object({
    partyId: z.string().min(1).optional(),
    documentId: z.string().min(1).nullable().optional(),
    // Checked by the service so every bad amount answers INVALID_AMOUNT
    amount: z.unknown(),
    date: dateInput,
    mode: z.enum(SERVER_CONFIG.payment.modes).default(SERVER_CONFIG.payment.defaultMode),
    notes: optionalText,
});

export const updatePaymentSchema = z.object({
    amount: z.unknown().optional(),
    date: dateInput.optional(),
    mode: z.enum(SERVER_CONFIG.payment.modes).optional(),
    notes: optionalText,
});

export const createReturnSchema = z.object({
    documentId: z.string().min(1, 'Document is required'),
    lineItemId: z.string().min(1).nullable().optional(),
    quantity: decimalInput.optional(),
    amount: z.unknown().optional(),
    reason: optionalText,
    date: dateInput,
});

export const updateReturnSchema = z.object({
    quantity: decimalInput.optional(),
    amount: z.unknown().optional(),
    reason: optionalText,
    date: dateInput.optional(),
});

export const itemSchema = z.object({
    name: z.string().trim().min(1, 'Name is required'),
    hsnCode: optionalText,
    unit: z.string().trim().min(1).max(20).optional(),
    rate: decimalInput.optional(),
    taxPercent: decimalInput.optional(),
    openingStock: decimalInput.optional(),
});

export const updateItemSchema = itemSchema.omit({ openingStock: true }).partial();

export const stockAdjustmentSchema = z.object({
    // Signed: negative takes stock out
    quantity: decimalInput,
    reason: optionalText,
});

const pagination = {
    page: z.coerce.number().int().positive().optional(),
    limit: z.coerce.number().int().positive().optional(),
};

export const partyQuerySchema = z.object({ ...pagination, search: z.string().trim().min(1).optional() });

export const itemQuerySchema = z.object({ ...pagination, search: z.string().trim().min(1).optional() });

export const movementQuerySchema = z.object(pagination);

export const documentQuerySchema = z.object({
    ...pagination,
    kind: z.enum(SERVER_CONFIG.document.kinds).optional(),
    partyId: z.string().min(1).optional(),
    status: z.enum(['PAID', 'UNPAID']).optional(),
});

export const paymentQuerySchema = z.object({
    ...pagination,
    partyId: z.string().min(1).optional(),
    documentId: z.string().min(1).optional(),
});

export const returnQuerySchema = z.object({
    ...pagination,
    documentId: z.string().min(1).optional(),
    partyId: z.string().min(1).optional(),
});
