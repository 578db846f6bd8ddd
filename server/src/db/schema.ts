import { pgTable, text, decimal, integer, timestamp, boolean, index, unique } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { randomUUID } from 'crypto';
import type { DocumentKind, PaymentMode, StockMovementType, StockReferenceType } from '../config/app.config';

// ==================== MASTERS ====================

export const parties = pgTable('parties', {
    id: text('id').primaryKey().$defaultFn(() => randomUUID()),
    name: text('name').notNull(),
    contactPerson: text('contact_person'),
    phone: text('phone'),
    email: text('email'),
    address: text('address'),
    // Running balance, written only by the ledger
    outstanding: decimal('outstanding', { precision: 14, scale: 2 }).notNull().default('0'),
    isActive: boolean('is_active').notNull().default(true),
    deletedAt: timestamp('deleted_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
    nameUnique: unique('parties_name_unique').on(table.name),
}));

export const items = pgTable('items', {
    id: text('id').primaryKey().$defaultFn(() => randomUUID()),
    name: text('name').notNull(),
    hsnCode: text('hsn_code'),
    unit: text('unit').notNull().default('pcs'),
    rate: decimal('rate', { precision: 14, scale: 4 }).notNull().default('0'),
    taxPercent: decimal('tax_percent', { precision: 6, scale: 2 }).notNull().default('0'),
    // Cached from stock_movements; changed only together with a movement row
    stock: decimal('stock', { precision: 12, scale: 3 }).notNull().default('0'),
    isActive: boolean('is_active').notNull().default(true),
    deletedAt: timestamp('deleted_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
    nameUnique: unique('items_name_unique').on(table.name),
}));

// ==================== DOCUMENTS (INVOICE / CHALLAN) ====================

export const documents = pgTable('documents', {
    id: text('id').primaryKey().$defaultFn(() => randomUUID()),
    kind: text('kind').$type<DocumentKind>().notNull(),
    series: text('series').notNull(),
    sequence: integer('sequence').notNull(),
    number: text('number').notNull(),
    date: timestamp('date').notNull(),
    partyId: text('party_id').notNull().references(() => parties.id),
    invoiceId: text('invoice_id'), // Challan -> invoice it delivers
    notes: text('notes'),
    transportDetails: text('transport_details'),
    // Optional ceiling on the items total of an invoice
    limitEnabled: boolean('limit_enabled').notNull().default(false),
    limitAmount: decimal('limit_amount', { precision: 14, scale: 2 }),
    // Totals (ledger-owned)
    baseAmount: decimal('base_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    taxAmount: decimal('tax_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    discountAmount: decimal('discount_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    itemsTotal: decimal('items_total', { precision: 14, scale: 2 }).notNull().default('0'),
    returnAmount: decimal('return_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    finalAmount: decimal('final_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    paidAmount: decimal('paid_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    balanceDue: decimal('balance_due', { precision: 14, scale: 2 }).notNull().default('0'),
    isPaid: boolean('is_paid').notNull().default(false),
    isActive: boolean('is_active').notNull().default(true),
    deletedAt: timestamp('deleted_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
    numberUnique: unique('documents_number_unique').on(table.number),
    seriesSequenceUnique: unique('documents_series_sequence_unique').on(table.series, table.sequence),
    partyIdx: index('documents_party_idx').on(table.partyId),
    dateIdx: index('documents_date_idx').on(table.date),
}));

export const lineItems = pgTable('line_items', {
    id: text('id').primaryKey().$defaultFn(() => randomUUID()),
    documentId: text('document_id').notNull().references(() => documents.id),
    itemId: text('item_id').references(() => items.id), // Catalogue item whose stock the line moves
    description: text('description').notNull(),
    quantity: decimal('quantity', { precision: 12, scale: 3 }).notNull(),
    rate: decimal('rate', { precision: 14, scale: 4 }).notNull(),
    taxPercent: decimal('tax_percent', { precision: 6, scale: 2 }).notNull().default('0'),
    discountPercent: decimal('discount_percent', { precision: 6, scale: 2 }).notNull().default('0'),
    baseAmount: decimal('base_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    taxAmount: decimal('tax_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    discountAmount: decimal('discount_amount', { precision: 14, scale: 2 }).notNull().default('0'),
    lineTotal: decimal('line_total', { precision: 14, scale: 2 }).notNull().default('0'),
    isActive: boolean('is_active').notNull().default(true),
    deletedAt: timestamp('deleted_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
    documentIdx: index('line_items_document_idx').on(table.documentId),
}));

// ==================== PAYMENTS & RETURNS ====================

export const payments = pgTable('payments', {
    id: text('id').primaryKey().$defaultFn(() => randomUUID()),
    series: text('series').notNull(),
    sequence: integer('sequence').notNull(),
    number: text('number').notNull(),
    partyId: text('party_id').notNull().references(() => parties.id),
    documentId: text('document_id').references(() => documents.id), // Null for a general payment against the party
    date: timestamp('date').notNull(),
    amount: decimal('amount', { precision: 14, scale: 2 }).notNull(),
    mode: text('mode').$type<PaymentMode>().notNull().default('Cash'),
    notes: text('notes'),
    isActive: boolean('is_active').notNull().default(true),
    deletedAt: timestamp('deleted_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
    numberUnique: unique('payments_number_unique').on(table.number),
    seriesSequenceUnique: unique('payments_series_sequence_unique').on(table.series, table.sequence),
    partyIdx: index('payments_party_idx').on(table.partyId),
    documentIdx: index('payments_document_idx').on(table.documentId),
}));

export const salesReturns = pgTable('sales_returns', {
    id: text('id').primaryKey().$defaultFn(() => randomUUID()),
    series: text('series').notNull(),
    sequence: integer('sequence').notNull(),
    number: text('number').notNull(),
    documentId: text('document_id').notNull().references(() => documents.id),
    partyId: text('party_id').notNull().references(() => parties.id),
    lineItemId: text('line_item_id').references(() => lineItems.id), // Null for a manual return
    quantity: decimal('quantity', { precision: 12, scale: 3 }).notNull().default('1'),
    amount: decimal('amount', { precision: 14, scale: 2 }).notNull(),
    reason: text('reason'),
    date: timestamp('date').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    deletedAt: timestamp('deleted_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
    numberUnique: unique('sales_returns_number_unique').on(table.number),
    seriesSequenceUnique: unique('sales_returns_series_sequence_unique').on(table.series, table.sequence),
    documentIdx: index('sales_returns_document_idx').on(table.documentId),
    lineItemIdx: index('sales_returns_line_item_idx').on(table.lineItemId),
}));

// ==================== INVENTORY ====================

export const stockMovements = pgTable('stock_movements', {
    id: text('id').primaryKey().$defaultFn(() => randomUUID()),
    date: timestamp('date').notNull().defaultNow(),
    itemId: text('item_id').notNull().references(() => items.id),
    movementType: text('movement_type').$type<StockMovementType>().notNull(),
    quantityIn: decimal('quantity_in', { precision: 12, scale: 3 }).notNull().default('0'),
    quantityOut: decimal('quantity_out', { precision: 12, scale: 3 }).notNull().default('0'),
    runningBalance: decimal('running_balance', { precision: 12, scale: 3 }).notNull(),
    referenceType: text('reference_type').$type<StockReferenceType>().notNull(),
    referenceCode: text('reference_code').notNull(),
    referenceId: text('reference_id'),
    reason: text('reason').notNull(),
    createdAt: timestamp('created_at').notNull().defaultNow(),
}, (table) => ({
    itemIdx: index('stock_movements_item_idx').on(table.itemId),
}));

// ==================== RELATIONS ====================

export const itemsRelations = relations(items, ({ many }) => ({
    lineItems: many(lineItems),
    movements: many(stockMovements),
}));

export const partiesRelations = relations(parties, ({ many }) => ({
    documents: many(documents),
    payments: many(payments),
}));

export const documentsRelations = relations(documents, ({ one, many }) => ({
    party: one(parties, { fields: [documents.partyId], references: [parties.id] }),
    lineItems: many(lineItems),
    payments: many(payments),
    returns: many(salesReturns),
}));

export const lineItemsRelations = relations(lineItems, ({ one }) => ({
    document: one(documents, { fields: [lineItems.documentId], references: [documents.id] }),
    item: one(items, { fields: [lineItems.itemId], references: [items.id] }),
}));

export const paymentsRelations = relations(payments, ({ one }) => ({
    party: one(parties, { fields: [payments.partyId], references: [parties.id] }),
    document: one(documents, { fields: [payments.documentId], references: [documents.id] }),
}));

export const salesReturnsRelations = relations(salesReturns, ({ one }) => ({
    document: one(documents, { fields: [salesReturns.documentId], references: [documents.id] }),
    lineItem: one(lineItems, { fields: [salesReturns.lineItemId], references: [lineItems.id] }),
}));

export const stockMovementsRelations = relations(stockMovements, ({ one }) => ({
    item: one(items, { fields: [stockMovements.itemId], references: [items.id] }),
}));

// ==================== ROW TYPES ====================

export type Party = typeof parties.$inferSelect;
export type Document = typeof documents.$inferSelect;
export type LineItem = typeof lineItems.$inferSelect;
export type Payment = typeof payments.$inferSelect;
export type SalesReturn = typeof salesReturns.$inferSelect;
export type Item = typeof items.$inferSelect;
export type StockMovement = typeof stockMovements.$inferSelect;
