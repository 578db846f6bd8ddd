/**
 * Services Index
 *
 * Export all services for easy importing
 */

export * as NumberingService from './numbering.service';
export * as LedgerService from './ledger.service';
export * as PartyService from './party.service';
export * as InventoryService from './inventory.service';
export * as DocumentService from './document.service';
export * as LineItemService from './line-item.service';
export * as PaymentService from './payment.service';
export * as ReturnService from './return.service';
export * as PresentationService from './presentation.service';
