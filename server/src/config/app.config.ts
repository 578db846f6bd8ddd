/**
 * Server Application Configuration
 *
 * Centralized configuration for business rules and constants.
 * Environment-dependent values are read once at startup.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'info';
}

export const SERVER_CONFIG = {
  /**
   * Server Configuration
   */
  server: {
    /** Default port */
    port: parseInt(process.env.PORT || '3001', 10),
    /** Environment */
    env: process.env.NODE_ENV || 'development',
    /** API prefix */
    apiPrefix: '/api',
  },

  /**
   * Logging
   */
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
  },

  /**
   * Money handling
   */
  money: {
    /** Decimal places kept on every stored monetary figure */
    scale: 2,
    currencySymbol: '₹',
    /** Largest value a numeric(14,2) column holds */
    maxAmount: '999999999999.99',
  },

  /**
   * Upper bounds of the measure columns
   */
  measures: {
    /** numeric(12,3) */
    maxQuantity: '999999999.999',
    /** numeric(14,4) */
    maxRate: '9999999999.9999',
    maxTaxPercent: '100',
    maxDiscountPercent: '100',
  },

  /**
   * Inventory
   */
  inventory: {
    /** SALE moves stock for invoice lines, RETURN for returns linked to them */
    movementTypes: ['SALE', 'RETURN', 'ADJUSTMENT'] as const,
    referenceTypes: ['document', 'line_item', 'return', 'adjustment'] as const,
    defaultUnit: 'pcs',
  },

  /**
   * Pagination Configuration
   */
  pagination: {
    /** Default number of items per page */
    defaultPageSize: 20,
    /** Maximum page size allowed */
    maxPageSize: 100,
    /** Minimum page size allowed */
    minPageSize: 1,
  },

  /**
   * Payment Configuration
   */
  payment: {
    /** Available payment modes */
    modes: ['Cash', 'UPI', 'Bank', 'Cheque'] as const,
    /** Default payment mode */
    defaultMode: 'Cash' as const,
  },

  /**
   * Document Configuration
   */
  document: {
    /** Invoices carry money owed by the party; challans only record deliveries */
    kinds: ['INVOICE', 'CHALLAN'] as const,
  },

  /**
   * Sequential numbering
   */
  numbering: {
    /** Zero-padding width of the sequence part: INV-000042 */
    sequenceWidth: 6,
    /** Attempts before giving up on a contended series */
    maxAttempts: 5,
    /** Series templates; {YYYY}, {MM} and {YYYYMM} come from the record date (UTC) */
    series: {
      INVOICE: 'INV',
      CHALLAN: 'CHN-{YYYYMM}',
      PAYMENT: 'PAY-{YYYYMM}',
      RETURN: 'RET-{YYYYMM}',
    },
  },

  /**
   * Security Configuration
   */
  security: {
    /** Allowed origins for CORS */
    corsOrigins: ['http://localhost:5173', 'http://localhost:3000'],
  },
} as const;

/**
 * Type exports for type safety
 */
export type PaymentMode = (typeof SERVER_CONFIG.payment.modes)[number];
export type DocumentKind = (typeof SERVER_CONFIG.document.kinds)[number];
export type NumberedEntity = keyof typeof SERVER_CONFIG.numbering.series;
export type StockMovementType = (typeof SERVER_CONFIG.inventory.movementTypes)[number];
export type StockReferenceType = (typeof SERVER_CONFIG.inventory.referenceTypes)[number];

/**
 * Helper functions
 */

/**
 * Get pagination params with defaults and bounds
 */
export function getPaginationParams(page?: number, limit?: number): { page: number; limit: number; offset: number } {
  const { defaultPageSize, maxPageSize, minPageSize } = SERVER_CONFIG.pagination;

  const validPage = Math.max(1, page || 1);
  const validLimit = Math.min(maxPageSize, Math.max(minPageSize, limit || defaultPageSize));
  const offset = (validPage - 1) * validLimit;

  return { page: validPage, limit: validLimit, offset };
}

/**
 * Fill a series template from a date, e.g. `CHN-{YYYYMM}` -> `CHN-202610`
 */
export function resolveSeries(template: string, date: Date): string {
  const year = String(date.getUTCFullYear());
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');

  return template
    .replace('{YYYYMM}', `${year}${month}`)
    .replace('{YYYY}', year)
    .replace('{MM}', month);
}

/**
 * Series for a numbered entity on a given date
 */
export function getSeries(entity: NumberedEntity, date: Date): string {
  return resolveSeries(SERVER_CONFIG.numbering.series[entity], date);
}

export default SERVER_CONFIG;
