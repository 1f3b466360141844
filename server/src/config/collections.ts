/**
 * Document store collection names
 */

export const COLLECTIONS = {
    /** Catalog documents, in POS field naming */
    products: 'products',
    /** One stock ledger per product */
    stockItems: 'stockItems',
    transactions: 'transactions',
    /** Per-day transaction sequence counters */
    counters: 'counters',
    /** Durable cart backups keyed by customer */
    carts: 'carts',
    /** Business settings live at configuration/branch */
    configuration: 'configuration',
    syncOutbox: 'syncOutbox',
    workerRuns: 'workerRuns',
} as const;

/** Id of the business settings document */
export const SETTINGS_DOCUMENT_ID = 'branch';

/** Counter document for one day of transaction ids */
export function transactionCounterId(dateKey: string): string {
    return `counter_orders_${dateKey}`;
}
