/**
 * Transaction Repository
 *
 * Primary store for online orders, plus the per-day counter that hands out
 * `order_{yyyyMMdd}_{NNNN}` ids.
 */

import {
    TransactionSchema,
    formatDateKey,
    formatTransactionId,
    type Transaction,
} from '@tillsync/shared';
import { COLLECTIONS, transactionCounterId } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';

export class TransactionRepository {
    constructor(private readonly store: DocumentStore) {}

    /** Next id for the UTC day of `now`. Atomic across processes */
    async nextId(now: Date): Promise<string> {
        const dateKey = formatDateKey(now);
        const sequence = await this.store.increment(COLLECTIONS.counters, transactionCounterId(dateKey), 'value');
        return formatTransactionId(dateKey, sequence);
    }

    async save(transaction: Transaction): Promise<void> {
        await this.store.set(COLLECTIONS.transactions, transaction.id, transaction);
    }

    async get(id: string): Promise<Transaction | null> {
        const doc = await this.store.get(COLLECTIONS.transactions, id);
        return doc ? TransactionSchema.parse(doc.data) : null;
    }
}
