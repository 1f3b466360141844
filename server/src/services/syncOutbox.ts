/**
 * Sync Outbox
 *
 * Durable record of checkout side effects that did not complete (POS mirror
 * writes, stock ledger updates). One entry per (kind, transaction); the
 * reconciliation worker retries pending entries until they succeed or run
 * out of attempts.
 */

import { z } from 'zod';
import { COLLECTIONS, OUTBOX_MAX_ATTEMPTS } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';
import { syncLogger } from '../utils/logger.js';

// ============================================
// SCHEMA
// ============================================

export const OUTBOX_KINDS = ['mirror', 'ledger'] as const;
export type OutboxKind = typeof OUTBOX_KINDS[number];

export const OUTBOX_STATUSES = ['pending', 'resolved', 'dead'] as const;
export type OutboxStatus = typeof OUTBOX_STATUSES[number];

const OutboxEntrySchema = z.object({
    kind: z.enum(OUTBOX_KINDS),
    transactionId: z.string(),
    branchId: z.string(),
    /** Ledger entries: products still to apply */
    productIds: z.array(z.string()),
    status: z.enum(OUTBOX_STATUSES),
    attempts: z.number().int(),
    lastError: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

export type OutboxEntryData = z.infer<typeof OutboxEntrySchema>;

export interface OutboxEntry extends OutboxEntryData {
    id: string;
}

export interface RecordOutboxInput {
    kind: OutboxKind;
    transactionId: string;
    branchId: string;
    productIds?: readonly string[];
    error: string;
}

export function outboxEntryId(kind: OutboxKind, transactionId: string): string {
    return `${kind}_${transactionId}`;
}

// ============================================
// OUTBOX
// ============================================

export class SyncOutbox {
    constructor(
        private readonly store: DocumentStore,
        private readonly maxAttempts: number = OUTBOX_MAX_ATTEMPTS
    ) {}

    /**
     * Park a failed step. Recording the same step again merges product ids
     * and re-opens the entry, keeping its attempt count.
     */
    async record(input: RecordOutboxInput, now: Date = new Date()): Promise<OutboxEntry> {
        const id = outboxEntryId(input.kind, input.transactionId);
        const existing = await this.get(id);
        const stamp = now.toISOString();

        const entry: OutboxEntryData = {
            kind: input.kind,
            transactionId: input.transactionId,
            branchId: input.branchId,
            productIds: [...new Set([...(existing?.productIds ?? []), ...(input.productIds ?? [])])],
            status: 'pending',
            attempts: existing?.attempts ?? 0,
            lastError: input.error,
            createdAt: existing?.createdAt ?? stamp,
            updatedAt: stamp,
        };

        await this.store.set(COLLECTIONS.syncOutbox, id, entry);
        syncLogger.info({ outboxId: id, transactionId: input.transactionId, branchId: input.branchId }, 'Recorded sync outbox entry');
        return { id, ...entry };
    }

    async get(id: string): Promise<OutboxEntry | null> {
        const doc = await this.store.get(COLLECTIONS.syncOutbox, id);
        return doc ? { id: doc.id, ...OutboxEntrySchema.parse(doc.data) } : null;
    }

    /** Pending entries, oldest first */
    async listPending(limit?: number): Promise<OutboxEntry[]> {
        const docs = await this.store.where(COLLECTIONS.syncOutbox, 'status', 'pending');
        const entries = docs
            .map(doc => ({ id: doc.id, ...OutboxEntrySchema.parse(doc.data) }))
            .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
        return limit === undefined ? entries : entries.slice(0, limit);
    }

    async markResolved(id: string, now: Date = new Date()): Promise<void> {
        await this.store.patch(COLLECTIONS.syncOutbox, id, {
            status: 'resolved',
            productIds: [],
            updatedAt: now.toISOString(),
        });
    }

    /**
     * Count a failed retry. Once attempts reach the limit the entry is
     * parked as dead.
     */
    async markAttemptFailed(
        entry: OutboxEntry,
        error: string,
        remainingProductIds: readonly string[] = entry.productIds,
        now: Date = new Date()
    ): Promise<OutboxStatus> {
        const attempts = entry.attempts + 1;
        const status: OutboxStatus = attempts >= this.maxAttempts ? 'dead' : 'pending';

        await this.store.patch(COLLECTIONS.syncOutbox, entry.id, {
            attempts,
            status,
            lastError: error,
            productIds: [...remainingProductIds],
            updatedAt: now.toISOString(),
        });

        if (status === 'dead') {
            syncLogger.error(
                { outboxId: entry.id, transactionId: entry.transactionId, branchId: entry.branchId, attempts, error },
                'Sync outbox entry gave up after max attempts'
            );
        }
        return status;
    }
}
