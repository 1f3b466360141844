/**
 * Outbox Reconciler
 *
 * Drains the sync outbox: re-mirrors orders the POS never received and
 * re-applies stock ledger lines that failed. Both steps are idempotent,
 * keyed by transaction id, so a retry after a partial success is safe.
 * Mirror entries wait, without using up an attempt, while the mirror
 * circuit is open.
 */

import { isPosIntegrationEnabled } from '@tillsync/shared';
import { OUTBOX_BATCH_SIZE, OUTBOX_RECONCILE_INTERVAL_MINUTES } from '../config/index.js';
import { syncLogger, errorMessage } from '../utils/logger.js';
import type { TriggerType, WorkerRunTracker } from '../utils/workerRunTracker.js';
import type { CatalogCache } from './catalogCache.js';
import type { PosMirror } from './posMirror.js';
import type { StockLedgerService } from './stockLedgerService.js';
import type { OutboxEntry, SyncOutbox } from './syncOutbox.js';
import type { TransactionRepository } from './transactionRepository.js';

// ============================================
// TYPES & INTERFACES
// ============================================

export type EntryOutcome = 'resolved' | 'retry' | 'dead' | 'deferred';

export interface ReconcileResult {
    startedAt: string;
    found: number;
    resolved: number;
    retrying: number;
    dead: number;
    /** Mirror entries held back while the circuit was open */
    deferred: number;
    durationMs: number;
    error: string | null;
}

export interface ReconcilerStatus {
    isRunning: boolean;
    schedulerActive: boolean;
    intervalMinutes: number;
    lastRunAt: Date | null;
    lastRunResult: ReconcileResult | null;
}

export interface OutboxReconcilerDeps {
    outbox: SyncOutbox;
    transactions: TransactionRepository;
    mirror: PosMirror;
    ledger: StockLedgerService;
    cache: CatalogCache;
    tracker: WorkerRunTracker;
}

export interface OutboxReconcilerOptions {
    intervalMinutes?: number;
    batchSize?: number;
}

export interface OutboxReconciler {
    start(): void;
    stop(): void;
    getStatus(): ReconcilerStatus;
    triggerReconcile(): Promise<ReconcileResult | null>;
    runReconcile(): Promise<ReconcileResult | null>;
    reconcileEntry(entry: OutboxEntry): Promise<EntryOutcome>;
}

const WORKER_NAME = 'outbox_reconcile';

// ============================================
// FACTORY
// ============================================

export function createOutboxReconciler(
    deps: OutboxReconcilerDeps,
    options: OutboxReconcilerOptions = {}
): OutboxReconciler {
    const intervalMinutes = options.intervalMinutes ?? OUTBOX_RECONCILE_INTERVAL_MINUTES;
    const batchSize = options.batchSize ?? OUTBOX_BATCH_SIZE;

    let reconcileInterval: ReturnType<typeof setInterval> | null = null;
    let isRunning = false;
    let lastRunAt: Date | null = null;
    let lastRunResult: ReconcileResult | null = null;

    async function failAttempt(entry: OutboxEntry, error: string, remaining?: readonly string[]): Promise<EntryOutcome> {
        const status = await deps.outbox.markAttemptFailed(entry, error, remaining);
        return status === 'dead' ? 'dead' : 'retry';
    }

    async function reconcileMirror(entry: OutboxEntry): Promise<EntryOutcome> {
        if (deps.mirror.isPaused()) return 'deferred';

        const transaction = await deps.transactions.get(entry.transactionId);
        if (!transaction) return failAttempt(entry, 'Transaction not found');

        const settings = await deps.cache.getSettings();
        if (!isPosIntegrationEnabled(settings, entry.branchId)) {
            syncLogger.info({ outboxId: entry.id, branchId: entry.branchId }, 'POS integration disabled for branch, dropping mirror entry');
            await deps.outbox.markResolved(entry.id);
            return 'resolved';
        }

        try {
            await deps.mirror.write(entry.branchId, transaction);
        } catch (error) {
            return failAttempt(entry, errorMessage(error));
        }

        await deps.outbox.markResolved(entry.id);
        return 'resolved';
    }

    async function reconcileLedger(entry: OutboxEntry): Promise<EntryOutcome> {
        const transaction = await deps.transactions.get(entry.transactionId);
        if (!transaction) return failAttempt(entry, 'Transaction not found');

        const { failures } = await deps.ledger.applyTransaction(transaction, new Set(entry.productIds));
        const remaining = failures.map(f => f.productId);
        const lastError = failures.map(f => f.error.originalError?.message ?? f.error.message).join('; ');

        if (remaining.length > 0) return failAttempt(entry, lastError, remaining);

        await deps.outbox.markResolved(entry.id);
        return 'resolved';
    }

    async function reconcileEntry(entry: OutboxEntry): Promise<EntryOutcome> {
        return entry.kind === 'mirror' ? reconcileMirror(entry) : reconcileLedger(entry);
    }

    async function runReconcile(): Promise<ReconcileResult | null> {
        if (isRunning) {
            syncLogger.debug('Outbox reconciliation already in progress, skipping');
            return null;
        }

        isRunning = true;
        const startTime = Date.now();
        const result: ReconcileResult = {
            startedAt: new Date().toISOString(),
            found: 0,
            resolved: 0,
            retrying: 0,
            dead: 0,
            deferred: 0,
            durationMs: 0,
            error: null,
        };

        try {
            const pending = await deps.outbox.listPending(batchSize);
            result.found = pending.length;

            for (const entry of pending) {
                try {
                    const outcome = await reconcileEntry(entry);
                    if (outcome === 'resolved') result.resolved++;
                    else if (outcome === 'dead') result.dead++;
                    else if (outcome === 'deferred') result.deferred++;
                    else result.retrying++;
                } catch (error) {
                    result.retrying++;
                    syncLogger.error(
                        { outboxId: entry.id, transactionId: entry.transactionId, branchId: entry.branchId, error: errorMessage(error) },
                        'Outbox entry reconciliation failed'
                    );
                }
            }

            if (result.found > 0) {
                syncLogger.info(
                    { found: result.found, resolved: result.resolved, retrying: result.retrying, dead: result.dead, deferred: result.deferred },
                    'Outbox reconciliation complete'
                );
            }
            lastRunAt = new Date();
        } catch (error) {
            result.error = errorMessage(error);
            syncLogger.error({ error: result.error }, 'Outbox reconciliation failed');
        } finally {
            result.durationMs = Date.now() - startTime;
            lastRunResult = result;
            isRunning = false;
        }

        return result;
    }

    function runTracked(triggeredBy: TriggerType): void {
        deps.tracker.track(WORKER_NAME, runReconcile, triggeredBy).catch((err: unknown) => {
            syncLogger.error({ error: errorMessage(err) }, 'Outbox reconciliation run failed');
        });
    }

    function start(): void {
        if (reconcileInterval) {
            syncLogger.debug('Outbox reconciler already running');
            return;
        }

        syncLogger.info({ intervalMinutes }, 'Starting outbox reconciler');
        reconcileInterval = setInterval(() => runTracked('scheduled'), intervalMinutes * 60 * 1000);
    }

    function stop(): void {
        if (reconcileInterval) {
            clearInterval(reconcileInterval);
            reconcileInterval = null;
            syncLogger.info('Outbox reconciler stopped');
        }
    }

    function getStatus(): ReconcilerStatus {
        return {
            isRunning,
            schedulerActive: reconcileInterval !== null,
            intervalMinutes,
            lastRunAt,
            lastRunResult,
        };
    }

    function triggerReconcile(): Promise<ReconcileResult | null> {
        return deps.tracker.track(WORKER_NAME, runReconcile, 'manual');
    }

    return { start, stop, getStatus, triggerReconcile, runReconcile, reconcileEntry };
}
