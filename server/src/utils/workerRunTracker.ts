/**
 * Worker Run Tracker
 *
 * Wraps worker execution to persist run history in the workerRuns
 * collection. Best-effort: if the store write fails, the worker still runs.
 */

import { randomUUID } from 'node:crypto';
import { COLLECTIONS } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';
import logger, { errorMessage } from './logger.js';

const runLogger = logger.child({ module: 'worker-run-tracker' });

export type TriggerType = 'scheduled' | 'manual' | 'startup';

export type WorkerRunStatus = 'running' | 'completed' | 'failed';

export class WorkerRunTracker {
    constructor(private readonly store: DocumentStore) {}

    /**
     * Run `fn`, recording a "running" document first and "completed" or
     * "failed" after. Errors from `fn` are re-thrown unchanged.
     */
    async track<T>(workerName: string, fn: () => Promise<T>, triggeredBy: TriggerType = 'scheduled'): Promise<T> {
        const startedAt = new Date();
        const runId = `${workerName}_${randomUUID()}`;
        const base = { workerName, triggeredBy, startedAt: startedAt.toISOString() };

        const created = await this.write(runId, { ...base, status: 'running' });

        try {
            const result = await fn();
            if (created) {
                await this.write(runId, {
                    ...base,
                    status: 'completed',
                    completedAt: new Date().toISOString(),
                    durationMs: Date.now() - startedAt.getTime(),
                    result: result ?? null,
                });
            }
            return result;
        } catch (error) {
            if (created) {
                await this.write(runId, {
                    ...base,
                    status: 'failed',
                    completedAt: new Date().toISOString(),
                    durationMs: Date.now() - startedAt.getTime(),
                    error: errorMessage(error),
                });
            }
            throw error;
        }
    }

    /**
     * Mark runs still "running" as failed. Called once on startup: those
     * runs were cut off by a restart.
     */
    async cleanupStaleRuns(): Promise<number> {
        try {
            const stale = await this.store.where(COLLECTIONS.workerRuns, 'status', 'running');
            for (const run of stale) {
                await this.store.patch(COLLECTIONS.workerRuns, run.id, {
                    status: 'failed',
                    error: 'Server restarted before completion',
                    completedAt: new Date().toISOString(),
                });
            }
            if (stale.length > 0) {
                runLogger.info({ count: stale.length }, 'Marked stale worker runs as failed');
            }
            return stale.length;
        } catch (err) {
            runLogger.warn({ error: errorMessage(err) }, 'Failed to cleanup stale runs');
            return 0;
        }
    }

    private async write(runId: string, data: Record<string, unknown>): Promise<boolean> {
        try {
            await this.store.set(COLLECTIONS.workerRuns, runId, data);
            return true;
        } catch (err) {
            runLogger.warn({ runId, error: errorMessage(err) }, 'Failed to write worker run');
            return false;
        }
    }
}
