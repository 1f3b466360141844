/**
 * Worker Registry - single source of truth for background workers.
 *
 * The entry point calls startAllWorkers() on startup. Every worker started
 * here is also registered with the shutdown coordinator.
 */

import type { Container } from '../container.js';
import type { ShutdownCoordinator } from '../utils/shutdownCoordinator.js';
import { syncLogger } from '../utils/logger.js';

interface WorkerEntry {
    name: string;
    start: () => void;
    stop: () => void | Promise<void>;
    shutdownTimeout?: number;
}

export interface StartWorkersOptions {
    /** Skip starting workers (DISABLE_BACKGROUND_WORKERS) */
    disabled?: boolean;
}

export function listWorkers(container: Container): WorkerEntry[] {
    return [
        { name: 'catalogSync', start: () => container.catalogSync.start(), stop: () => container.catalogSync.stop() },
        { name: 'outboxReconciler', start: () => container.reconciler.start(), stop: () => container.reconciler.stop() },
    ];
}

/**
 * Returns the names of the workers that were started
 */
export async function startAllWorkers(
    container: Container,
    coordinator: ShutdownCoordinator,
    options: StartWorkersOptions = {}
): Promise<string[]> {
    // Runs left "running" by the previous process
    await container.tracker.cleanupStaleRuns();

    if (options.disabled) {
        syncLogger.warn('Background workers disabled (DISABLE_BACKGROUND_WORKERS=true)');
        return [];
    }

    const started: string[] = [];
    for (const w of listWorkers(container)) {
        w.start();
        coordinator.register(w.name, w.stop, w.shutdownTimeout ?? 5000);
        started.push(w.name);
    }
    return started;
}
