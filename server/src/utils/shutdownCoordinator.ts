/**
 * Shutdown Coordinator
 *
 * Runs registered stop handlers (pollers, reconciler, HTTP server, database
 * pool) in parallel on SIGINT/SIGTERM, each bounded by its own timeout.
 */

import { syncLogger, errorMessage } from './logger.js';
import { withTimeout, TimeoutError } from './timeout.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

type ShutdownHandlerFn = () => Promise<void> | void;

interface ShutdownHandler {
    name: string;
    handler: ShutdownHandlerFn;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private readonly handlers = new Map<string, ShutdownHandler>();
    private shuttingDown = false;

    /**
     * @param timeout - Max time to wait for the handler (ms)
     */
    register(name: string, handler: ShutdownHandlerFn, timeout = 10000): void {
        if (this.handlers.has(name)) {
            syncLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }

        this.handlers.set(name, { name, handler, timeout });
        syncLogger.debug({ name, timeout }, 'Shutdown handler registered');
    }

    unregister(name: string): void {
        if (this.handlers.delete(name)) {
            syncLogger.debug({ name }, 'Shutdown handler unregistered');
        }
    }

    isInProgress(): boolean {
        return this.shuttingDown;
    }

    registeredNames(): string[] {
        return Array.from(this.handlers.keys());
    }

    /**
     * Execute all shutdown handlers. A second call while one is running
     * returns an empty result.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.shuttingDown) {
            syncLogger.warn('Shutdown already in progress');
            return [];
        }

        this.shuttingDown = true;
        syncLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results = await Promise.all(
            Array.from(this.handlers.values()).map(entry => this.runHandler(entry))
        );

        const successful = results.filter(r => r.success).length;
        syncLogger.info({ successful, failed: results.length - successful, total: results.length }, 'Shutdown complete');
        return results;
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<ShutdownResult> {
        const start = Date.now();
        try {
            await withTimeout(Promise.resolve().then(handler), timeout, `Shutdown handler '${name}'`);
            const duration = Date.now() - start;
            syncLogger.debug({ name, duration }, 'Shutdown handler completed');
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            if (error instanceof TimeoutError) {
                syncLogger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', duration };
            }
            syncLogger.error({ name, error: errorMessage(error), duration }, 'Shutdown handler failed');
            return { name, success: false, error: errorMessage(error), duration };
        }
    }
}

// ============================================
// EXPORTS
// ============================================

export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
