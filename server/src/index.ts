/**
 * Server entry point
 *
 * Loads env, opens the document store, mounts the app and starts the
 * background workers. SIGINT/SIGTERM drain everything through the
 * shutdown coordinator.
 */

import type { Server } from 'node:http';
import { env } from './config/env.js';
import { createApp } from './app.js';
import { createContainer } from './container.js';
import { createKysely, destroyKysely } from './db/createKysely.js';
import { ensureDocumentsTable } from './db/schema.js';
import { MemoryDocumentStore, PostgresDocumentStore, type DocumentStore } from './lib/store/index.js';
import { startAllWorkers } from './services/workerRegistry.js';
import logger, { errorMessage } from './utils/logger.js';
import shutdownCoordinator from './utils/shutdownCoordinator.js';

async function openStore(): Promise<DocumentStore> {
    if (env.STORE_DRIVER === 'memory' || !env.DATABASE_URL) {
        logger.warn('Using in-memory document store; nothing survives a restart');
        return new MemoryDocumentStore();
    }

    const db = createKysely(env.DATABASE_URL);
    await ensureDocumentsTable(db);
    shutdownCoordinator.register('database', destroyKysely, 5000);
    return new PostgresDocumentStore(db);
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
    });
}

async function main(): Promise<void> {
    const store = await openStore();
    const container = createContainer(store, {
        posWriteTimeoutMs: env.POS_WRITE_TIMEOUT_MS,
        catalogSyncIntervalMinutes: env.CATALOG_SYNC_INTERVAL_MINUTES,
        catalogSyncStartupDelayMs: env.CATALOG_SYNC_STARTUP_DELAY_MS,
        outboxReconcileIntervalMinutes: env.OUTBOX_RECONCILE_INTERVAL_MINUTES,
    });

    const app = createApp(container);
    const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT, store: env.STORE_DRIVER }, 'Server listening');
    });
    shutdownCoordinator.register('httpServer', () => closeServer(server), 10000);

    const started = await startAllWorkers(container, shutdownCoordinator, {
        disabled: env.DISABLE_BACKGROUND_WORKERS === 'true',
    });
    logger.info({ workers: started }, 'Background workers started');

    const onSignal = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutting down');
        shutdownCoordinator.shutdown()
            .then(results => {
                const failed = results.filter(r => !r.success);
                process.exit(failed.length > 0 ? 1 : 0);
            })
            .catch((error: unknown) => {
                logger.error({ error: errorMessage(error) }, 'Shutdown failed');
                process.exit(1);
            });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
    logger.fatal({ error: errorMessage(error) }, 'Server failed to start');
    process.exit(1);
});
