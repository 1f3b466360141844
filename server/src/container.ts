/**
 * Service wiring
 *
 * Builds every service over one document store. The entry point builds one
 * container per process; tests build one per case over a memory store.
 */

import { POS_WRITE_TIMEOUT_MS } from './config/index.js';
import type { DocumentStore } from './lib/store/index.js';
import { KeyedLock } from './utils/keyedLock.js';
import { WorkerRunTracker } from './utils/workerRunTracker.js';
import { CartStore } from './services/cartStore.js';
import { CatalogCache } from './services/catalogCache.js';
import { CatalogRepository } from './services/catalogRepository.js';
import { createCatalogSyncWorker, type CatalogSyncWorker } from './services/catalogSyncWorker.js';
import { CheckoutService } from './services/checkoutService.js';
import { OrderStatusService } from './services/orderStatusService.js';
import { MirrorCircuit } from './services/mirrorCircuit.js';
import { createOutboxReconciler, type OutboxReconciler } from './services/outboxReconciler.js';
import { PosMirror } from './services/posMirror.js';
import { SettingsRepository } from './services/settingsRepository.js';
import { StockLedgerService } from './services/stockLedgerService.js';
import { SyncOutbox } from './services/syncOutbox.js';
import { TransactionRepository } from './services/transactionRepository.js';

export interface ContainerOptions {
    posWriteTimeoutMs?: number;
    catalogSyncIntervalMinutes?: number;
    catalogSyncStartupDelayMs?: number;
    outboxReconcileIntervalMinutes?: number;
    /** Circuit guarding POS mirror writes */
    circuit?: MirrorCircuit;
    clock?: () => Date;
}

export interface Container {
    store: DocumentStore;
    circuit: MirrorCircuit;
    tracker: WorkerRunTracker;
    catalog: CatalogRepository;
    settings: SettingsRepository;
    transactions: TransactionRepository;
    carts: CartStore;
    cache: CatalogCache;
    mirror: PosMirror;
    ledger: StockLedgerService;
    outbox: SyncOutbox;
    checkout: CheckoutService;
    orders: OrderStatusService;
    catalogSync: CatalogSyncWorker;
    reconciler: OutboxReconciler;
}

export function createContainer(store: DocumentStore, options: ContainerOptions = {}): Container {
    const circuit = options.circuit ?? new MirrorCircuit();
    const tracker = new WorkerRunTracker(store);

    const catalog = new CatalogRepository(store);
    const settings = new SettingsRepository(store);
    const transactions = new TransactionRepository(store);
    const carts = new CartStore(store);
    const cache = new CatalogCache(catalog, settings);
    const mirror = new PosMirror(store, circuit, { writeTimeoutMs: options.posWriteTimeoutMs ?? POS_WRITE_TIMEOUT_MS });
    const ledger = new StockLedgerService(store, catalog, new KeyedLock());
    const outbox = new SyncOutbox(store);

    const checkout = new CheckoutService({
        catalog, cache, transactions, mirror, ledger, outbox, carts, clock: options.clock,
    });
    const orders = new OrderStatusService({ transactions, cache, mirror, outbox, clock: options.clock });

    const catalogSync = createCatalogSyncWorker(
        { catalog, cache, tracker },
        { intervalMinutes: options.catalogSyncIntervalMinutes, startupDelayMs: options.catalogSyncStartupDelayMs }
    );
    const reconciler = createOutboxReconciler(
        { outbox, transactions, mirror, ledger, cache, tracker },
        { intervalMinutes: options.outboxReconcileIntervalMinutes }
    );

    return {
        store, circuit, tracker,
        catalog, settings, transactions, carts, cache,
        mirror, ledger, outbox,
        checkout, orders,
        catalogSync, reconciler,
    };
}
