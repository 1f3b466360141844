/**
 * Catalog Sync Worker
 *
 * Polls the upstream catalog marker (update/product) and refreshes the
 * product snapshot when the marker moves:
 * 1. Read the marker timestamp
 * 2. If no marker was acted on yet, or this one is newer, reload products
 *
 * A failed reload is logged as a CacheRefreshError and the stale snapshot
 * stays in place.
 */

import { CATALOG_SYNC_INTERVAL_MINUTES, CATALOG_SYNC_STARTUP_DELAY_MS } from '../config/index.js';
import { CacheRefreshError, toError } from '../utils/errors.js';
import { cacheLogger, errorMessage } from '../utils/logger.js';
import type { TriggerType, WorkerRunTracker } from '../utils/workerRunTracker.js';
import type { CatalogCache } from './catalogCache.js';
import type { CatalogRepository } from './catalogRepository.js';

// ============================================
// TYPES & INTERFACES
// ============================================

export interface CatalogSyncResult {
    startedAt: string;
    marker: string | null;
    previousMarker: string | null;
    refreshed: boolean;
    productCount: number | null;
    durationMs: number;
    error: string | null;
}

export interface CatalogSyncStatus {
    isRunning: boolean;
    schedulerActive: boolean;
    intervalMinutes: number;
    lastSyncAt: Date | null;
    lastSyncResult: CatalogSyncResult | null;
}

export interface CatalogSyncWorkerDeps {
    catalog: CatalogRepository;
    cache: CatalogCache;
    tracker: WorkerRunTracker;
}

export interface CatalogSyncWorkerOptions {
    intervalMinutes?: number;
    startupDelayMs?: number;
}

export interface CatalogSyncWorker {
    start(): void;
    stop(): void;
    getStatus(): CatalogSyncStatus;
    triggerSync(): Promise<CatalogSyncResult | null>;
    runSync(): Promise<CatalogSyncResult | null>;
}

const WORKER_NAME = 'catalog_sync';

// ============================================
// FACTORY
// ============================================

export function createCatalogSyncWorker(
    deps: CatalogSyncWorkerDeps,
    options: CatalogSyncWorkerOptions = {}
): CatalogSyncWorker {
    const intervalMinutes = options.intervalMinutes ?? CATALOG_SYNC_INTERVAL_MINUTES;
    const startupDelayMs = options.startupDelayMs ?? CATALOG_SYNC_STARTUP_DELAY_MS;
    const intervalMs = intervalMinutes * 60 * 1000;

    // State
    let startupTimeout: ReturnType<typeof setTimeout> | null = null;
    let syncInterval: ReturnType<typeof setInterval> | null = null;
    let isRunning = false;
    let lastSyncAt: Date | null = null;
    let lastSyncResult: CatalogSyncResult | null = null;

    async function runSync(): Promise<CatalogSyncResult | null> {
        if (isRunning) {
            cacheLogger.debug('Catalog sync already in progress, skipping');
            return null;
        }

        isRunning = true;
        const startTime = Date.now();
        const previous = deps.cache.lastMarker;

        const result: CatalogSyncResult = {
            startedAt: new Date().toISOString(),
            marker: null,
            previousMarker: previous ? previous.toISOString() : null,
            refreshed: false,
            productCount: null,
            durationMs: 0,
            error: null,
        };

        try {
            const marker = await deps.catalog.readMarker();
            result.marker = marker ? marker.toISOString() : null;

            if (!marker) {
                cacheLogger.debug('No catalog marker found, nothing to compare');
            } else if (!previous || marker.getTime() > previous.getTime()) {
                const observedAt = new Date();
                try {
                    const products = await deps.cache.refreshProducts();
                    result.productCount = products.length;
                } catch (error) {
                    throw new CacheRefreshError(`Failed to refresh products: ${errorMessage(error)}`, 'products', toError(error));
                }
                deps.cache.recordMarker(marker, observedAt);
                result.refreshed = true;
                cacheLogger.info({ marker: result.marker, previousMarker: result.previousMarker }, 'Catalog changed upstream, products refreshed');
            }

            lastSyncAt = new Date();
        } catch (error) {
            const refreshError = error instanceof CacheRefreshError
                ? error
                : new CacheRefreshError(`Catalog sync failed: ${errorMessage(error)}`, 'products', toError(error));
            cacheLogger.error({ error: refreshError.message, key: refreshError.key }, 'Catalog sync failed, keeping stale snapshot');
            result.error = refreshError.message;
        } finally {
            result.durationMs = Date.now() - startTime;
            lastSyncResult = result;
            isRunning = false;
        }

        return result;
    }

    function runTracked(triggeredBy: TriggerType): void {
        deps.tracker.track(WORKER_NAME, runSync, triggeredBy).catch((err: unknown) => {
            cacheLogger.error({ error: errorMessage(err) }, 'Catalog sync run failed');
        });
    }

    function start(): void {
        if (syncInterval || startupTimeout) {
            cacheLogger.debug('Catalog sync scheduler already running');
            return;
        }

        cacheLogger.info({ intervalMinutes, startupDelayMs }, 'Starting catalog sync scheduler');

        startupTimeout = setTimeout(() => {
            startupTimeout = null;
            runTracked('startup');
            syncInterval = setInterval(() => runTracked('scheduled'), intervalMs);
        }, startupDelayMs);
    }

    function stop(): void {
        if (startupTimeout) {
            clearTimeout(startupTimeout);
            startupTimeout = null;
        }
        if (syncInterval) {
            clearInterval(syncInterval);
            syncInterval = null;
            cacheLogger.info('Catalog sync scheduler stopped');
        }
    }

    function getStatus(): CatalogSyncStatus {
        return {
            isRunning,
            schedulerActive: syncInterval !== null || startupTimeout !== null,
            intervalMinutes,
            lastSyncAt,
            lastSyncResult,
        };
    }

    function triggerSync(): Promise<CatalogSyncResult | null> {
        return deps.tracker.track(WORKER_NAME, runSync, 'manual');
    }

    return { start, stop, getStatus, triggerSync, runSync };
}
