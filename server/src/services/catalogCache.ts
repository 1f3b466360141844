/**
 * Catalog Cache
 *
 * Process-wide snapshots of the product catalog and the business settings.
 * Reads never hit the store once a snapshot exists; the catalog poller
 * pushes product refreshes when the upstream marker moves.
 */

import type { BusinessSettings, Product } from '@tillsync/shared';
import { CACHE_KEYS, type FlushCategory } from '../config/index.js';
import { cacheLogger } from '../utils/logger.js';
import type { CatalogRepository } from './catalogRepository.js';
import type { SettingsRepository } from './settingsRepository.js';
import { SnapshotCache } from './snapshotCache.js';

type CatalogSnapshots = {
    products: readonly Product[];
    settings: BusinessSettings;
};

export interface CatalogCacheStats {
    cachedKeys: string[];
    cachedAt: Record<string, string>;
    productCount: number | null;
    lastMarker: string | null;
    lastMarkerObservedAt: string | null;
}

export interface FlushResult {
    category: FlushCategory;
    /** Keys that held a snapshot or a running load, now dropped */
    flushed: string[];
}

export class CatalogCache {
    private readonly cache: SnapshotCache<CatalogSnapshots>;
    private marker: Date | null = null;
    private markerObservedAt: Date | null = null;

    constructor(catalog: CatalogRepository, settings: SettingsRepository) {
        this.cache = new SnapshotCache<CatalogSnapshots>({
            [CACHE_KEYS.products]: () => catalog.listProducts(),
            [CACHE_KEYS.settings]: () => settings.load(),
        });
    }

    getProducts(): Promise<readonly Product[]> {
        return this.cache.getOrRefresh(CACHE_KEYS.products);
    }

    getSettings(): Promise<BusinessSettings> {
        return this.cache.getOrRefresh(CACHE_KEYS.settings);
    }

    async refreshProducts(): Promise<readonly Product[]> {
        const products = await this.cache.refresh(CACHE_KEYS.products);
        cacheLogger.info({ productCount: products.length }, 'Product snapshot refreshed');
        return products;
    }

    async refreshSettings(): Promise<BusinessSettings> {
        return this.cache.refresh(CACHE_KEYS.settings);
    }

    /** Last upstream catalog marker the poller acted on */
    get lastMarker(): Date | null {
        return this.marker;
    }

    recordMarker(marker: Date, observedAt: Date = new Date()): void {
        this.marker = marker;
        this.markerObservedAt = observedAt;
    }

    /**
     * Evict by category. Nothing is reloaded here; the next read loads.
     * Flushing products also forgets the marker so the poller refreshes
     * on its next run.
     */
    flush(category: FlushCategory): FlushResult {
        const flushed: string[] = [];

        if (category === 'products' || category === 'all') {
            if (this.cache.invalidate(CACHE_KEYS.products)) flushed.push(CACHE_KEYS.products);
            this.marker = null;
            this.markerObservedAt = null;
        }
        if (category === 'settings' || category === 'all') {
            if (this.cache.invalidate(CACHE_KEYS.settings)) flushed.push(CACHE_KEYS.settings);
        }

        cacheLogger.info({ category, flushed }, 'Catalog cache flushed');
        return { category, flushed };
    }

    getStats(): CatalogCacheStats {
        const snapshots = this.cache.snapshots();
        const products = this.cache.peek(CACHE_KEYS.products);

        return {
            cachedKeys: snapshots.map(s => s.key),
            cachedAt: Object.fromEntries(snapshots.map(s => [s.key, s.cachedAt.toISOString()])),
            productCount: products ? products.length : null,
            lastMarker: this.marker ? this.marker.toISOString() : null,
            lastMarkerObservedAt: this.markerObservedAt ? this.markerObservedAt.toISOString() : null,
        };
    }
}
