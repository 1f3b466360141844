import { CATALOG_MARKER, COLLECTIONS } from '../../config/index.js';
import { MemoryDocumentStore, type StoredDocument } from '../../lib/store/index.js';
import { WorkerRunTracker } from '../../utils/workerRunTracker.js';
import { CatalogCache } from '../catalogCache.js';
import { CatalogRepository } from '../catalogRepository.js';
import { createCatalogSyncWorker, type CatalogSyncWorker } from '../catalogSyncWorker.js';
import { SettingsRepository } from '../settingsRepository.js';
import { seedProduct } from './helpers.js';

class FlakyListStore extends MemoryDocumentStore {
    failList = false;

    override async list(collection: string): Promise<StoredDocument[]> {
        if (this.failList && collection === COLLECTIONS.products) throw new Error('store down');
        return super.list(collection);
    }
}

async function setMarker(store: MemoryDocumentStore, iso: string): Promise<void> {
    await store.set(CATALOG_MARKER.collection, CATALOG_MARKER.id, { [CATALOG_MARKER.field]: iso });
}

describe('catalogSyncWorker', () => {
    let store: FlakyListStore;
    let cache: CatalogCache;
    let worker: CatalogSyncWorker;

    beforeEach(async () => {
        store = new FlakyListStore();
        const catalog = new CatalogRepository(store);
        cache = new CatalogCache(catalog, new SettingsRepository(store));
        worker = createCatalogSyncWorker(
            { catalog, cache, tracker: new WorkerRunTracker(store) },
            { intervalMinutes: 1, startupDelayMs: 1000 }
        );
        await seedProduct(store, { id: 'soap', name: 'Soap', price: 25 });
    });

    afterEach(() => {
        worker.stop();
        vi.useRealTimers();
    });

    it('does nothing without a marker', async () => {
        const result = await worker.runSync();
        expect(result).toMatchObject({ marker: null, refreshed: false, productCount: null, error: null });
        expect(cache.getStats().cachedKeys).toEqual([]);
    });

    it('refreshes products the first time it sees a marker', async () => {
        await setMarker(store, '2026-03-01T10:00:00Z');

        const result = await worker.runSync();

        expect(result).toMatchObject({
            marker: '2026-03-01T10:00:00.000Z',
            previousMarker: null,
            refreshed: true,
            productCount: 1,
            error: null,
        });
        expect(cache.lastMarker).toEqual(new Date('2026-03-01T10:00:00Z'));
    });

    it('leaves the snapshot alone while the marker has not moved', async () => {
        await setMarker(store, '2026-03-01T10:00:00Z');
        await worker.runSync();
        await seedProduct(store, { id: 'towel', name: 'Towel', price: 80 });

        const result = await worker.runSync();

        expect(result?.refreshed).toBe(false);
        expect((await cache.getProducts()).map(p => p.id)).toEqual(['soap']);
    });

    it('picks up catalog edits once the marker moves forward', async () => {
        await setMarker(store, '2026-03-01T10:00:00Z');
        await worker.runSync();
        await seedProduct(store, { id: 'towel', name: 'Towel', price: 80 });
        await setMarker(store, '2026-03-01T10:05:00Z');

        const result = await worker.runSync();

        expect(result).toMatchObject({ refreshed: true, previousMarker: '2026-03-01T10:00:00.000Z', productCount: 2 });
        expect((await cache.getProducts()).map(p => p.id)).toEqual(['soap', 'towel']);
    });

    it('keeps the stale snapshot and the old marker when a refresh fails', async () => {
        await setMarker(store, '2026-03-01T10:00:00Z');
        await worker.runSync();
        await setMarker(store, '2026-03-01T10:05:00Z');
        store.failList = true;

        const result = await worker.runSync();

        expect(result).toMatchObject({ refreshed: false, error: 'Failed to refresh products: store down' });
        expect(cache.lastMarker).toEqual(new Date('2026-03-01T10:00:00Z'));
        expect((await cache.getProducts()).map(p => p.id)).toEqual(['soap']);
    });

    it('skips a run while another is in progress', async () => {
        await setMarker(store, '2026-03-01T10:00:00Z');
        const first = worker.runSync();
        const second = worker.runSync();

        expect(await second).toBeNull();
        expect((await first)?.refreshed).toBe(true);
    });

    it('runs after the startup delay and then on every interval', async () => {
        vi.useFakeTimers();
        await setMarker(store, '2026-03-01T10:00:00Z');

        worker.start();
        expect(worker.getStatus().schedulerActive).toBe(true);
        expect(worker.getStatus().lastSyncResult).toBeNull();

        await vi.advanceTimersByTimeAsync(1000);
        await vi.waitFor(() => expect(worker.getStatus().lastSyncResult?.refreshed).toBe(true));

        await setMarker(store, '2026-03-01T10:05:00Z');
        await vi.advanceTimersByTimeAsync(60_000);
        await vi.waitFor(() => expect(worker.getStatus().lastSyncResult?.marker).toBe('2026-03-01T10:05:00.000Z'));

        worker.stop();
        expect(worker.getStatus().schedulerActive).toBe(false);
    });

    it('records manual runs in the worker history', async () => {
        await worker.triggerSync();
        const runs = await store.where(COLLECTIONS.workerRuns, 'triggeredBy', 'manual');
        expect(runs).toHaveLength(1);
        expect(runs[0]?.data.workerName).toBe('catalog_sync');
    });
});
