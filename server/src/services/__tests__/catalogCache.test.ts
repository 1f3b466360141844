import { COLLECTIONS } from '../../config/index.js';
import { MemoryDocumentStore } from '../../lib/store/index.js';
import { CatalogCache } from '../catalogCache.js';
import { CatalogRepository } from '../catalogRepository.js';
import { SettingsRepository } from '../settingsRepository.js';
import { seedProduct, seedSettings } from './helpers.js';

describe('CatalogCache', () => {
    let store: MemoryDocumentStore;
    let cache: CatalogCache;

    beforeEach(async () => {
        store = new MemoryDocumentStore();
        cache = new CatalogCache(new CatalogRepository(store), new SettingsRepository(store));
        await seedProduct(store, { id: 'soap', name: 'Soap', price: 25, stockQuantity: 10 });
    });

    it('serves products from the snapshot until refreshed', async () => {
        expect((await cache.getProducts()).map(p => p.id)).toEqual(['soap']);

        await seedProduct(store, { id: 'towel', name: 'Towel', price: 80 });
        expect((await cache.getProducts()).map(p => p.id)).toEqual(['soap']);

        await cache.refreshProducts();
        expect((await cache.getProducts()).map(p => p.id)).toEqual(['soap', 'towel']);
    });

    it('falls back to default settings when none are stored', async () => {
        const settings = await cache.getSettings();
        expect(settings).toMatchObject({ posIntegrationEnabled: false, branchId: 'default_branch', enableStockValidation: true });
    });

    it('reads stored settings and fills absent fields', async () => {
        await seedSettings(store, { branchId: 'maputo', posIntegrationEnabled: true });
        const settings = await cache.getSettings();
        expect(settings).toMatchObject({ branchId: 'maputo', posIntegrationEnabled: true, enableStockValidation: true, phone: '' });
    });

    describe('flush', () => {
        it('evicts only what was cached', async () => {
            await cache.getSettings();
            expect(cache.flush('all')).toEqual({ category: 'all', flushed: ['settings'] });
        });

        it('reloads on the next read after a flush', async () => {
            await cache.getProducts();
            await store.delete(COLLECTIONS.products, 'soap');

            expect(cache.flush('products')).toEqual({ category: 'products', flushed: ['products'] });
            expect(await cache.getProducts()).toEqual([]);
        });

        it('drops a products load that was still running', async () => {
            const running = cache.getProducts();
            expect(cache.flush('products')).toEqual({ category: 'products', flushed: ['products'] });
            await store.delete(COLLECTIONS.products, 'soap');

            expect(await cache.getProducts()).toEqual([]);
            await running;
            expect(cache.getStats().productCount).toBe(0);
        });

        it('forgets the catalog marker when products are flushed', async () => {
            cache.recordMarker(new Date('2026-03-01T10:00:00Z'));
            cache.flush('settings');
            expect(cache.lastMarker).toEqual(new Date('2026-03-01T10:00:00Z'));

            cache.flush('products');
            expect(cache.lastMarker).toBeNull();
        });
    });

    it('reports cache statistics', async () => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
        try {
            expect(cache.getStats()).toEqual({
                cachedKeys: [],
                cachedAt: {},
                productCount: null,
                lastMarker: null,
                lastMarkerObservedAt: null,
            });

            await cache.getProducts();
            cache.recordMarker(new Date('2026-03-01T11:00:00Z'), new Date('2026-03-01T11:30:00Z'));

            expect(cache.getStats()).toEqual({
                cachedKeys: ['products'],
                cachedAt: { products: '2026-03-01T12:00:00.000Z' },
                productCount: 1,
                lastMarker: '2026-03-01T11:00:00.000Z',
                lastMarkerObservedAt: '2026-03-01T11:30:00.000Z',
            });
        } finally {
            vi.useRealTimers();
        }
    });
});
