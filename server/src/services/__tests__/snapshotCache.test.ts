import { SnapshotCache } from '../snapshotCache.js';

type Snapshots = { items: string[]; count: number };

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('SnapshotCache', () => {
    it('loads on first read and serves the snapshot afterwards', async () => {
        const load = vi.fn(() => Promise.resolve(['a']));
        const cache = new SnapshotCache<Snapshots>({ items: load, count: () => Promise.resolve(1) });

        expect(await cache.getOrRefresh('items')).toEqual(['a']);
        expect(await cache.getOrRefresh('items')).toEqual(['a']);
        expect(load).toHaveBeenCalledTimes(1);
        expect(cache.has('items')).toBe(true);
        expect(cache.has('count')).toBe(false);
    });

    it('shares one load between concurrent misses', async () => {
        const gate = deferred<string[]>();
        const load = vi.fn(() => gate.promise);
        const cache = new SnapshotCache<Snapshots>({ items: load, count: () => Promise.resolve(1) });

        const first = cache.getOrRefresh('items');
        const second = cache.getOrRefresh('items');
        gate.resolve(['a']);

        expect(await first).toEqual(['a']);
        expect(await second).toEqual(['a']);
        expect(load).toHaveBeenCalledTimes(1);
    });

    it('freezes published snapshots', async () => {
        const cache = new SnapshotCache<Snapshots>({ items: () => Promise.resolve(['a']), count: () => Promise.resolve(1) });
        const items = await cache.getOrRefresh('items');
        expect(Object.isFrozen(items)).toBe(true);
    });

    it('keeps the newer snapshot when an older load finishes last', async () => {
        const slow = deferred<string[]>();
        const fast = deferred<string[]>();
        const loads = [slow.promise, fast.promise];
        const cache = new SnapshotCache<Snapshots>({
            items: () => loads.shift() ?? Promise.resolve([]),
            count: () => Promise.resolve(1),
        });

        const older = cache.refresh('items');
        const newer = cache.refresh('items');
        fast.resolve(['new']);
        await newer;
        slow.resolve(['old']);

        expect(await older).toEqual(['old']);
        expect(cache.peek('items')).toEqual(['new']);
    });

    it('does not publish a load that was running when the key was invalidated', async () => {
        const loads = [Promise.resolve(['first'])];
        const late = deferred<string[]>();
        loads.push(late.promise);
        const cache = new SnapshotCache<Snapshots>({
            items: () => loads.shift() ?? Promise.resolve(['fresh']),
            count: () => Promise.resolve(1),
        });

        await cache.getOrRefresh('items');
        const running = cache.refresh('items');
        expect(cache.invalidate('items')).toBe(true);
        late.resolve(['stale']);
        await running;

        expect(cache.peek('items')).toBeNull();
        expect(await cache.getOrRefresh('items')).toEqual(['fresh']);
    });

    it('cancels a first load still running and starts a fresh one on the next read', async () => {
        const first = deferred<string[]>();
        const loads = [first.promise];
        const load = vi.fn(() => loads.shift() ?? Promise.resolve(['fresh']));
        const cache = new SnapshotCache<Snapshots>({ items: load, count: () => Promise.resolve(1) });

        const running = cache.getOrRefresh('items');
        expect(cache.invalidate('items')).toBe(true);
        const next = cache.getOrRefresh('items');
        first.resolve(['stale']);

        expect(await running).toEqual(['stale']);
        expect(await next).toEqual(['fresh']);
        expect(load).toHaveBeenCalledTimes(2);
        expect(cache.peek('items')).toEqual(['fresh']);
        expect(cache.invalidate('count')).toBe(false);
    });

    it('invalidate is a no-op when nothing is cached', () => {
        const cache = new SnapshotCache<Snapshots>({ items: () => Promise.resolve([]), count: () => Promise.resolve(1) });
        expect(cache.invalidate('items')).toBe(false);
    });

    it('lets the next read retry after a failed load', async () => {
        const load = vi.fn<() => Promise<string[]>>()
            .mockRejectedValueOnce(new Error('store down'))
            .mockResolvedValueOnce(['a']);
        const cache = new SnapshotCache<Snapshots>({ items: load, count: () => Promise.resolve(1) });

        await expect(cache.getOrRefresh('items')).rejects.toThrow('store down');
        expect(await cache.getOrRefresh('items')).toEqual(['a']);
    });

    it('lists cached keys with their store time', async () => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
        try {
            const cache = new SnapshotCache<Snapshots>({ items: () => Promise.resolve([]), count: () => Promise.resolve(3) });
            await cache.getOrRefresh('count');
            expect(cache.snapshots()).toEqual([{ key: 'count', cachedAt: new Date('2026-03-01T12:00:00Z') }]);
        } finally {
            vi.useRealTimers();
        }
    });
});
