import { ShutdownCoordinator } from '../shutdownCoordinator.js';

describe('ShutdownCoordinator', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('runs every registered handler and reports success', async () => {
        const coordinator = new ShutdownCoordinator();
        const stopA = vi.fn();
        const stopB = vi.fn(() => Promise.resolve());
        coordinator.register('a', stopA);
        coordinator.register('b', stopB);

        const results = await coordinator.shutdown();

        expect(stopA).toHaveBeenCalledTimes(1);
        expect(stopB).toHaveBeenCalledTimes(1);
        expect(results.map(r => [r.name, r.success])).toEqual([['a', true], ['b', true]]);
    });

    it('reports a failing handler without stopping the others', async () => {
        const coordinator = new ShutdownCoordinator();
        coordinator.register('broken', () => {
            throw new Error('close failed');
        });
        coordinator.register('fine', () => undefined);

        const results = await coordinator.shutdown();

        expect(results[0]).toMatchObject({ name: 'broken', success: false, error: 'close failed' });
        expect(results[1]).toMatchObject({ name: 'fine', success: true });
    });

    it('reports a handler that outlives its timeout', async () => {
        vi.useFakeTimers();
        const coordinator = new ShutdownCoordinator();
        coordinator.register('slow', () => new Promise<void>(() => undefined), 100);

        const pending = coordinator.shutdown();
        await vi.advanceTimersByTimeAsync(100);
        const results = await pending;

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({ name: 'slow', success: false, error: 'Timeout' });
    });

    it('runs only once', async () => {
        const coordinator = new ShutdownCoordinator();
        const stop = vi.fn();
        coordinator.register('worker', stop);

        await coordinator.shutdown();
        expect(coordinator.isInProgress()).toBe(true);
        await expect(coordinator.shutdown()).resolves.toEqual([]);
        expect(stop).toHaveBeenCalledTimes(1);
    });

    it('replaces and unregisters handlers by name', () => {
        const coordinator = new ShutdownCoordinator();
        coordinator.register('worker', vi.fn());
        coordinator.register('worker', vi.fn());
        coordinator.register('db', vi.fn());
        expect(coordinator.registeredNames()).toEqual(['worker', 'db']);

        coordinator.unregister('worker');
        expect(coordinator.registeredNames()).toEqual(['db']);
    });
});
