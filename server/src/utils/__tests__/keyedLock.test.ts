import { KeyedLock } from '../keyedLock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('KeyedLock', () => {
    it('runs work under the same key one at a time', async () => {
        const lock = new KeyedLock();
        const order: string[] = [];
        const gate = deferred();

        const first = lock.run('p1', async () => {
            order.push('first:start');
            await gate.promise;
            order.push('first:end');
        });
        const second = lock.run('p1', async () => {
            order.push('second');
        });

        await Promise.resolve();
        expect(order).toEqual(['first:start']);

        gate.resolve();
        await Promise.all([first, second]);
        expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('runs work under different keys concurrently', async () => {
        const lock = new KeyedLock();
        const gate = deferred();
        const order: string[] = [];

        const blocked = lock.run('p1', async () => {
            await gate.promise;
            order.push('p1');
        });
        await lock.run('p2', async () => {
            order.push('p2');
        });

        expect(order).toEqual(['p2']);
        gate.resolve();
        await blocked;
        expect(order).toEqual(['p2', 'p1']);
    });

    it('releases the key when the work throws', async () => {
        const lock = new KeyedLock();
        await expect(lock.run('p1', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
        await expect(lock.run('p1', () => Promise.resolve('next'))).resolves.toBe('next');
        expect(lock.heldKeys()).toEqual([]);
    });

    it('reports held keys while work is queued', async () => {
        const lock = new KeyedLock();
        const gate = deferred();
        const running = lock.run('p9', () => gate.promise);
        expect(lock.heldKeys()).toEqual(['p9']);
        gate.resolve();
        await running;
        expect(lock.heldKeys()).toEqual([]);
    });
});
