import { TimeoutError, withTimeout } from '../timeout.js';

describe('withTimeout', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('resolves with the work result when it finishes first', async () => {
        await expect(withTimeout(Promise.resolve('done'), 1000, 'write')).resolves.toBe('done');
    });

    it('passes the work rejection through', async () => {
        await expect(withTimeout(Promise.reject(new Error('denied')), 1000, 'write')).rejects.toThrow('denied');
    });

    it('rejects with a TimeoutError once the limit passes', async () => {
        vi.useFakeTimers();
        const pending = withTimeout(new Promise<string>(() => undefined), 250, 'POS write');
        const assertion = expect(pending).rejects.toThrow('POS write timed out after 250ms');
        await vi.advanceTimersByTimeAsync(250);
        await assertion;
    });

    it('carries the limit on the error', () => {
        const error = new TimeoutError('POS write', 500);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('TimeoutError');
        expect(error.timeoutMs).toBe(500);
    });

    it('clears its timer when the work settles', async () => {
        vi.useFakeTimers();
        await withTimeout(Promise.resolve(1), 1000, 'write');
        expect(vi.getTimerCount()).toBe(0);
    });
});
