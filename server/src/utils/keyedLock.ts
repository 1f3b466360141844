/**
 * Keyed in-process lock
 *
 * Serializes async work per key (one stock ledger per product) inside a
 * single process. Cross-process safety comes from the document version
 * check in the caller, not from here.
 */

export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    /**
     * Run `fn` once every earlier holder of `key` has finished.
     * Work under different keys runs concurrently.
     */
    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /** Keys with work queued or running */
    heldKeys(): string[] {
        return Array.from(this.tails.keys());
    }
}
