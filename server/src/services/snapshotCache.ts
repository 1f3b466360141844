/**
 * Snapshot Cache
 *
 * Whole-value snapshots under fixed keys, computed by a loader per key.
 * - Concurrent misses share one load.
 * - Every load takes a ticket; a load only replaces the stored snapshot
 *   when its ticket is newer than the stored one and newer than the last
 *   invalidation, so a slow early load never overwrites a later one and
 *   a load cut off by an invalidation is dropped.
 * - Snapshots are deep-frozen before they are published.
 * - Entries never expire.
 */

export type SnapshotLoaders<M> = { [K in keyof M]: () => Promise<M[K]> };

interface Entry<V> {
    value: V;
    ticket: number;
}

export interface SnapshotInfo {
    key: string;
    cachedAt: Date;
}

function deepFreeze(value: unknown): void {
    if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
    Object.freeze(value);
    for (const child of Object.values(value)) {
        deepFreeze(child);
    }
}

export class SnapshotCache<M extends Record<string, unknown>> {
    private readonly entries: { [K in keyof M]?: Entry<M[K]> } = {};
    private readonly inflight: { [K in keyof M]?: Promise<M[K]> } = {};
    private readonly floors = new Map<keyof M, number>();
    private readonly cachedAt = new Map<keyof M, Date>();
    private nextTicket = 0;

    constructor(private readonly loaders: SnapshotLoaders<M>) {}

    /** Cached snapshot, or the result of a (shared) load on a miss */
    async getOrRefresh<K extends keyof M>(key: K): Promise<M[K]> {
        const entry = this.entries[key];
        if (entry) return entry.value;

        const pending: Promise<M[K]> | undefined = this.inflight[key];
        if (pending) return pending;

        return this.refresh(key);
    }

    /**
     * Start a new load regardless of what is cached. Resolves with the
     * snapshot this load produced, even if a newer one won the slot.
     */
    refresh<K extends keyof M>(key: K): Promise<M[K]> {
        const ticket = ++this.nextTicket;

        const load = this.loaders[key]().then(value => {
            deepFreeze(value);
            const current = this.entries[key];
            const floor = this.floors.get(key) ?? 0;
            if (ticket > floor && (!current || current.ticket < ticket)) {
                this.entries[key] = { value, ticket };
                this.cachedAt.set(key, new Date());
            }
            return value;
        });

        this.inflight[key] = load;
        const clear = (): void => {
            if (this.inflight[key] === load) delete this.inflight[key];
        };
        void load.then(clear, clear);

        return load;
    }

    /**
     * Evict a snapshot and cancel any load still running for it: that load
     * is never published, and the next read starts a fresh one. Returns
     * false, and changes nothing, when there was neither a snapshot nor a
     * running load.
     */
    invalidate(key: keyof M): boolean {
        const hadEntry = this.entries[key] !== undefined;
        const hadLoad = this.inflight[key] !== undefined;
        if (!hadEntry && !hadLoad) return false;

        this.floors.set(key, this.nextTicket);
        delete this.entries[key];
        delete this.inflight[key];
        this.cachedAt.delete(key);
        return true;
    }

    peek<K extends keyof M>(key: K): M[K] | null {
        return this.entries[key]?.value ?? null;
    }

    has(key: keyof M): boolean {
        return this.entries[key] !== undefined;
    }

    /** Cached keys with the time each snapshot was stored */
    snapshots(): SnapshotInfo[] {
        return Array.from(this.cachedAt, ([key, cachedAt]) => ({ key: String(key), cachedAt }));
    }
}
