/**
 * Promise timeout helper
 */

export class TimeoutError extends Error {
    readonly name = 'TimeoutError' as const;
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
        Object.setPrototypeOf(this, TimeoutError.prototype);
    }
}

/**
 * Settle with `work`, or reject with a TimeoutError once `timeoutMs` passes.
 * The timer is cleared either way. The underlying work is not cancelled.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
