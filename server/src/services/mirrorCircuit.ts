/**
 * Mirror Circuit
 *
 * Tracks the health of POS mirror writes. After a run of consecutive
 * failures the circuit opens: writes are refused without touching the POS,
 * checkouts park their orders in the outbox, and the reconciler leaves
 * mirror entries alone. Once the cooldown ends a single trial write is let
 * through; its outcome closes or reopens the circuit.
 *
 * Every transition records the order that caused it, so the health report
 * names the branch and transaction to look at.
 */

import { MIRROR_CIRCUIT_CONFIG } from '../config/index.js';
import { errorMessage, posLogger } from '../utils/logger.js';

// ============================================
// TYPES
// ============================================

export type CircuitState = 'closed' | 'open' | 'trial';

export interface MirrorWriteRef {
    branchId: string;
    transactionId: string;
}

export interface MirrorFailure extends MirrorWriteRef {
    message: string;
    at: string;
}

export interface CircuitTransition {
    from: CircuitState;
    to: CircuitState;
    at: string;
    /** Write that caused the change */
    transactionId: string;
}

export interface MirrorCircuitStatus {
    state: CircuitState;
    consecutiveFailures: number;
    writes: number;
    failures: number;
    /** Writes refused while open or while a trial was in flight */
    rejected: number;
    retryAt: string | null;
    lastFailure: MirrorFailure | null;
    transitions: CircuitTransition[];
}

export interface MirrorCircuitOptions {
    failureThreshold?: number;
    cooldownMs?: number;
    historySize?: number;
    now?: () => number;
}

export class MirrorCircuitOpenError extends Error {
    readonly name = 'MirrorCircuitOpenError' as const;
    readonly retryAt: string | null;

    constructor(retryAt: string | null) {
        super(retryAt ? `POS mirror paused until ${retryAt}` : 'POS mirror paused for a trial write');
        this.retryAt = retryAt;
        Object.setPrototypeOf(this, MirrorCircuitOpenError.prototype);
    }
}

// ============================================
// CIRCUIT
// ============================================

export class MirrorCircuit {
    private state: CircuitState = 'closed';
    private consecutiveFailures = 0;
    private writes = 0;
    private failures = 0;
    private rejected = 0;
    private retryAt: number | null = null;
    private trialInFlight = false;
    private lastFailure: MirrorFailure | null = null;
    private readonly transitions: CircuitTransition[] = [];

    private readonly failureThreshold: number;
    private readonly cooldownMs: number;
    private readonly historySize: number;
    private readonly now: () => number;

    constructor(options: MirrorCircuitOptions = {}) {
        this.failureThreshold = options.failureThreshold ?? MIRROR_CIRCUIT_CONFIG.failureThreshold;
        this.cooldownMs = options.cooldownMs ?? MIRROR_CIRCUIT_CONFIG.cooldownMs;
        this.historySize = options.historySize ?? MIRROR_CIRCUIT_CONFIG.historySize;
        this.now = options.now ?? Date.now;
    }

    /** True while writes would be refused outright */
    isOpen(): boolean {
        return this.state === 'open' && this.retryAt !== null && this.now() < this.retryAt;
    }

    async run<T>(ref: MirrorWriteRef, write: () => Promise<T>): Promise<T> {
        this.admit(ref);

        try {
            const result = await write();
            this.succeeded(ref);
            return result;
        } catch (error) {
            this.failed(ref, error);
            throw error;
        }
    }

    getStatus(): MirrorCircuitStatus {
        return {
            state: this.state,
            consecutiveFailures: this.consecutiveFailures,
            writes: this.writes,
            failures: this.failures,
            rejected: this.rejected,
            retryAt: this.retryAt === null ? null : new Date(this.retryAt).toISOString(),
            lastFailure: this.lastFailure,
            transitions: [...this.transitions],
        };
    }

    private admit(ref: MirrorWriteRef): void {
        if (this.state === 'open') {
            if (this.isOpen()) {
                this.rejected++;
                throw new MirrorCircuitOpenError(this.getStatus().retryAt);
            }
            this.moveTo('trial', ref);
        }

        if (this.state === 'trial') {
            if (this.trialInFlight) {
                this.rejected++;
                throw new MirrorCircuitOpenError(null);
            }
            this.trialInFlight = true;
        }

        this.writes++;
    }

    private succeeded(ref: MirrorWriteRef): void {
        this.consecutiveFailures = 0;
        if (this.state === 'trial') {
            this.trialInFlight = false;
            this.moveTo('closed', ref);
        }
    }

    private failed(ref: MirrorWriteRef, error: unknown): void {
        this.failures++;
        this.consecutiveFailures++;
        this.lastFailure = { ...ref, message: errorMessage(error), at: new Date(this.now()).toISOString() };

        if (this.state === 'trial') {
            this.trialInFlight = false;
            this.moveTo('open', ref);
        } else if (this.consecutiveFailures >= this.failureThreshold) {
            this.moveTo('open', ref);
        }
    }

    private moveTo(to: CircuitState, ref: MirrorWriteRef): void {
        const at = this.now();
        this.transitions.push({ from: this.state, to, at: new Date(at).toISOString(), transactionId: ref.transactionId });
        if (this.transitions.length > this.historySize) {
            this.transitions.shift();
        }
        this.state = to;

        if (to === 'open') {
            this.retryAt = at + this.cooldownMs;
            posLogger.warn(
                { ...ref, consecutiveFailures: this.consecutiveFailures, retryAt: new Date(this.retryAt).toISOString() },
                'POS mirror circuit opened'
            );
        } else if (to === 'closed') {
            this.retryAt = null;
            posLogger.info(ref, 'POS mirror circuit closed, mirroring resumed');
        } else {
            posLogger.debug(ref, 'POS mirror cooldown over, trying one write');
        }
    }
}
