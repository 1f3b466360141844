/**
 * POS Mirror Configuration
 *
 * Settings for writing online sales into the point-of-sale side's
 * document layout.
 */

// ============================================
// PATHS
// ============================================

/**
 * Collection the POS reads online sales from, one per branch
 *
 * @example
 * posTransactionCollection('default_branch') // 'onlinesale/default_branch/transaction'
 */
export function posTransactionCollection(branchId: string): string {
    return `onlinesale/${branchId}/transaction`;
}

// ============================================
// TIMEOUTS
// ============================================

/**
 * Default upper bound on one mirror write
 */
export const POS_WRITE_TIMEOUT_MS = 10_000;

// ============================================
// MIRROR CIRCUIT
// ============================================

/**
 * After this many mirror writes fail in a row, checkouts stop waiting on
 * the POS and park their orders in the sync outbox until the cooldown ends.
 * One trial write then decides whether mirroring resumes.
 */
export const MIRROR_CIRCUIT_CONFIG = {
    failureThreshold: 5,
    cooldownMs: 60_000,
    /** Transitions kept for the health report */
    historySize: 10,
} as const;
