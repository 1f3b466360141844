/**
 * Sync Outbox Configuration
 *
 * Failed mirror and ledger steps are parked in the outbox and retried by
 * the reconciliation worker.
 */

/**
 * Default minutes between reconciliation runs
 */
export const OUTBOX_RECONCILE_INTERVAL_MINUTES = 2;

/**
 * Entries handled per reconciliation run
 */
export const OUTBOX_BATCH_SIZE = 50;

/**
 * Attempts before an entry is parked as dead and left for an operator
 */
export const OUTBOX_MAX_ATTEMPTS = 10;

/**
 * Retries of a ledger compare-and-set before giving up on the attempt
 */
export const LEDGER_CAS_MAX_RETRIES = 5;
