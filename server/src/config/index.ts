/**
 * Centralized Configuration
 *
 * STRUCTURE:
 * - /sync          - Integration settings (catalog poller, POS mirror, outbox)
 * - collections.ts - Document store collection names
 * - env.ts         - Validated process environment (entry point only)
 *
 * TO ADD A NEW CONFIGURATION:
 * 1. Create or extend a file in the appropriate folder
 * 2. Document each constant
 * 3. Re-export from this file
 */

// ============================================
// COLLECTIONS
// ============================================

export {
    COLLECTIONS,
    SETTINGS_DOCUMENT_ID,
    transactionCounterId,
} from './collections.js';

// ============================================
// SYNC CONFIGURATIONS
// ============================================

// Catalog cache + poller
export {
    CACHE_KEYS,
    FLUSH_CATEGORIES,
    CATALOG_MARKER,
    CATALOG_SYNC_INTERVAL_MINUTES,
    CATALOG_SYNC_STARTUP_DELAY_MS,
    type CacheKey,
    type FlushCategory,
} from './sync/catalog.js';

// POS mirror
export {
    posTransactionCollection,
    POS_WRITE_TIMEOUT_MS,
    MIRROR_CIRCUIT_CONFIG,
} from './sync/pos.js';

// Outbox
export {
    OUTBOX_RECONCILE_INTERVAL_MINUTES,
    OUTBOX_BATCH_SIZE,
    OUTBOX_MAX_ATTEMPTS,
    LEDGER_CAS_MAX_RETRIES,
} from './sync/outbox.js';
