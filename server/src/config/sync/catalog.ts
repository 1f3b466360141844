/**
 * Catalog Sync Configuration
 *
 * Settings for the catalog/settings snapshot cache and the poller that
 * watches the upstream catalog marker.
 */

// ============================================
// CACHE KEYS
// ============================================

/**
 * Snapshot keys held by the catalog cache
 */
export const CACHE_KEYS = {
    products: 'products',
    settings: 'settings',
} as const;

export type CacheKey = typeof CACHE_KEYS[keyof typeof CACHE_KEYS];

/**
 * Flush categories accepted by the cache flush endpoint
 */
export const FLUSH_CATEGORIES = ['products', 'settings', 'all'] as const;

export type FlushCategory = typeof FLUSH_CATEGORIES[number];

// ============================================
// MARKER
// ============================================

/**
 * Document the POS side touches whenever it edits the catalog.
 * Its `timestamp` field is compared against the last value seen.
 */
export const CATALOG_MARKER = {
    collection: 'update',
    id: 'product',
    field: 'timestamp',
} as const;

// ============================================
// POLLER TIMING
// ============================================

/**
 * Default minutes between marker checks
 */
export const CATALOG_SYNC_INTERVAL_MINUTES = 5;

/**
 * Default delay before the first check after startup
 *
 * Gives the server time to finish booting before it reads the store.
 */
export const CATALOG_SYNC_STARTUP_DELAY_MS = 30_000;
