/**
 * @tillsync/shared - Pure order, ledger and point-of-sale schema logic
 *
 * NO I/O in this package. The server supplies products, settings and
 * storage; everything here is deterministic over its inputs.
 */

export * from './domain/index.js';
export * from './schemas/index.js';
export * from './errors/index.js';
