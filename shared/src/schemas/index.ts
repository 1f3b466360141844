/**
 * Zod schemas barrel
 */

export * from './checkout.js';
export * from './settings.js';
export * from './pos.js';
export * from './documents.js';
