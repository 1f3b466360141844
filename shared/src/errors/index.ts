/**
 * Shared Error Utilities
 */

export { InvalidArgumentError } from './domain.js';
