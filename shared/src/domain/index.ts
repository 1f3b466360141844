/**
 * Domain layer barrel
 */

export * from './constants.js';

// catalog
export * from './catalog/product.js';

// inventory
export * from './inventory/movements.js';
export * from './inventory/stockLedger.js';
export * from './inventory/availability.js';

// orders
export * from './orders/statuses.js';
export * from './orders/stateMachine.js';
export * from './orders/pricing.js';
export * from './orders/transaction.js';
export * from './orders/transactionBuilder.js';
export * from './orders/orderMessage.js';

// point of sale
export * from './pos/translator.js';
