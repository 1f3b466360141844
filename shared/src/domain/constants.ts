/**
 * Domain Constants
 *
 * Business constants shared by the pure domain and the server.
 * Centralizes magic numbers for maintainability.
 */

/**
 * Online sale defaults stamped on every storefront transaction
 */
export const ONLINE_SALE_CONFIG = {
  /** Sales-channel marker written on every line */
  salesRep: 'Web Order',
  /** Movement direction recorded on the transaction */
  movementType: 'out',
  /** First line of every instructions block */
  instructionsBanner: 'Online order via e-commerce platform',
  /** Address stored for orders collected in store */
  pickupAddress: 'Pickup from store',
} as const;

/** Subtotal at or above which delivery is free */
export const FREE_DELIVERY_THRESHOLD = 500;

/** Flat delivery charge below the threshold */
export const DELIVERY_FEE = 50;

/**
 * Checkout field limits
 */
export const CHECKOUT_LIMITS = {
  minAddressLength: 10,
  maxInstructionsLength: 500,
  maxGiftMessageLength: 250,
  maxNameLength: 120,
} as const;

/**
 * Accepted orderer phone numbers: South African (+27 / 0 prefix, 9 digits)
 * or Mozambican (+258 / 00258 prefix, 8-9 digits).
 */
export const PHONE_PATTERN = /^(\+27|0)[0-9]{9}$|^(\+258|00258)[0-9]{8,9}$/;

/** Transaction ids: order_{yyyyMMdd}_{NNNN} */
export const TRANSACTION_ID_PREFIX = 'order';
export const TRANSACTION_SEQUENCE_DIGITS = 4;
