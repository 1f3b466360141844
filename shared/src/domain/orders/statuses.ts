/**
 * Order Enumerations - Pure Domain Constants
 *
 * Every enumeration the point-of-sale side stores is serialized as a stable
 * integer code equal to the member's position in its list below. Never
 * reorder these lists; append only.
 */

// ============================================
// ENUMERATIONS
// ============================================

export const ORDER_STATUSES = [
    'NA',
    'New',
    'Accepted',
    'Declined',
    'ReadyForCollection',
    'Completed',
    'Pending',
    'Processing',
    'Incomplete',
    'Cancelled',
] as const;
export type OrderStatus = typeof ORDER_STATUSES[number];

export const TRANSACTION_TYPES = ['Sale', 'Return', 'Exchange', 'Refund', 'CreditNote', 'Quote'] as const;
export type TransactionType = typeof TRANSACTION_TYPES[number];

export const DELIVERY_TYPES = ['Standard', 'Express', 'Pickup', 'HomeDelivery', 'CurbsidePickup'] as const;
export type DeliveryType = typeof DELIVERY_TYPES[number];

export const FULFILLMENT_STATUSES = [
    'Pending',
    'Processing',
    'Packaged',
    'ReadyForPickup',
    'InTransit',
    'Delivered',
    'Collected',
    'Cancelled',
] as const;
export type FulfillmentStatus = typeof FULFILLMENT_STATUSES[number];

export const PARTIAL_TYPES = ['None', 'Payment', 'Items'] as const;
export type PartialType = typeof PARTIAL_TYPES[number];

export const PAYMENT_TYPES = [
    'Cash',
    'Card',
    'Mobile',
    'Credit',
    'Mixed',
    'StockTransfer',
    'CreditNote',
    'Quote',
    'BankTransfer',
    'EFT',
] as const;
export type PaymentType = typeof PAYMENT_TYPES[number];

// ============================================
// INTEGER CODES
// ============================================

/**
 * Stable integer code of an enumeration member.
 *
 * @example
 * enumCode(ORDER_STATUSES, 'Cancelled') // 9
 */
export function enumCode<T extends string>(members: readonly T[], value: T): number {
    return members.indexOf(value);
}

/** Inverse of enumCode; unknown codes resolve to null */
export function enumFromCode<T extends string>(members: readonly T[], code: number): T | null {
    return Number.isInteger(code) ? members[code] ?? null : null;
}

export function isOrderStatus(value: string): value is OrderStatus {
    return (ORDER_STATUSES as readonly string[]).includes(value);
}

// ============================================
// DERIVED STATUS
// ============================================

const FULFILLMENT_BY_ORDER_STATUS: Partial<Record<OrderStatus, FulfillmentStatus>> = {
    New: 'Pending',
    Accepted: 'Processing',
    Processing: 'Processing',
    ReadyForCollection: 'ReadyForPickup',
    Completed: 'Delivered',
    Declined: 'Cancelled',
    Cancelled: 'Cancelled',
};

/** Fulfillment status implied by an order status (unlisted statuses map to Pending) */
export function fulfillmentStatusFor(status: OrderStatus): FulfillmentStatus {
    return FULFILLMENT_BY_ORDER_STATUS[status] ?? 'Pending';
}
