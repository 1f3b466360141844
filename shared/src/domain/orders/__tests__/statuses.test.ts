/**
 * Unit tests for order enumerations and their integer codes
 */

import {
    DELIVERY_TYPES,
    ORDER_STATUSES,
    PARTIAL_TYPES,
    TRANSACTION_TYPES,
    enumCode,
    enumFromCode,
    fulfillmentStatusFor,
    isOrderStatus,
} from '../statuses.js';

describe('enum codes', () => {
    it('keeps the order status codes stable', () => {
        expect(enumCode(ORDER_STATUSES, 'NA')).toBe(0);
        expect(enumCode(ORDER_STATUSES, 'New')).toBe(1);
        expect(enumCode(ORDER_STATUSES, 'ReadyForCollection')).toBe(4);
        expect(enumCode(ORDER_STATUSES, 'Cancelled')).toBe(9);
    });

    it('keeps the other code tables stable', () => {
        expect(enumCode(TRANSACTION_TYPES, 'Quote')).toBe(5);
        expect(enumCode(PARTIAL_TYPES, 'Items')).toBe(2);
        expect(enumCode(DELIVERY_TYPES, 'Pickup')).toBe(2);
        expect(enumCode(DELIVERY_TYPES, 'CurbsidePickup')).toBe(4);
    });

    it('decodes known codes and rejects unknown ones', () => {
        expect(enumFromCode(ORDER_STATUSES, 7)).toBe('Processing');
        expect(enumFromCode(ORDER_STATUSES, 10)).toBeNull();
        expect(enumFromCode(ORDER_STATUSES, -1)).toBeNull();
        expect(enumFromCode(ORDER_STATUSES, 1.5)).toBeNull();
    });
});

describe('isOrderStatus', () => {
    it('accepts members only', () => {
        expect(isOrderStatus('Accepted')).toBe(true);
        expect(isOrderStatus('accepted')).toBe(false);
    });
});

describe('fulfillmentStatusFor', () => {
    it('maps each order status', () => {
        expect(fulfillmentStatusFor('New')).toBe('Pending');
        expect(fulfillmentStatusFor('Accepted')).toBe('Processing');
        expect(fulfillmentStatusFor('Processing')).toBe('Processing');
        expect(fulfillmentStatusFor('ReadyForCollection')).toBe('ReadyForPickup');
        expect(fulfillmentStatusFor('Completed')).toBe('Delivered');
        expect(fulfillmentStatusFor('Declined')).toBe('Cancelled');
        expect(fulfillmentStatusFor('Cancelled')).toBe('Cancelled');
    });

    it('falls back to Pending for the rest', () => {
        expect(fulfillmentStatusFor('NA')).toBe('Pending');
        expect(fulfillmentStatusFor('Pending')).toBe('Pending');
        expect(fulfillmentStatusFor('Incomplete')).toBe('Pending');
    });
});
