/**
 * Unit tests for transaction identifiers and factories
 */

import {
    assignTransactionId,
    createDraftTransaction,
    formatDateKey,
    formatTransactionId,
    parseTransactionId,
} from '../transaction.js';

describe('formatDateKey', () => {
    it('formats the UTC calendar day', () => {
        expect(formatDateKey(new Date('2024-01-31T23:59:59.000Z'))).toBe('20240131');
        expect(formatDateKey(new Date('2024-11-02T00:00:00.000Z'))).toBe('20241102');
    });
});

describe('formatTransactionId', () => {
    it('pads the sequence to four digits', () => {
        expect(formatTransactionId('20240131', 7)).toBe('order_20240131_0007');
        expect(formatTransactionId('20240131', 1234)).toBe('order_20240131_1234');
    });

    it('lets the sequence grow past four digits', () => {
        expect(formatTransactionId('20240131', 12345)).toBe('order_20240131_12345');
    });
});

describe('parseTransactionId', () => {
    it('splits a well-formed id', () => {
        expect(parseTransactionId('order_20240131_0007')).toEqual({ dateKey: '20240131', sequence: 7 });
    });

    it('rejects anything else', () => {
        expect(parseTransactionId('order_2024_0007')).toBeNull();
        expect(parseTransactionId('3f2b-guid')).toBeNull();
    });
});

describe('assignTransactionId', () => {
    it('puts the id on the draft', () => {
        const draft = createDraftTransaction('b1', { id: 'c1', name: 'Rui', webName: 'Rui', phoneNumber: '' }, new Date('2024-01-31T08:00:00.000Z'));
        const tx = assignTransactionId(draft, 'order_20240131_0001');

        expect(tx.id).toBe('order_20240131_0001');
        expect(tx.clientId).toBe('c1');
        expect(tx.timestamp).toBe('2024-01-31T08:00:00.000Z');
    });
});
