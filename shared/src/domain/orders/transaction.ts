/**
 * Transaction - the order aggregate
 *
 * Created once per checkout. After that only status-transition operations
 * touch it; the line list and totals are never rebuilt.
 *
 * Most bookkeeping fields belong to the point-of-sale side (balances,
 * print flags, comments) and start at neutral values.
 */

import type { SaleMovement } from '../inventory/movements.js';
import { ONLINE_SALE_CONFIG, TRANSACTION_ID_PREFIX, TRANSACTION_SEQUENCE_DIGITS } from '../constants.js';
import type {
    DeliveryType,
    FulfillmentStatus,
    OrderStatus,
    PartialType,
    PaymentType,
    TransactionType,
} from './statuses.js';

// ============================================
// TYPES
// ============================================

export interface Payment {
    amount: number;
    paymentType: PaymentType;
    reference: string;
    timestamp: string;
}

export interface OrderComment {
    message: string;
    author: string;
    timestamp: string;
}

export interface StaffRef {
    id: string;
    name: string;
    email: string;
}

/** Who placed the order */
export interface CustomerInfo {
    id: string;
    name: string;
    webName: string;
    phoneNumber: string;
}

export interface Transaction {
    id: string;
    /** ISO-8601 */
    timestamp: string;
    dueDate: string | null;

    clientId: string;
    clientName: string;
    clientWebName: string;
    clientPhoneNumber: string;
    clientNuit: string;
    clientAddress: string;

    stockMovements: SaleMovement[];
    movementType: string;
    grandTotal: number;
    totalCost: number;
    discountAmount: number;
    amountBeforeIVA: number;
    ivaAmount: number;

    read: boolean;
    orderStatus: OrderStatus;
    fulfillmentStatus: FulfillmentStatus;
    deliveryType: DeliveryType;

    paymentType: PaymentType;
    bankIdPaidTo: string;
    amountPaid: number;
    amountPending: number;
    change: number;
    payments: Payment[];
    partialPayment: PartialType;
    proofOfPaymentAttachment: string;

    instructions: string;
    salesRep: string;
    receiptPrinted: boolean;
    invoicePrinted: boolean;
    packaged: boolean;
    completionTime: string | null;
    remindInMinutes: number;

    branchDbName: string;
    pickupLocation: string;
    deliveryAddress: string;
    phone: string;

    officeClosingBalance: number;
    officeOpeningBalance: number;
    clientClosingBalance: number;
    clientOpeningBalance: number;
    supplierClosingBalance: number;
    supplierOpeningBalance: number;
    bankClosingBalance: number;
    bankOpeningBalance: number;

    staffResponsible: StaffRef | null;
    faturaComment: OrderComment | null;
    adminComments: OrderComment[];

    reversed: boolean;
    type: TransactionType;
    online: boolean;
    updatedAt: string;
}

/** A priced transaction that has not been given its id yet */
export type DraftTransaction = Omit<Transaction, 'id'>;

// ============================================
// FACTORIES
// ============================================

/**
 * Empty online sale for a customer at a branch. Totals and lines are
 * filled in by the builder.
 */
export function createDraftTransaction(branchId: string, customer: CustomerInfo, now: Date = new Date()): DraftTransaction {
    const stamp = now.toISOString();
    return {
        timestamp: stamp,
        dueDate: null,
        clientId: customer.id,
        clientName: customer.name,
        clientWebName: customer.webName,
        clientPhoneNumber: customer.phoneNumber,
        clientNuit: '',
        clientAddress: '',
        stockMovements: [],
        movementType: ONLINE_SALE_CONFIG.movementType,
        grandTotal: 0,
        totalCost: 0,
        discountAmount: 0,
        amountBeforeIVA: 0,
        ivaAmount: 0,
        read: false,
        orderStatus: 'New',
        fulfillmentStatus: 'Pending',
        deliveryType: 'Standard',
        paymentType: 'Cash',
        bankIdPaidTo: '',
        amountPaid: 0,
        amountPending: 0,
        change: 0,
        payments: [],
        partialPayment: 'None',
        proofOfPaymentAttachment: '',
        instructions: '',
        salesRep: '',
        receiptPrinted: false,
        invoicePrinted: false,
        packaged: false,
        completionTime: null,
        remindInMinutes: 0,
        branchDbName: branchId,
        pickupLocation: '',
        deliveryAddress: '',
        phone: '',
        officeClosingBalance: 0,
        officeOpeningBalance: 0,
        clientClosingBalance: 0,
        clientOpeningBalance: 0,
        supplierClosingBalance: 0,
        supplierOpeningBalance: 0,
        bankClosingBalance: 0,
        bankOpeningBalance: 0,
        staffResponsible: null,
        faturaComment: null,
        adminComments: [],
        reversed: false,
        type: 'Sale',
        online: true,
        updatedAt: stamp,
    };
}

export function assignTransactionId(draft: DraftTransaction, id: string): Transaction {
    return { id, ...draft };
}

// ============================================
// IDENTIFIERS
// ============================================

/** yyyyMMdd in UTC */
export function formatDateKey(date: Date): string {
    const y = date.getUTCFullYear();
    const m = String(date.getUTCMonth() + 1).padStart(2, '0');
    const d = String(date.getUTCDate()).padStart(2, '0');
    return `${y}${m}${d}`;
}

/**
 * @example
 * formatTransactionId('20240131', 7) // 'order_20240131_0007'
 */
export function formatTransactionId(dateKey: string, sequence: number): string {
    return `${TRANSACTION_ID_PREFIX}_${dateKey}_${String(sequence).padStart(TRANSACTION_SEQUENCE_DIGITS, '0')}`;
}

const TRANSACTION_ID_PATTERN = /^order_(\d{8})_(\d{4,})$/;

export function parseTransactionId(id: string): { dateKey: string; sequence: number } | null {
    const match = TRANSACTION_ID_PATTERN.exec(id);
    if (!match?.[1] || !match[2]) return null;
    return { dateKey: match[1], sequence: Number(match[2]) };
}
