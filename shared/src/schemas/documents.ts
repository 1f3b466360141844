/**
 * Stored document schemas
 *
 * Internal documents (transactions, stock ledgers, outbox entries) are
 * written by this codebase and validated strictly on read.
 */

import { z } from 'zod';
import type { Product } from '../domain/catalog/product.js';
import type { CountAdjustment, SaleMovement } from '../domain/inventory/movements.js';
import type { StockItemState } from '../domain/inventory/stockLedger.js';
import type { Transaction } from '../domain/orders/transaction.js';
import {
    DELIVERY_TYPES,
    FULFILLMENT_STATUSES,
    ORDER_STATUSES,
    PARTIAL_TYPES,
    PAYMENT_TYPES,
    TRANSACTION_TYPES,
} from '../domain/orders/statuses.js';

// ============================================
// PRODUCT SNAPSHOT
// ============================================

export const ProductSchema: z.ZodType<Product> = z.object({
    id: z.string(),
    documentId: z.string(),
    name: z.string(),
    price: z.number(),
    priceWithoutIVA: z.number(),
    ivaAmount: z.number(),
    ivaPercentage: z.number(),
    iva: z.boolean(),
    sku: z.string(),
    barcode: z.string(),
    description: z.string(),
    stockQuantity: z.number(),
    grams: z.boolean(),
    costPrice: z.number(),
    previousCostPrice: z.number(),
    regionalPrice: z.number(),
    lotNumber: z.string(),
    expiryDate: z.string().nullable(),
    sortOrder: z.number(),
    comment: z.string(),
    hideInPOS: z.boolean(),
    hideInWeb: z.boolean(),
    imageUrl: z.string(),
    produceOnSale: z.boolean(),
    productType: z.number(),
    category: z.object({ id: z.string(), name: z.string() }).nullable(),
    supplier: z.object({
        id: z.string(),
        name: z.string(),
        accountNo: z.string(),
        bankName: z.string(),
        email: z.string(),
        phoneNumber: z.string(),
        closingBalance: z.number(),
        creditDays: z.number(),
        deleted: z.boolean(),
        hideFromAdmin: z.boolean(),
    }).nullable(),
});

// ============================================
// MOVEMENTS
// ============================================

const movementEnvelope = {
    timestamp: z.string(),
    product: ProductSchema,
    quantity: z.number(),
    productId: z.string(),
    productName: z.string(),
    unitPrice: z.number(),
    imageUrl: z.string(),
    category: z.string(),
    sku: z.string(),
};

export const SaleMovementSchema: z.ZodType<SaleMovement> = z.object({
    kind: z.literal('sale'),
    ...movementEnvelope,
    lineTotal: z.number(),
    ivaTotal: z.number(),
    lineTotalWithoutIVA: z.number(),
    forWho: z.string(),
    salesRep: z.string(),
    printed: z.boolean(),
    paid: z.boolean(),
    selected: z.boolean(),
    production: z.boolean(),
    discountPercentage: z.number(),
    discountAmount: z.number(),
    discountPrice: z.number(),
});

export const CountAdjustmentSchema: z.ZodType<CountAdjustment> = z.object({
    kind: z.literal('count'),
    ...movementEnvelope,
    expectedStock: z.number(),
    differenceInStock: z.number(),
    currentStockCount: z.number(),
    countedBy: z.string(),
});

// ============================================
// STOCK LEDGER
// ============================================

export const StockItemStateSchema: z.ZodType<StockItemState> = z.object({
    productId: z.string(),
    product: ProductSchema,
    quantity: z.number(),
    in: z.array(SaleMovementSchema),
    out: z.array(SaleMovementSchema),
    stockCounts: z.array(CountAdjustmentSchema),
    accumulatedStockCounts: z.number(),
    appliedTransactionIds: z.array(z.string()),
    createdAt: z.string(),
    updatedAt: z.string(),
});

// ============================================
// TRANSACTION
// ============================================

const CommentSchema = z.object({ message: z.string(), author: z.string(), timestamp: z.string() });

export const TransactionSchema: z.ZodType<Transaction> = z.object({
    id: z.string(),
    timestamp: z.string(),
    dueDate: z.string().nullable(),
    clientId: z.string(),
    clientName: z.string(),
    clientWebName: z.string(),
    clientPhoneNumber: z.string(),
    clientNuit: z.string(),
    clientAddress: z.string(),
    stockMovements: z.array(SaleMovementSchema),
    movementType: z.string(),
    grandTotal: z.number(),
    totalCost: z.number(),
    discountAmount: z.number(),
    amountBeforeIVA: z.number(),
    ivaAmount: z.number(),
    read: z.boolean(),
    orderStatus: z.enum(ORDER_STATUSES),
    fulfillmentStatus: z.enum(FULFILLMENT_STATUSES),
    deliveryType: z.enum(DELIVERY_TYPES),
    paymentType: z.enum(PAYMENT_TYPES),
    bankIdPaidTo: z.string(),
    amountPaid: z.number(),
    amountPending: z.number(),
    change: z.number(),
    payments: z.array(z.object({
        amount: z.number(),
        paymentType: z.enum(PAYMENT_TYPES),
        reference: z.string(),
        timestamp: z.string(),
    })),
    partialPayment: z.enum(PARTIAL_TYPES),
    proofOfPaymentAttachment: z.string(),
    instructions: z.string(),
    salesRep: z.string(),
    receiptPrinted: z.boolean(),
    invoicePrinted: z.boolean(),
    packaged: z.boolean(),
    completionTime: z.string().nullable(),
    remindInMinutes: z.number(),
    branchDbName: z.string(),
    pickupLocation: z.string(),
    deliveryAddress: z.string(),
    phone: z.string(),
    officeClosingBalance: z.number(),
    officeOpeningBalance: z.number(),
    clientClosingBalance: z.number(),
    clientOpeningBalance: z.number(),
    supplierClosingBalance: z.number(),
    supplierOpeningBalance: z.number(),
    bankClosingBalance: z.number(),
    bankOpeningBalance: z.number(),
    staffResponsible: z.object({ id: z.string(), name: z.string(), email: z.string() }).nullable(),
    faturaComment: CommentSchema.nullable(),
    adminComments: z.array(CommentSchema),
    reversed: z.boolean(),
    type: z.enum(TRANSACTION_TYPES),
    online: z.boolean(),
    updatedAt: z.string(),
});
