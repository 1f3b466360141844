/**
 * Point-of-Sale Schema Translator - Pure Functions
 *
 * Maps the internal order model onto the document shape the till software
 * reads, and back. The key table is exhaustive: every key the POS expects is
 * written on every document, with '' / 0 / false / [] / null when the
 * internal model has nothing to say. Enumerations travel as their stable
 * integer codes.
 *
 * Translation never throws. Reading (the *FromPos direction) validates with
 * zod and throws ZodError on a document that is not POS-shaped at all.
 */

import type { CategoryRef, Product, SupplierRef } from '../catalog/product.js';
import type { SaleMovement } from '../inventory/movements.js';
import type { OrderComment, Payment, StaffRef, Transaction } from '../orders/transaction.js';
import {
    DELIVERY_TYPES,
    ORDER_STATUSES,
    PARTIAL_TYPES,
    PAYMENT_TYPES,
    TRANSACTION_TYPES,
    enumCode,
    enumFromCode,
    fulfillmentStatusFor,
} from '../orders/statuses.js';
import {
    PosProductSchema,
    PosTransactionSchema,
    type PosCategory,
    type PosComment,
    type PosPayment,
    type PosProduct,
    type PosStaff,
    type PosStockMovement,
    type PosSupplier,
    type PosTransaction,
} from '../../schemas/pos.js';

// ============================================
// PRODUCT
// ============================================

function categoryToPos(category: CategoryRef | null): PosCategory | null {
    if (!category) return null;
    return { ID: category.id, Name: category.name };
}

function supplierToPos(supplier: SupplierRef | null): PosSupplier | null {
    if (!supplier) return null;
    return {
        ID: supplier.id,
        Name: supplier.name,
        AccountNo: supplier.accountNo,
        BankName: supplier.bankName,
        Email: supplier.email,
        PhoneNumber: supplier.phoneNumber,
        ClosingBalance: supplier.closingBalance,
        CreditDays: supplier.creditDays,
        Deleted: supplier.deleted,
        HideFromAdmin: supplier.hideFromAdmin,
    };
}

export function productToPos(product: Readonly<Product>): PosProduct {
    return {
        ID: product.id || product.documentId,
        DocumentId: product.documentId,
        Name: product.name,
        Price: product.price,
        PriceWithoutIVA: product.priceWithoutIVA,
        IVAAmount: product.ivaAmount,
        IVAPercentage: product.ivaPercentage,
        IVA: product.iva,
        SKU: product.sku,
        Barcode: product.barcode,
        Description: product.description,
        StockQuantity: product.stockQuantity,
        Grams: product.grams,
        CostPrice: product.costPrice,
        NacalaPrice: product.regionalPrice,
        LotNumber: product.lotNumber,
        ExpiryDate: product.expiryDate,
        Order: product.sortOrder,
        CommentForProduct: product.comment,
        HideInPOS: product.hideInPOS,
        HideInWeb: product.hideInWeb,
        PictureAttachment: product.imageUrl,
        PreviousCostPrice: product.previousCostPrice,
        ProduceOnSale: product.produceOnSale,
        ProductType: product.productType,
        category: categoryToPos(product.category),
        supplier: supplierToPos(product.supplier),
    };
}

function productFromParsed(doc: PosProduct, documentId: string): Product {
    const docId = doc.DocumentId || documentId;
    return {
        id: doc.ID || docId,
        documentId: docId,
        name: doc.Name,
        price: doc.Price,
        priceWithoutIVA: doc.PriceWithoutIVA,
        ivaAmount: doc.IVAAmount,
        ivaPercentage: doc.IVAPercentage,
        iva: doc.IVA,
        sku: doc.SKU,
        barcode: doc.Barcode,
        description: doc.Description,
        stockQuantity: doc.StockQuantity,
        grams: doc.Grams,
        costPrice: doc.CostPrice,
        previousCostPrice: doc.PreviousCostPrice,
        regionalPrice: doc.NacalaPrice,
        lotNumber: doc.LotNumber,
        expiryDate: doc.ExpiryDate,
        sortOrder: doc.Order,
        comment: doc.CommentForProduct,
        hideInPOS: doc.HideInPOS,
        hideInWeb: doc.HideInWeb,
        imageUrl: doc.PictureAttachment,
        produceOnSale: doc.ProduceOnSale,
        productType: doc.ProductType,
        category: doc.category ? { id: doc.category.ID, name: doc.category.Name } : null,
        supplier: doc.supplier
            ? {
                id: doc.supplier.ID,
                name: doc.supplier.Name,
                accountNo: doc.supplier.AccountNo,
                bankName: doc.supplier.BankName,
                email: doc.supplier.Email,
                phoneNumber: doc.supplier.PhoneNumber,
                closingBalance: doc.supplier.ClosingBalance,
                creditDays: doc.supplier.CreditDays,
                deleted: doc.supplier.Deleted,
                hideFromAdmin: doc.supplier.HideFromAdmin,
            }
            : null,
    };
}

/**
 * Read a catalog document. Its store id is used when the document carries
 * neither `ID` nor `DocumentId`.
 */
export function productFromPos(doc: unknown, documentId: string): Product {
    return productFromParsed(PosProductSchema.parse(doc), documentId);
}

// ============================================
// MOVEMENTS
// ============================================

export function movementToPos(movement: SaleMovement): PosStockMovement {
    return {
        Timestamp: movement.timestamp,
        LineTotal: movement.lineTotal,
        product: productToPos(movement.product),
        Quantity: movement.quantity,
        DiscountPercentage: movement.discountPercentage,
        IVATotal: movement.ivaTotal,
        LineTotalWithoutIVA: movement.lineTotalWithoutIVA,
        ForWho: movement.forWho,
        SalesRep: movement.salesRep,
        Printed: movement.printed,
        Paid: movement.paid,
        Selected: movement.selected,
        Production: movement.production,
        DiscountAmount: movement.discountAmount,
        DiscountPrice: movement.discountPrice,
    };
}

function movementFromPos(doc: PosStockMovement): SaleMovement {
    const product = productFromParsed(doc.product, doc.product.DocumentId);
    return {
        kind: 'sale',
        timestamp: doc.Timestamp,
        product,
        quantity: doc.Quantity,
        productId: product.id,
        productName: product.name,
        unitPrice: product.price,
        imageUrl: product.imageUrl,
        category: product.category?.name ?? '',
        sku: product.sku,
        lineTotal: doc.LineTotal,
        ivaTotal: doc.IVATotal,
        lineTotalWithoutIVA: doc.LineTotalWithoutIVA,
        forWho: doc.ForWho,
        salesRep: doc.SalesRep,
        printed: doc.Printed,
        paid: doc.Paid,
        selected: doc.Selected,
        production: doc.Production,
        discountPercentage: doc.DiscountPercentage,
        discountAmount: doc.DiscountAmount,
        discountPrice: doc.DiscountPrice,
    };
}

// ============================================
// TRANSACTION
// ============================================

function paymentToPos(payment: Payment): PosPayment {
    return {
        amount: payment.amount,
        paymentType: enumCode(PAYMENT_TYPES, payment.paymentType),
        reference: payment.reference,
        timestamp: payment.timestamp,
    };
}

function commentToPos(comment: OrderComment): PosComment {
    return { message: comment.message, author: comment.author, timestamp: comment.timestamp };
}

function staffToPos(staff: StaffRef | null): PosStaff | null {
    return staff ? { id: staff.id, name: staff.name, email: staff.email } : null;
}

/**
 * Online sale document as stored under onlinesale/{branch}/transaction/{id}.
 *
 * Renamed fields: receiptPrinted → prePrinted, invoicePrinted → kitchenPrinted,
 * packaged → Served, pickupLocation → ReservedFor, deliveryType → orderType.
 */
export function transactionToPos(transaction: Transaction): PosTransaction {
    return {
        ID: transaction.id,
        Timestamp: transaction.timestamp,
        DueDate: transaction.dueDate,
        clientID: transaction.clientId,
        clientName: transaction.clientName,
        clientWebName: transaction.clientWebName,
        clientPhoneNumber: transaction.clientPhoneNumber,
        clientNuit: transaction.clientNuit,
        clientAddress: transaction.clientAddress,
        stockMovements: transaction.stockMovements.map(movementToPos),
        MovementType: transaction.movementType,
        GrandTotal: transaction.grandTotal,
        Read: transaction.read,
        OrderStatus: enumCode(ORDER_STATUSES, transaction.orderStatus),
        bankIDPaidTo: transaction.bankIdPaidTo,
        AmountPaid: transaction.amountPaid,
        Change: transaction.change,
        Payments: transaction.payments.map(paymentToPos),
        prePrinted: transaction.receiptPrinted,
        kitchenPrinted: transaction.invoicePrinted,
        Instructions: transaction.instructions,
        CompletionTime: transaction.completionTime,
        RemindInMinutes: transaction.remindInMinutes,
        ReservedFor: transaction.pickupLocation,
        branchDBName: transaction.branchDbName,
        reversed: transaction.reversed,
        ProofofPaymentAttachment: transaction.proofOfPaymentAttachment,
        IVAAmount: transaction.ivaAmount,
        AmountBeforeIVA: transaction.amountBeforeIVA,
        Served: transaction.packaged,
        OfficeClosingBalance: transaction.officeClosingBalance,
        OfficeOpeningBalance: transaction.officeOpeningBalance,
        ClientClosingBalance: transaction.clientClosingBalance,
        ClientOpeningBalance: transaction.clientOpeningBalance,
        SupplierClosingBalance: transaction.supplierClosingBalance,
        SupplierOpeningBalance: transaction.supplierOpeningBalance,
        BankClosingBalance: transaction.bankClosingBalance,
        BankOpeningBalance: transaction.bankOpeningBalance,
        StaffResponsible: staffToPos(transaction.staffResponsible),
        SalesRep: transaction.salesRep,
        FaturaComment: transaction.faturaComment ? commentToPos(transaction.faturaComment) : null,
        AdminComments: transaction.adminComments.map(commentToPos),
        DiscountAmount: transaction.discountAmount,
        AmountPending: transaction.amountPending,
        PartialPayment: enumCode(PARTIAL_TYPES, transaction.partialPayment),
        Type: enumCode(TRANSACTION_TYPES, transaction.type),
        Online: transaction.online,
        orderType: enumCode(DELIVERY_TYPES, transaction.deliveryType),
    };
}

/**
 * Rebuild an internal transaction from a mirror document.
 *
 * The mirror does not carry every internal field. Those are reconstructed:
 * totalCost from GrandTotal, fulfillmentStatus from the order status,
 * deliveryAddress from clientAddress, updatedAt from Timestamp; the
 * orderer's own phone and the payment type fall back to '' and 'Cash'.
 * Unknown enum codes fall back to the first member of their list.
 */
export function transactionFromPos(doc: unknown): Transaction {
    const pos = PosTransactionSchema.parse(doc);
    const orderStatus = enumFromCode(ORDER_STATUSES, pos.OrderStatus) ?? 'NA';

    return {
        id: pos.ID,
        timestamp: pos.Timestamp,
        dueDate: pos.DueDate,
        clientId: pos.clientID,
        clientName: pos.clientName,
        clientWebName: pos.clientWebName,
        clientPhoneNumber: pos.clientPhoneNumber,
        clientNuit: pos.clientNuit,
        clientAddress: pos.clientAddress,
        stockMovements: pos.stockMovements.map(movementFromPos),
        movementType: pos.MovementType,
        grandTotal: pos.GrandTotal,
        totalCost: pos.GrandTotal,
        discountAmount: pos.DiscountAmount,
        amountBeforeIVA: pos.AmountBeforeIVA,
        ivaAmount: pos.IVAAmount,
        read: pos.Read,
        orderStatus,
        fulfillmentStatus: fulfillmentStatusFor(orderStatus),
        deliveryType: enumFromCode(DELIVERY_TYPES, pos.orderType) ?? 'Standard',
        paymentType: 'Cash',
        bankIdPaidTo: pos.bankIDPaidTo,
        amountPaid: pos.AmountPaid,
        amountPending: pos.AmountPending,
        change: pos.Change,
        payments: pos.Payments.map(p => ({
            amount: p.amount,
            paymentType: enumFromCode(PAYMENT_TYPES, p.paymentType) ?? 'Cash',
            reference: p.reference,
            timestamp: p.timestamp,
        })),
        partialPayment: enumFromCode(PARTIAL_TYPES, pos.PartialPayment) ?? 'None',
        proofOfPaymentAttachment: pos.ProofofPaymentAttachment,
        instructions: pos.Instructions,
        salesRep: pos.SalesRep,
        receiptPrinted: pos.prePrinted,
        invoicePrinted: pos.kitchenPrinted,
        packaged: pos.Served,
        completionTime: pos.CompletionTime,
        remindInMinutes: pos.RemindInMinutes,
        branchDbName: pos.branchDBName,
        pickupLocation: pos.ReservedFor,
        deliveryAddress: pos.clientAddress,
        phone: '',
        officeClosingBalance: pos.OfficeClosingBalance,
        officeOpeningBalance: pos.OfficeOpeningBalance,
        clientClosingBalance: pos.ClientClosingBalance,
        clientOpeningBalance: pos.ClientOpeningBalance,
        supplierClosingBalance: pos.SupplierClosingBalance,
        supplierOpeningBalance: pos.SupplierOpeningBalance,
        bankClosingBalance: pos.BankClosingBalance,
        bankOpeningBalance: pos.BankOpeningBalance,
        staffResponsible: pos.StaffResponsible,
        faturaComment: pos.FaturaComment,
        adminComments: pos.AdminComments,
        reversed: pos.reversed,
        type: enumFromCode(TRANSACTION_TYPES, pos.Type) ?? 'Sale',
        online: pos.Online,
        updatedAt: pos.Timestamp,
    };
}
