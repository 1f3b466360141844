/**
 * Point-of-sale document schemas
 *
 * The POS side owns these shapes and their key names. Catalog documents are
 * edited by hand on that side, so every field is optional on read and
 * falls back to the same neutral value the translator writes.
 */

import { z } from 'zod';

// ============================================
// FIELD HELPERS
// ============================================

const str = z.string().nullish().transform(v => v ?? '');
const num = z.number().nullish().transform(v => v ?? 0);
const int = z.number().int().nullish().transform(v => v ?? 0);
const bool = z.boolean().nullish().transform(v => v ?? false);
const isoDate = z.string().nullish().transform(v => v ?? null);

// ============================================
// CATALOG
// ============================================

export const PosCategorySchema = z.object({
    ID: str,
    Name: str,
});

export const PosSupplierSchema = z.object({
    ID: str,
    Name: str,
    AccountNo: str,
    BankName: str,
    Email: str,
    PhoneNumber: str,
    ClosingBalance: num,
    CreditDays: int,
    Deleted: bool,
    HideFromAdmin: bool,
});

export const PosProductSchema = z.object({
    ID: str,
    DocumentId: str,
    Name: str,
    Price: num,
    PriceWithoutIVA: num,
    IVAAmount: num,
    IVAPercentage: num,
    IVA: bool,
    SKU: str,
    Barcode: str,
    Description: str,
    StockQuantity: num,
    Grams: bool,
    CostPrice: num,
    NacalaPrice: num,
    LotNumber: str,
    ExpiryDate: isoDate,
    Order: int,
    CommentForProduct: str,
    HideInPOS: bool,
    HideInWeb: bool,
    PictureAttachment: str,
    PreviousCostPrice: num,
    ProduceOnSale: bool,
    ProductType: int,
    category: PosCategorySchema.nullish().transform(v => v ?? null),
    supplier: PosSupplierSchema.nullish().transform(v => v ?? null),
});

export type PosCategory = z.output<typeof PosCategorySchema>;
export type PosSupplier = z.output<typeof PosSupplierSchema>;
export type PosProduct = z.output<typeof PosProductSchema>;

// ============================================
// ONLINE SALE MIRROR
// ============================================

export const PosStockMovementSchema = z.object({
    Timestamp: z.string(),
    LineTotal: z.number(),
    product: PosProductSchema,
    Quantity: z.number(),
    DiscountPercentage: z.number(),
    IVATotal: z.number(),
    LineTotalWithoutIVA: z.number(),
    ForWho: z.string(),
    SalesRep: z.string(),
    Printed: z.boolean(),
    Paid: z.boolean(),
    Selected: z.boolean(),
    Production: z.boolean(),
    DiscountAmount: z.number(),
    DiscountPrice: z.number(),
});

export const PosPaymentSchema = z.object({
    amount: z.number(),
    paymentType: z.number().int(),
    reference: z.string(),
    timestamp: z.string(),
});

export const PosCommentSchema = z.object({
    message: z.string(),
    author: z.string(),
    timestamp: z.string(),
});

export const PosStaffSchema = z.object({
    id: z.string(),
    name: z.string(),
    email: z.string(),
});

export const PosTransactionSchema = z.object({
    ID: z.string(),
    Timestamp: z.string(),
    DueDate: z.string().nullable(),
    clientID: z.string(),
    clientName: z.string(),
    clientWebName: z.string(),
    clientPhoneNumber: z.string(),
    clientNuit: z.string(),
    clientAddress: z.string(),
    stockMovements: z.array(PosStockMovementSchema),
    MovementType: z.string(),
    GrandTotal: z.number(),
    Read: z.boolean(),
    OrderStatus: z.number().int(),
    bankIDPaidTo: z.string(),
    AmountPaid: z.number(),
    Change: z.number(),
    Payments: z.array(PosPaymentSchema),
    prePrinted: z.boolean(),
    kitchenPrinted: z.boolean(),
    Instructions: z.string(),
    CompletionTime: z.string().nullable(),
    RemindInMinutes: z.number().int(),
    ReservedFor: z.string(),
    branchDBName: z.string(),
    reversed: z.boolean(),
    ProofofPaymentAttachment: z.string(),
    IVAAmount: z.number(),
    AmountBeforeIVA: z.number(),
    Served: z.boolean(),
    OfficeClosingBalance: z.number(),
    OfficeOpeningBalance: z.number(),
    ClientClosingBalance: z.number(),
    ClientOpeningBalance: z.number(),
    SupplierClosingBalance: z.number(),
    SupplierOpeningBalance: z.number(),
    BankClosingBalance: z.number(),
    BankOpeningBalance: z.number(),
    StaffResponsible: PosStaffSchema.nullable(),
    SalesRep: z.string(),
    FaturaComment: PosCommentSchema.nullable(),
    AdminComments: z.array(PosCommentSchema),
    DiscountAmount: z.number(),
    AmountPending: z.number(),
    PartialPayment: z.number().int(),
    Type: z.number().int(),
    Online: z.boolean(),
    orderType: z.number().int(),
});

export type PosStockMovement = z.output<typeof PosStockMovementSchema>;
export type PosPayment = z.output<typeof PosPaymentSchema>;
export type PosComment = z.output<typeof PosCommentSchema>;
export type PosStaff = z.output<typeof PosStaffSchema>;
export type PosTransaction = z.output<typeof PosTransactionSchema>;

/** Every key the POS reads from an online sale document, in write order */
export const POS_TRANSACTION_KEYS = Object.keys(PosTransactionSchema.shape);
export const POS_PRODUCT_KEYS = Object.keys(PosProductSchema.shape);
