/**
 * Catalog Product - Pure Domain Types
 *
 * Products are owned by the point-of-sale side and edited out-of-band.
 * The storefront reads them and only ever writes back the stock figure.
 *
 * Tax amounts are pre-computed per product. When `iva` is false the
 * per-product tax fields are ignored and the product is priced tax-free.
 */

// ============================================
// TYPES
// ============================================

export interface CategoryRef {
    id: string;
    name: string;
}

export interface SupplierRef {
    id: string;
    name: string;
    accountNo: string;
    bankName: string;
    email: string;
    phoneNumber: string;
    closingBalance: number;
    creditDays: number;
    deleted: boolean;
    hideFromAdmin: boolean;
}

export interface Product {
    id: string;
    documentId: string;
    name: string;
    /** Tax-inclusive unit price */
    price: number;
    /** Pre-computed tax-exclusive unit price */
    priceWithoutIVA: number;
    /** Pre-computed tax amount per unit */
    ivaAmount: number;
    ivaPercentage: number;
    iva: boolean;
    sku: string;
    barcode: string;
    description: string;
    stockQuantity: number;
    /** Sold by weight */
    grams: boolean;
    costPrice: number;
    previousCostPrice: number;
    /** Alternate branch price list */
    regionalPrice: number;
    lotNumber: string;
    /** ISO-8601 */
    expiryDate: string | null;
    sortOrder: number;
    comment: string;
    hideInPOS: boolean;
    hideInWeb: boolean;
    imageUrl: string;
    produceOnSale: boolean;
    productType: number;
    category: CategoryRef | null;
    supplier: SupplierRef | null;
}

/** Per-unit tax figures after the `iva` flag has been applied */
export interface EffectiveTax {
    ivaAmount: number;
    ivaPercentage: number;
    priceWithoutIVA: number;
}

// ============================================
// FUNCTIONS
// ============================================

export function effectiveTax(product: Pick<Product, 'iva' | 'price' | 'ivaAmount' | 'ivaPercentage' | 'priceWithoutIVA'>): EffectiveTax {
    if (!product.iva) {
        return { ivaAmount: 0, ivaPercentage: 0, priceWithoutIVA: product.price };
    }
    return {
        ivaAmount: product.ivaAmount,
        ivaPercentage: product.ivaPercentage,
        priceWithoutIVA: product.priceWithoutIVA,
    };
}

/**
 * Deep copy of a product, frozen. Movements embed this instead of a live
 * reference so later catalog edits never rewrite order history.
 */
export function snapshotProduct(product: Product): Readonly<Product> {
    return Object.freeze({
        ...product,
        category: product.category ? Object.freeze({ ...product.category }) : null,
        supplier: product.supplier ? Object.freeze({ ...product.supplier }) : null,
    });
}

/** Build a product with neutral defaults, mostly for tests and seeding */
export function makeProduct(overrides: Partial<Product> & Pick<Product, 'id' | 'name' | 'price'>): Product {
    return {
        documentId: overrides.id,
        priceWithoutIVA: overrides.price,
        ivaAmount: 0,
        ivaPercentage: 0,
        iva: false,
        sku: '',
        barcode: '',
        description: '',
        stockQuantity: 0,
        grams: false,
        costPrice: 0,
        previousCostPrice: 0,
        regionalPrice: 0,
        lotNumber: '',
        expiryDate: null,
        sortOrder: 0,
        comment: '',
        hideInPOS: false,
        hideInWeb: false,
        imageUrl: '',
        produceOnSale: false,
        productType: 0,
        category: null,
        supplier: null,
        ...overrides,
    };
}
