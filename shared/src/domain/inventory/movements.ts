/**
 * Stock Movements - Pure Domain Types
 *
 * A movement is an immutable audit-trail entry. Two kinds share one envelope:
 * - sale: a priced line (sold to a customer, or received from a supplier)
 * - count: a physical stock count reconciling the ledger
 *
 * The product is embedded as a frozen snapshot, never as a live reference.
 */

import { snapshotProduct, type Product } from '../catalog/product.js';
import { priceLine } from '../orders/pricing.js';
import { ONLINE_SALE_CONFIG } from '../constants.js';
import { InvalidArgumentError } from '../../errors/domain.js';

// ============================================
// TYPES
// ============================================

interface MovementEnvelope {
    /** ISO-8601 */
    readonly timestamp: string;
    readonly product: Readonly<Product>;
    readonly quantity: number;
    // Denormalized copies kept for legacy readers of the documents
    readonly productId: string;
    readonly productName: string;
    readonly unitPrice: number;
    readonly imageUrl: string;
    readonly category: string;
    readonly sku: string;
}

export interface SaleMovement extends MovementEnvelope {
    readonly kind: 'sale';
    readonly lineTotal: number;
    readonly ivaTotal: number;
    readonly lineTotalWithoutIVA: number;
    readonly forWho: string;
    readonly salesRep: string;
    readonly printed: boolean;
    readonly paid: boolean;
    readonly selected: boolean;
    /** Consumed by production rather than sold; excluded from sales totals */
    readonly production: boolean;
    readonly discountPercentage: number;
    readonly discountAmount: number;
    /** Unit price after discount */
    readonly discountPrice: number;
}

export interface CountAdjustment extends MovementEnvelope {
    readonly kind: 'count';
    readonly expectedStock: number;
    /** Signed: counted minus expected */
    readonly differenceInStock: number;
    readonly currentStockCount: number;
    readonly countedBy: string;
}

export type StockMovement = SaleMovement | CountAdjustment;

export interface SaleMovementOptions {
    forWho: string;
    salesRep?: string;
    production?: boolean;
    timestamp?: Date;
}

export interface CountAdjustmentOptions {
    expectedStock: number;
    countedStock: number;
    countedBy: string;
    timestamp?: Date;
}

// ============================================
// FACTORIES
// ============================================

function envelope(product: Product, quantity: number, timestamp: Date): MovementEnvelope {
    const snapshot = snapshotProduct(product);
    return {
        timestamp: timestamp.toISOString(),
        product: snapshot,
        quantity,
        productId: snapshot.id,
        productName: snapshot.name,
        unitPrice: snapshot.price,
        imageUrl: snapshot.imageUrl,
        category: snapshot.category?.name ?? '',
        sku: snapshot.sku,
    };
}

/**
 * Create a priced line movement with default flags (unpaid, unprinted,
 * not selected) and no discount.
 */
export function createSaleMovement(product: Product, quantity: number, options: SaleMovementOptions): SaleMovement {
    if (!Number.isInteger(quantity) || quantity <= 0) {
        throw new InvalidArgumentError(`quantity must be a positive integer, got ${quantity}`, 'quantity');
    }

    const pricing = priceLine(product, quantity);
    return Object.freeze({
        kind: 'sale' as const,
        ...envelope(product, quantity, options.timestamp ?? new Date()),
        ...pricing,
        forWho: options.forWho,
        salesRep: options.salesRep ?? ONLINE_SALE_CONFIG.salesRep,
        printed: false,
        paid: false,
        selected: false,
        production: options.production ?? false,
        discountPercentage: 0,
        discountAmount: 0,
        discountPrice: product.price,
    });
}

/**
 * Record a physical count. `quantity` is the counted figure; the ledger
 * moves by the signed difference from what it expected.
 */
export function createCountAdjustment(product: Product, options: CountAdjustmentOptions): CountAdjustment {
    if (!Number.isFinite(options.countedStock) || options.countedStock < 0) {
        throw new InvalidArgumentError(`countedStock must be zero or more, got ${options.countedStock}`, 'countedStock');
    }

    return Object.freeze({
        kind: 'count' as const,
        ...envelope(product, options.countedStock, options.timestamp ?? new Date()),
        expectedStock: options.expectedStock,
        differenceInStock: options.countedStock - options.expectedStock,
        currentStockCount: options.countedStock,
        countedBy: options.countedBy,
    });
}
