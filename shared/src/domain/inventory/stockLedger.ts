/**
 * Stock Ledger - Pure Domain Logic
 *
 * One StockItem per product. Quantity only changes through the three add
 * operations; movement histories are append-only. No persistence and no
 * concurrency control here: the server's ledger service serializes writers
 * and checks the document version.
 *
 * Outgoing stock clamps at zero: an order that already exists is never
 * rejected by the ledger, it just cannot drive stock negative.
 */

import type { Product } from '../catalog/product.js';
import { roundTo2 } from '../orders/pricing.js';
import { InvalidArgumentError } from '../../errors/domain.js';
import {
    createSaleMovement,
    type CountAdjustment,
    type SaleMovement,
    type SaleMovementOptions,
} from './movements.js';

// ============================================
// TYPES
// ============================================

/** Persisted shape of a StockItem */
export interface StockItemState {
    productId: string;
    product: Product;
    quantity: number;
    in: SaleMovement[];
    out: SaleMovement[];
    stockCounts: CountAdjustment[];
    accumulatedStockCounts: number;
    /** Transactions already applied, so replays are no-ops */
    appliedTransactionIds: string[];
    createdAt: string;
    updatedAt: string;
}

// ============================================
// STOCK ITEM
// ============================================

export class StockItem {
    private state: StockItemState;

    private constructor(state: StockItemState) {
        this.state = state;
    }

    /**
     * Start a ledger for a product that has none, seeded from the
     * product's own stock figure.
     */
    static open(product: Product, now: Date = new Date()): StockItem {
        const stamp = now.toISOString();
        return new StockItem({
            productId: product.id,
            product: { ...product },
            quantity: Math.max(0, product.stockQuantity),
            in: [],
            out: [],
            stockCounts: [],
            accumulatedStockCounts: 0,
            appliedTransactionIds: [],
            createdAt: stamp,
            updatedAt: stamp,
        });
    }

    static fromState(state: StockItemState): StockItem {
        return new StockItem({
            ...state,
            in: [...state.in],
            out: [...state.out],
            stockCounts: [...state.stockCounts],
            appliedTransactionIds: [...state.appliedTransactionIds],
        });
    }

    get productId(): string {
        return this.state.productId;
    }

    get product(): Product {
        return this.state.product;
    }

    get quantity(): number {
        return this.state.quantity;
    }

    get accumulatedStockCounts(): number {
        return this.state.accumulatedStockCounts;
    }

    get incoming(): readonly SaleMovement[] {
        return this.state.in;
    }

    get outgoing(): readonly SaleMovement[] {
        return this.state.out;
    }

    get stockCounts(): readonly CountAdjustment[] {
        return this.state.stockCounts;
    }

    // ============================================
    // MUTATIONS
    // ============================================

    addIncomingStock(movement: SaleMovement | null | undefined): void {
        if (!movement) throw new InvalidArgumentError('movement is required', 'movement');
        this.state.in.push(movement);
        this.state.quantity += movement.quantity;
        this.touch();
    }

    addOutgoingStock(movement: SaleMovement | null | undefined): void {
        if (!movement) throw new InvalidArgumentError('movement is required', 'movement');
        this.state.out.push(movement);
        this.state.quantity = Math.max(0, this.state.quantity - movement.quantity);
        this.touch();
    }

    addStockCount(adjustment: CountAdjustment | null | undefined): void {
        if (!adjustment) throw new InvalidArgumentError('adjustment is required', 'adjustment');
        this.state.stockCounts.push(adjustment);
        this.state.accumulatedStockCounts += adjustment.quantity;
        this.state.quantity += adjustment.differenceInStock;
        this.touch();
    }

    /** Sale line against this item's product, priced like a checkout line */
    createSaleMovement(quantity: number, options: SaleMovementOptions): SaleMovement {
        return createSaleMovement(this.state.product, quantity, options);
    }

    hasApplied(transactionId: string): boolean {
        return this.state.appliedTransactionIds.includes(transactionId);
    }

    markApplied(transactionId: string): void {
        if (!this.hasApplied(transactionId)) {
            this.state.appliedTransactionIds.push(transactionId);
        }
    }

    // ============================================
    // READS
    // ============================================

    /** Units sold, not counting stock consumed by production */
    getTotalSold(): number {
        return this.state.out
            .filter(m => !m.production)
            .reduce((sum, m) => sum + m.quantity, 0);
    }

    getTotalPurchased(): number {
        return this.state.in.reduce((sum, m) => sum + m.quantity, 0);
    }

    getStockValue(): number {
        return roundTo2(this.state.quantity * this.state.product.price);
    }

    toState(): StockItemState {
        return {
            ...this.state,
            in: [...this.state.in],
            out: [...this.state.out],
            stockCounts: [...this.state.stockCounts],
            appliedTransactionIds: [...this.state.appliedTransactionIds],
        };
    }

    private touch(): void {
        this.state.updatedAt = new Date().toISOString();
    }
}
