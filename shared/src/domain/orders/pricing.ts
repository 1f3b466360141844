/**
 * Order Pricing - Shared Domain Layer
 *
 * Line and order totals for storefront sales. Tax is never computed here:
 * each product carries its own per-unit tax amount and tax-exclusive price,
 * and lines simply multiply them out.
 *
 * @module domain/orders/pricing
 */

import { effectiveTax, type Product } from '../catalog/product.js';
import { DELIVERY_FEE, FREE_DELIVERY_THRESHOLD } from '../constants.js';
import type { DeliveryType } from './statuses.js';

// ============================================
// TYPES
// ============================================

export interface LinePricing {
    /** price × quantity (tax-inclusive) */
    lineTotal: number;
    ivaTotal: number;
    lineTotalWithoutIVA: number;
}

export interface OrderTotals {
    grandTotal: number;
    ivaAmount: number;
    amountBeforeIVA: number;
    totalCost: number;
}

// ============================================
// LINE-LEVEL CALCULATIONS
// ============================================

/**
 * Price a single line.
 *
 * @example
 * priceLine({ price: 100, iva: true, ivaAmount: 15, priceWithoutIVA: 85, ... }, 2)
 * // { lineTotal: 200, ivaTotal: 30, lineTotalWithoutIVA: 170 }
 */
export function priceLine(
    product: Pick<Product, 'price' | 'iva' | 'ivaAmount' | 'ivaPercentage' | 'priceWithoutIVA'>,
    quantity: number
): LinePricing {
    const tax = effectiveTax(product);
    const lineTotal = roundTo2(product.price * quantity);

    if (!product.iva) {
        return { lineTotal, ivaTotal: 0, lineTotalWithoutIVA: lineTotal };
    }

    return {
        lineTotal,
        ivaTotal: roundTo2(tax.ivaAmount * quantity),
        lineTotalWithoutIVA: roundTo2(tax.priceWithoutIVA * quantity),
    };
}

// ============================================
// ORDER-LEVEL CALCULATIONS
// ============================================

/** Sum line figures into order totals; totalCost mirrors grandTotal for online sales */
export function sumLineTotals(lines: readonly LinePricing[]): OrderTotals {
    const grandTotal = roundTo2(lines.reduce((sum, l) => sum + l.lineTotal, 0));
    return {
        grandTotal,
        ivaAmount: roundTo2(lines.reduce((sum, l) => sum + l.ivaTotal, 0)),
        amountBeforeIVA: roundTo2(lines.reduce((sum, l) => sum + l.lineTotalWithoutIVA, 0)),
        totalCost: grandTotal,
    };
}

/**
 * Delivery charge quoted at checkout. Not part of the transaction totals.
 * Pickup is free, as is any order at or above the free-delivery threshold.
 */
export function estimateDeliveryFee(subtotal: number, deliveryType: DeliveryType): number {
    if (deliveryType === 'Pickup' || deliveryType === 'CurbsidePickup') return 0;
    if (subtotal >= FREE_DELIVERY_THRESHOLD) return 0;
    return DELIVERY_FEE;
}

export function roundTo2(n: number): number {
    return Math.round(n * 100) / 100;
}
