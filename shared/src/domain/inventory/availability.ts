/**
 * Stock availability check for a cart, against live product stock figures.
 * Collects every problem rather than stopping at the first.
 */

import type { Product } from '../catalog/product.js';
import type { CartLine } from '../orders/transactionBuilder.js';

export type StockIssue =
    | { kind: 'shortfall'; productId: string; productName: string; available: number; requested: number }
    | { kind: 'missing'; productId: string };

export const MISSING_PRODUCT_MESSAGE = 'A product in your cart was not found in the catalogue.';

/**
 * Quantities are summed per product first, so two lines of the same
 * product are checked together.
 */
export function findStockIssues(lines: readonly CartLine[], products: ReadonlyMap<string, Product>): StockIssue[] {
    const requested = new Map<string, number>();
    for (const line of lines) {
        requested.set(line.productId, (requested.get(line.productId) ?? 0) + line.quantity);
    }

    const issues: StockIssue[] = [];
    for (const [productId, quantity] of requested) {
        const product = products.get(productId);
        if (!product) {
            issues.push({ kind: 'missing', productId });
            continue;
        }
        if (product.stockQuantity < quantity) {
            issues.push({
                kind: 'shortfall',
                productId,
                productName: product.name,
                available: product.stockQuantity,
                requested: quantity,
            });
        }
    }
    return issues;
}

export function describeStockIssue(issue: StockIssue): string {
    if (issue.kind === 'missing') return MISSING_PRODUCT_MESSAGE;
    return `${issue.productName} — Available: ${issue.available}, Requested: ${issue.requested}`;
}

/**
 * @example
 * formatStockIssues(issues) // 'Stock issues: Widget — Available: 1, Requested: 2; Gadget — Available: 0, Requested: 1'
 */
export function formatStockIssues(issues: readonly StockIssue[]): string {
    return `Stock issues: ${issues.map(describeStockIssue).join('; ')}`;
}
