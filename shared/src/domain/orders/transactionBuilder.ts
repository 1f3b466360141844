/**
 * Transaction Builder - Pure Domain Logic
 *
 * Turns resolved cart lines into a priced draft transaction, then layers the
 * checkout details (contact, address, delivery type, instructions, gift
 * recipient) on top. No I/O: products come in as a snapshot map.
 */

import type { Product } from '../catalog/product.js';
import { createSaleMovement, type SaleMovement } from '../inventory/movements.js';
import { ONLINE_SALE_CONFIG } from '../constants.js';
import { sumLineTotals } from './pricing.js';
import { createDraftTransaction, type CustomerInfo, type DraftTransaction } from './transaction.js';
import type { DeliveryType } from './statuses.js';

// ============================================
// TYPES
// ============================================

export interface CartLine {
    productId: string;
    quantity: number;
}

export type DeliveryOption = 'delivery' | 'pickup';
export type PreferredContact = 'WhatsApp' | 'SMS' | 'Phone';

export interface GiftDetails {
    recipientName: string;
    recipientPhone: string;
    message: string;
}

export interface OrderDetails {
    ordererPhone: string;
    deliveryOption: DeliveryOption;
    deliveryAddress: string;
    deliveryInstructions: string;
    preferredContact: PreferredContact;
    gift: GiftDetails | null;
}

export interface Orderer {
    name: string;
    email: string;
}

export interface BuildTransactionInput {
    branchId: string;
    customer: CustomerInfo;
    lines: readonly CartLine[];
    products: ReadonlyMap<string, Product>;
    /** Name stamped on every line: the gift recipient, or the customer */
    forWho: string;
    now?: Date;
}

export interface BuildTransactionResult {
    draft: DraftTransaction;
    /** Cart lines whose product was not in the snapshot set */
    droppedProductIds: string[];
}

// ============================================
// BUILDER
// ============================================

/**
 * Price every cart line and aggregate the totals.
 * Lines whose product is missing from `products` are skipped and reported
 * in `droppedProductIds`.
 */
export function buildTransaction(input: BuildTransactionInput): BuildTransactionResult {
    const now = input.now ?? new Date();
    const movements: SaleMovement[] = [];
    const droppedProductIds: string[] = [];

    for (const line of input.lines) {
        const product = input.products.get(line.productId);
        if (!product) {
            droppedProductIds.push(line.productId);
            continue;
        }
        movements.push(createSaleMovement(product, line.quantity, {
            forWho: input.forWho,
            salesRep: ONLINE_SALE_CONFIG.salesRep,
            timestamp: now,
        }));
    }

    const draft = createDraftTransaction(input.branchId, input.customer, now);
    const totals = sumLineTotals(movements);

    return {
        draft: { ...draft, ...totals, stockMovements: movements },
        droppedProductIds,
    };
}

export function forWhoFor(customer: CustomerInfo, details: Pick<OrderDetails, 'gift'>): string {
    return details.gift ? details.gift.recipientName : customer.name;
}

export function deliveryTypeFor(option: DeliveryOption): DeliveryType {
    return option === 'pickup' ? 'Pickup' : 'Standard';
}

/**
 * Copy checkout details onto a draft. Gift orders are addressed to the
 * recipient; the orderer is kept in the instructions block.
 */
export function applyOrderDetails(draft: DraftTransaction, details: OrderDetails, orderer: Orderer): DraftTransaction {
    const address = details.deliveryOption === 'pickup' ? ONLINE_SALE_CONFIG.pickupAddress : details.deliveryAddress.trim();
    const enriched: DraftTransaction = {
        ...draft,
        phone: details.ordererPhone,
        deliveryAddress: address,
        clientAddress: address,
        deliveryType: deliveryTypeFor(details.deliveryOption),
        instructions: buildInstructions(details, orderer),
    };

    if (details.gift) {
        enriched.clientName = details.gift.recipientName;
        enriched.clientPhoneNumber = details.gift.recipientPhone || details.ordererPhone;
    }

    return enriched;
}

/**
 * One line per fact, newline-terminated.
 *
 * @example
 * Online order via e-commerce platform
 * GIFT ORDER - Recipient: Ana
 * Ordered by: Rui (rui@example.com)
 * Preferred Contact: WhatsApp
 */
export function buildInstructions(details: OrderDetails, orderer: Orderer): string {
    const lines: string[] = [ONLINE_SALE_CONFIG.instructionsBanner];

    if (details.gift) {
        lines.push(`GIFT ORDER - Recipient: ${details.gift.recipientName}`);
        if (details.gift.recipientPhone.trim()) {
            lines.push(`Recipient Phone: ${details.gift.recipientPhone}`);
        }
        lines.push(`Ordered by: ${orderer.name} (${orderer.email})`);
        if (details.gift.message.trim()) {
            lines.push(`Gift Message: ${details.gift.message}`);
        }
    }

    if (details.deliveryInstructions.trim()) {
        lines.push(`Delivery Instructions: ${details.deliveryInstructions}`);
    }

    lines.push(`Preferred Contact: ${details.preferredContact}`);

    return lines.map(l => `${l}\n`).join('');
}
