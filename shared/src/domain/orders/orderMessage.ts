/**
 * Order confirmation message sent to the business over WhatsApp after checkout.
 */

import type { Product } from '../catalog/product.js';
import { estimateDeliveryFee, roundTo2 } from './pricing.js';
import { deliveryTypeFor, type CartLine, type OrderDetails, type Orderer } from './transactionBuilder.js';

const CURRENCY = 'R';

function money(n: number): string {
    return `${CURRENCY}${n.toFixed(2)}`;
}

export function buildOrderMessage(
    orderer: Orderer,
    details: OrderDetails,
    lines: readonly CartLine[],
    products: ReadonlyMap<string, Product>
): string {
    const out: string[] = ["Hello, I'd like to place an order:", ''];

    out.push('CUSTOMER DETAILS:');
    out.push(`• Name: ${orderer.name}`);
    out.push(`• Email: ${orderer.email}`);
    out.push(`• Phone: ${details.ordererPhone}`);

    if (details.gift) {
        out.push('', 'RECIPIENT DETAILS (Gift Order):');
        out.push(`• Name: ${details.gift.recipientName}`);
        if (details.gift.recipientPhone.trim()) out.push(`• Phone: ${details.gift.recipientPhone}`);
        if (details.gift.message.trim()) out.push(`• Gift Message: ${details.gift.message}`);
    }

    out.push('', 'DELIVERY INFORMATION:');
    out.push(`• Type: ${details.deliveryOption === 'pickup' ? 'Pickup' : 'Delivery'}`);
    out.push(`• Address: ${details.deliveryAddress}`);
    if (details.deliveryInstructions.trim()) out.push(`• Instructions: ${details.deliveryInstructions}`);
    out.push(`• Preferred Contact: ${details.preferredContact}`);

    out.push('', 'ORDER SUMMARY:');
    let subtotal = 0;
    for (const line of lines) {
        const product = products.get(line.productId);
        if (!product) continue;
        const lineSubtotal = roundTo2(product.price * line.quantity);
        subtotal = roundTo2(subtotal + lineSubtotal);
        out.push(`• ${product.name} × ${line.quantity} @ ${money(product.price)} = ${money(lineSubtotal)}`);
    }

    out.push('', `Subtotal: ${money(subtotal)}`);
    const fee = estimateDeliveryFee(subtotal, deliveryTypeFor(details.deliveryOption));
    if (fee > 0) {
        out.push(`Delivery: ${money(fee)}`);
        out.push(`Total: ${money(subtotal + fee)}`);
    } else {
        out.push('Delivery: FREE');
        out.push(`Total: ${money(subtotal)}`);
    }

    out.push('', 'Please confirm availability and payment options. Thank you!');
    return out.join('\n');
}

/** wa.me deep link carrying the message; null when the business has no phone on file */
export function buildWhatsAppUrl(businessPhone: string, message: string): string | null {
    const digits = businessPhone.replace(/[^0-9]/g, '');
    if (!digits) return null;
    return `https://wa.me/${digits}?text=${encodeURIComponent(message)}`;
}
