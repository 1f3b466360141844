/**
 * Checkout validation schemas
 */

import { z } from 'zod';
import { CHECKOUT_LIMITS, ONLINE_SALE_CONFIG, PHONE_PATTERN } from '../domain/constants.js';
import type { CartLine, OrderDetails, Orderer } from '../domain/orders/transactionBuilder.js';
import type { CustomerInfo } from '../domain/orders/transaction.js';

// ============================================
// CHECKOUT REQUEST SCHEMA
// ============================================

export const CartLineSchema = z.object({
    productId: z.string().trim().min(1, 'Product is required'),
    quantity: z.number().int('Quantity must be a whole number').positive('Quantity must be at least 1'),
});

export const CheckoutCustomerSchema = z.object({
    id: z.string().trim().min(1, 'Customer id is required'),
    name: z.string().trim().min(1, 'Customer name is required').max(CHECKOUT_LIMITS.maxNameLength),
    email: z.string().trim().default(''),
    webName: z.string().trim().optional(),
});

export const CheckoutDetailsSchema = z.object({
    ordererPhone: z.string().trim().regex(PHONE_PATTERN, 'Enter a valid phone number'),
    deliveryOption: z.enum(['delivery', 'pickup']).default('delivery'),
    deliveryAddress: z.string().default(''),
    deliveryInstructions: z.string().max(CHECKOUT_LIMITS.maxInstructionsLength, 'Delivery instructions are too long').default(''),
    preferredContact: z.enum(['WhatsApp', 'SMS', 'Phone']).default('WhatsApp'),
    isGift: z.boolean().default(false),
    recipientName: z.string().trim().max(CHECKOUT_LIMITS.maxNameLength).default(''),
    recipientPhone: z.string().trim().default(''),
    giftMessage: z.string().max(CHECKOUT_LIMITS.maxGiftMessageLength, 'Gift message is too long').default(''),
}).superRefine((details, ctx) => {
    if (details.isGift && !details.recipientName) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['recipientName'],
            message: 'Recipient name is required when ordering for someone else.',
        });
    }
    if (details.deliveryOption === 'delivery' && details.deliveryAddress.trim().length < CHECKOUT_LIMITS.minAddressLength) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['deliveryAddress'],
            message: `Delivery address is required and must be at least ${CHECKOUT_LIMITS.minAddressLength} characters.`,
        });
    }
});

export const CheckoutRequestSchema = z.object({
    customer: CheckoutCustomerSchema,
    lines: z.array(CartLineSchema).min(1, 'Your cart is empty'),
    details: CheckoutDetailsSchema,
});

export type CheckoutRequestInput = z.input<typeof CheckoutRequestSchema>;
export type CheckoutRequest = z.output<typeof CheckoutRequestSchema>;

// ============================================
// NORMALIZED CHECKOUT
// ============================================

export interface FieldError {
    path: string;
    message: string;
}

export interface NormalizedCheckout {
    customer: CustomerInfo;
    orderer: Orderer;
    lines: CartLine[];
    details: OrderDetails;
}

export type CheckoutValidationResult =
    | { success: true; data: NormalizedCheckout }
    | { success: false; errors: FieldError[] };

/**
 * Validate a raw checkout payload and normalize it into the shapes the
 * builder takes. Pickup orders get the store pickup address.
 */
export function validateCheckoutRequest(input: unknown): CheckoutValidationResult {
    const result = CheckoutRequestSchema.safeParse(input);
    if (!result.success) {
        return {
            success: false,
            errors: result.error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message,
            })),
        };
    }

    const { customer, lines, details } = result.data;
    return {
        success: true,
        data: {
            customer: {
                id: customer.id,
                name: customer.name,
                webName: customer.webName ?? customer.name,
                phoneNumber: details.ordererPhone,
            },
            orderer: { name: customer.name, email: customer.email },
            lines,
            details: {
                ordererPhone: details.ordererPhone,
                deliveryOption: details.deliveryOption,
                deliveryAddress: details.deliveryOption === 'pickup'
                    ? ONLINE_SALE_CONFIG.pickupAddress
                    : details.deliveryAddress.trim(),
                deliveryInstructions: details.deliveryInstructions,
                preferredContact: details.preferredContact,
                gift: details.isGift
                    ? {
                        recipientName: details.recipientName,
                        recipientPhone: details.recipientPhone,
                        message: details.giftMessage,
                    }
                    : null,
            },
        },
    };
}
