/**
 * Shared fixtures for service tests
 */

import {
    makeProduct,
    productToPos,
    type BusinessSettings,
    type CheckoutRequestInput,
    type Product,
} from '@tillsync/shared';
import { COLLECTIONS, SETTINGS_DOCUMENT_ID } from '../../config/index.js';
import { createContainer, type Container, type ContainerOptions } from '../../container.js';
import type { DocumentStore } from '../../lib/store/index.js';
import { MirrorCircuit } from '../mirrorCircuit.js';

export const NOW = new Date('2026-03-01T09:30:00Z');

export async function seedProduct(
    store: DocumentStore,
    overrides: Partial<Product> & Pick<Product, 'id' | 'name' | 'price'>
): Promise<Product> {
    const product = makeProduct(overrides);
    await store.set(COLLECTIONS.products, product.id, productToPos(product));
    return product;
}

export async function seedSettings(store: DocumentStore, settings: Partial<BusinessSettings>): Promise<void> {
    await store.set(COLLECTIONS.configuration, SETTINGS_DOCUMENT_ID, settings);
}

export function checkoutRequest(
    lines: CheckoutRequestInput['lines'],
    details: Partial<CheckoutRequestInput['details']> = {}
): CheckoutRequestInput {
    return {
        customer: { id: 'rui@example.com', name: 'Rui', email: 'rui@example.com' },
        lines,
        details: {
            ordererPhone: '0821234567',
            deliveryOption: 'delivery',
            deliveryAddress: '12 Long Street, Cape Town',
            ...details,
        },
    };
}

/** Container with a fixed clock and a private mirror circuit per test */
export function testContainer(store: DocumentStore, options: ContainerOptions = {}): Container {
    return createContainer(store, {
        clock: () => NOW,
        circuit: new MirrorCircuit(),
        posWriteTimeoutMs: 1000,
        ...options,
    });
}
