/**
 * Online Order Status State Machine - Pure Domain Logic
 * Single source of truth for order status transitions.
 * NO DATABASE DEPENDENCIES - pure functions only.
 *
 * STATUS FLOW:
 * New → Accepted → Processing → ReadyForCollection → Completed
 *  ↓       ↓           ↓               ↓
 * Declined Cancelled  Incomplete     Cancelled
 *
 * Completed, Declined and Cancelled are terminal.
 */

import { fulfillmentStatusFor, type FulfillmentStatus, type OrderStatus } from './statuses.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

export interface StatusTransitionDefinition {
    to: OrderStatus;
    description: string;
}

export interface StatusTransitionResult {
    previousStatus: OrderStatus;
    newStatus: OrderStatus;
    fulfillmentStatus: FulfillmentStatus;
    /** False when the order already had the requested status */
    changed: boolean;
}

// ============================================
// STATE MACHINE DEFINITION
// ============================================

export const ORDER_STATUS_TRANSITIONS: Record<OrderStatus, StatusTransitionDefinition[]> = {
    NA: [
        { to: 'New', description: 'Recover an order saved without a status' },
        { to: 'Cancelled', description: 'Cancel' },
    ],
    New: [
        { to: 'Accepted', description: 'Accept the order at the till' },
        { to: 'Declined', description: 'Decline the order' },
        { to: 'Pending', description: 'Hold for customer confirmation' },
        { to: 'Processing', description: 'Start preparing straight away' },
        { to: 'Cancelled', description: 'Cancel' },
    ],
    Pending: [
        { to: 'Accepted', description: 'Accept after confirmation' },
        { to: 'Processing', description: 'Start preparing' },
        { to: 'Declined', description: 'Decline the order' },
        { to: 'Incomplete', description: 'Customer details missing' },
        { to: 'Cancelled', description: 'Cancel' },
    ],
    Accepted: [
        { to: 'Processing', description: 'Start preparing' },
        { to: 'ReadyForCollection', description: 'Packed and waiting for collection' },
        { to: 'Completed', description: 'Handed over' },
        { to: 'Cancelled', description: 'Cancel' },
    ],
    Processing: [
        { to: 'ReadyForCollection', description: 'Packed and waiting for collection' },
        { to: 'Completed', description: 'Handed over' },
        { to: 'Incomplete', description: 'Could not fulfil every line' },
        { to: 'Cancelled', description: 'Cancel' },
    ],
    Incomplete: [
        { to: 'Processing', description: 'Resume preparing' },
        { to: 'Cancelled', description: 'Cancel' },
    ],
    ReadyForCollection: [
        { to: 'Completed', description: 'Collected by the customer' },
        { to: 'Cancelled', description: 'Never collected' },
    ],
    Completed: [],
    Declined: [],
    Cancelled: [],
};

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = ['Completed', 'Declined', 'Cancelled'] as const;

// ============================================
// VALIDATION FUNCTIONS
// ============================================

export function isValidStatusTransition(from: OrderStatus, to: OrderStatus): boolean {
    return ORDER_STATUS_TRANSITIONS[from].some(t => t.to === to);
}

export function getValidNextStatuses(from: OrderStatus): OrderStatus[] {
    return ORDER_STATUS_TRANSITIONS[from].map(t => t.to);
}

export function isTerminalStatus(status: OrderStatus): boolean {
    return TERMINAL_ORDER_STATUSES.includes(status);
}

export function buildStatusTransitionError(from: OrderStatus, to: OrderStatus): string {
    const allowed = getValidNextStatuses(from);
    if (allowed.length === 0) {
        return `Cannot change status from '${from}' to '${to}': '${from}' is final`;
    }
    return `Cannot change status from '${from}' to '${to}'. Allowed: ${allowed.join(', ')}`;
}

/**
 * Resolve a status change. Re-applying the current status is a no-op;
 * anything else must be listed in ORDER_STATUS_TRANSITIONS.
 * Returns null for a disallowed transition.
 */
export function resolveStatusTransition(from: OrderStatus, to: OrderStatus): StatusTransitionResult | null {
    if (from === to) {
        return { previousStatus: from, newStatus: to, fulfillmentStatus: fulfillmentStatusFor(to), changed: false };
    }
    if (!isValidStatusTransition(from, to)) return null;
    return { previousStatus: from, newStatus: to, fulfillmentStatus: fulfillmentStatusFor(to), changed: true };
}
