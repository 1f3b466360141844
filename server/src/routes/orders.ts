/**
 * Orders Router
 *
 * GET   /api/orders/:id             - read a persisted order
 * PATCH /api/orders/:id/status      - move an order through its lifecycle
 * POST  /api/orders/:id/pos-resync  - write the order to the POS again
 */

import { Router } from 'express';
import { z } from 'zod';
import { ORDER_STATUSES, parseTransactionId } from '@tillsync/shared';
import { typedParamsRoute, typedRouteWithParams } from '../middleware/asyncHandler.js';
import type { Container } from '../container.js';

const OrderParamsSchema = z.object({
    id: z.string().trim().refine(id => parseTransactionId(id) !== null, 'Order id must look like order_yyyyMMdd_NNNN'),
});

const StatusBodySchema = z.object({
    status: z.enum(ORDER_STATUSES),
});

export function createOrdersRouter(container: Container): Router {
    const router: Router = Router();

    router.get('/:id', typedParamsRoute(OrderParamsSchema, async (_req, res, params) => {
        const order = await container.orders.getOrder(params.id);
        res.json(order);
    }));

    router.patch('/:id/status', typedRouteWithParams(OrderParamsSchema, StatusBodySchema, async (_req, res, { params, body }) => {
        const result = await container.orders.updateOrderStatus(params.id, body.status);
        res.json(result);
    }));

    router.post('/:id/pos-resync', typedParamsRoute(OrderParamsSchema, async (_req, res, params) => {
        const order = await container.orders.resyncToPos(params.id);
        res.json({ transactionId: order.id, mirrored: true });
    }));

    return router;
}
