/**
 * Carts Router
 *
 * Durable cart backup the web layer restores from on a new session.
 */

import { Router } from 'express';
import { z } from 'zod';
import { CartLineSchema } from '@tillsync/shared';
import { typedParamsRoute, typedRouteWithParams } from '../middleware/asyncHandler.js';
import type { Container } from '../container.js';

const CartParamsSchema = z.object({
    customerId: z.string().trim().min(1, 'Customer id is required'),
});

const SaveCartSchema = z.object({
    lines: z.array(CartLineSchema),
});

export function createCartsRouter(container: Container): Router {
    const router: Router = Router();

    /** @route GET /api/carts/:customerId */
    router.get('/:customerId', typedParamsRoute(CartParamsSchema, async (_req, res, params) => {
        const lines = await container.carts.get(params.customerId);
        res.json({ customerId: params.customerId, lines });
    }));

    /** @route PUT /api/carts/:customerId */
    router.put('/:customerId', typedRouteWithParams(CartParamsSchema, SaveCartSchema, async (_req, res, { params, body }) => {
        await container.carts.save(params.customerId, body.lines);
        res.json({ customerId: params.customerId, lines: body.lines });
    }));

    return router;
}
