/**
 * Checkout Router
 *
 * POST /api/checkout - turn a cart into a persisted online order
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import type { Container } from '../container.js';

export function createCheckoutRouter(container: Container): Router {
    const router: Router = Router();

    /**
     * The body is validated inside the checkout service so every field
     * error comes back in one response.
     * @route POST /api/checkout
     */
    router.post('/', asyncHandler(async (req: Request, res: Response) => {
        const result = await container.checkout.checkout(req.body);
        res.status(201).json(result);
    }));

    return router;
}
